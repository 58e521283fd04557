import * as z from "zod/v4";
import { resultToResponse } from "@codenav/core";
import type { SymbolMatch } from "../core/model.js";
import { SYMBOL_LIMIT } from "../core/services/QueryFacade.js";
import { FailureFields, SymbolMatchSchema, errorDetails } from "./schemas.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerFindSymbol: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "find_symbol",
    {
      title: "Find symbol",
      description: `Fuzzy search for types, methods and fields by name.

Matches substrings and in-order abbreviations ("USvc" finds "UserService").
Exact matches come first, then the closest names by edit distance.`,
      inputSchema: {
        query: z.string().describe("Name or abbreviation to search for"),
        includeLibraries: z
          .boolean()
          .optional()
          .describe("Also search library and dependency declarations (default: false)"),
        language: z.string().optional().describe("Only search this language, e.g. java or python"),
        limit: z
          .number()
          .int()
          .optional()
          .describe(`Maximum results, ${SYMBOL_LIMIT.min}-${SYMBOL_LIMIT.max} (default: ${SYMBOL_LIMIT.default})`),
      },
      outputSchema: {
        ...FailureFields,
        query: z.string().optional(),
        matches: z.array(SymbolMatchSchema).optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        facade.searchSymbols(input.query, {
          scope: input.includeLibraries ? "all" : "project",
          limit: input.limit,
          language: input.language,
          signal: extra.signal,
        }),
        (matches) => formatSymbolMatches(input.query, matches),
        errorDetails
      )
  );
};

export function formatSymbolMatches(
  query: string,
  matches: SymbolMatch[]
): Formatted<{ query: string; matches: SymbolMatch[] }> {
  if (matches.length === 0) {
    return { text: `No symbols found matching: ${query}`, data: { query, matches } };
  }

  const lines = [`# Symbols matching "${query}"`, "", `Found ${matches.length} match(es):`, ""];
  for (const match of matches) {
    const container = match.containerName ? ` in ${match.containerName}` : "";
    lines.push(`- **${match.name}** (${match.kind})${container} ${match.file}:${match.line}`);
  }

  return { text: lines.join("\n"), data: { query, matches } };
}
