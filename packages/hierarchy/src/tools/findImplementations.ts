import * as z from "zod/v4";
import { andThen, resultToResponse } from "@codenav/core";
import type { ImplementationEntry, ImplementationsResult } from "../core/model.js";
import { ElementRefInput, FailureFields, ImplementationEntrySchema, errorDetails, toElementRef } from "./schemas.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerFindImplementations: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "find_implementations",
    {
      title: "Find implementations",
      description: `Find concrete implementations: methods overriding a method, or types inheriting from a type.

A position inside a method body targets the method; elsewhere inside a type it targets the type.`,
      inputSchema: ElementRefInput,
      outputSchema: {
        ...FailureFields,
        element: z.string().optional(),
        implementations: z.array(ImplementationEntrySchema).optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        andThen(toElementRef(input), (ref) => facade.findImplementations(ref, { signal: extra.signal })),
        formatImplementations,
        errorDetails
      )
  );
};

export function formatImplementations(result: ImplementationsResult): Formatted<{
  element: string;
  implementations: ImplementationEntry[];
}> {
  const { element, implementations } = result;
  const lines = [`# Implementations of ${element}`, ""];

  if (implementations.length === 0) {
    lines.push("No implementations found.");
  } else {
    for (const entry of implementations) {
      lines.push(`- ${entry.name} (${entry.kind}) ${entry.file}:${entry.line}`);
    }
  }

  return { text: lines.join("\n"), data: { element, implementations } };
}
