import * as z from "zod/v4";
import { andThen, resultToResponse } from "@codenav/core";
import type { UsageEntry, UsagesResult } from "../core/model.js";
import { ElementRefInput, FailureFields, UsageEntrySchema, errorDetails, toElementRef } from "./schemas.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerFindUsages: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "find_usages",
    {
      title: "Find usages",
      description: `Find every reference to a declaration, grouped by file.

Point at the declaration or at any reference to it. Each usage names the method or type it sits in.

Use cases:
- Check who depends on a method before changing it
- Find where a class is instantiated`,
      inputSchema: ElementRefInput,
      outputSchema: {
        ...FailureFields,
        element: z.string().optional(),
        usages: z.array(UsageEntrySchema).optional(),
        totalCount: z.number().optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        andThen(toElementRef(input), (ref) => facade.findUsages(ref, { signal: extra.signal })),
        formatUsages,
        errorDetails
      )
  );
};

export function formatUsages(result: UsagesResult): Formatted<{
  element: string;
  usages: UsageEntry[];
  totalCount: number;
}> {
  const { element, usages, totalCount } = result;
  const data = { element, usages, totalCount };
  if (usages.length === 0) {
    return { text: `# Usages of ${element}\n\nNo usages found.`, data };
  }

  const lines = [`# Usages of ${element}`, "", `Found ${totalCount} usage(s):`];
  const byFile = new Map<string, UsageEntry[]>();
  for (const usage of usages) {
    const existing = byFile.get(usage.file) ?? [];
    existing.push(usage);
    byFile.set(usage.file, existing);
  }
  for (const [file, fileUsages] of byFile) {
    lines.push("", `## ${file} (${fileUsages.length})`);
    for (const usage of fileUsages) {
      lines.push(`  L${usage.line}${usage.container ? ` in ${usage.container}` : ""}`);
    }
  }

  return { text: lines.join("\n"), data };
}
