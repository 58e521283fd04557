import * as z from "zod/v4";
import { andThen, resultToResponse } from "@codenav/core";
import type { MethodInfo, SuperMethodEntry, SuperMethodsResult } from "../core/model.js";
import {
  ElementRefInput,
  FailureFields,
  MethodInfoSchema,
  SuperMethodEntrySchema,
  errorDetails,
  toElementRef,
} from "./schemas.js";
import { formatLocation, type Formatted, type ToolRegistrar } from "./types.js";

export const registerFindSuperMethods: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "find_super_methods",
    {
      title: "Find super methods",
      description: `List every method that a method overrides or implements, nearest ancestor first.

Depth 1 is the direct parent. Interface declarations are flagged.`,
      inputSchema: ElementRefInput,
      outputSchema: {
        ...FailureFields,
        method: MethodInfoSchema.optional(),
        hierarchy: z.array(SuperMethodEntrySchema).optional(),
        totalCount: z.number().optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        andThen(toElementRef(input), (ref) => facade.superMethods(ref, { signal: extra.signal })),
        formatSuperMethods,
        errorDetails
      )
  );
};

export function formatSuperMethods(result: SuperMethodsResult): Formatted<{
  method: MethodInfo;
  hierarchy: SuperMethodEntry[];
  totalCount: number;
}> {
  const { method, hierarchy, totalCount } = result;
  const owner = method.containingClass ? `${method.containingClass}.` : "";
  const lines = [`# Super methods of ${owner}${method.name}`, "", `**Signature:** \`${method.signature}\``, ""];

  if (hierarchy.length === 0) {
    lines.push("This method does not override anything.");
  } else {
    lines.push(`Found ${totalCount} super method(s):`, "");
    for (const entry of hierarchy) {
      const tag = entry.isInterface ? " [interface]" : "";
      lines.push(
        `${entry.depth}. ${entry.containingClass}.${entry.name}${tag} \`${entry.signature}\` ${formatLocation(entry.file, entry.line)}`
      );
    }
  }

  return { text: lines.join("\n"), data: { method, hierarchy, totalCount } };
}
