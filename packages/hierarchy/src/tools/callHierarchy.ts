import * as z from "zod/v4";
import { andThen, resultToResponse } from "@codenav/core";
import type { CallDirection, CallHierarchyResult, CallNode } from "../core/model.js";
import { CALL_DEPTH } from "../core/services/QueryFacade.js";
import { CallNodeSchema, ElementRefInput, FailureFields, errorDetails, toElementRef } from "./schemas.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerCallHierarchy: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "call_hierarchy",
    {
      title: "Call hierarchy",
      description: `Get the callers or the callees of a method as a tree.

Callers include calls made through any method this one overrides, since they may dispatch here.
Callees that cannot be resolved (external or dynamic calls) are listed as [unresolved] leaves.
Each method appears at most once in the tree.`,
      inputSchema: {
        ...ElementRefInput,
        direction: z.enum(["callers", "callees"]).describe("Walk towards callers or callees"),
        depth: z
          .number()
          .int()
          .optional()
          .describe(`Tree depth, ${CALL_DEPTH.min}-${CALL_DEPTH.max} (default: ${CALL_DEPTH.default})`),
      },
      outputSchema: {
        ...FailureFields,
        node: CallNodeSchema.optional(),
        direction: z.enum(["callers", "callees"]).optional(),
        depth: z.number().optional(),
        calls: z.array(CallNodeSchema).optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        andThen(toElementRef(input), (ref) =>
          facade.callHierarchy(ref, input.direction, input.depth, { signal: extra.signal })
        ),
        formatCallHierarchy,
        errorDetails
      )
  );
};

export function formatCallHierarchy(result: CallHierarchyResult): Formatted<{
  node: CallNode;
  direction: CallDirection;
  depth: number;
  calls: CallNode[];
}> {
  const { node, direction, depth, calls } = result;
  const lines = [`# ${direction === "callers" ? "Callers of" : "Calls from"} ${node.name}`, ""];
  lines.push(`**Location:** ${node.file}:${node.line}`, `**Depth:** ${depth}`, "");

  if (calls.length === 0) {
    lines.push(direction === "callers" ? "No callers found." : "No calls found.");
  } else {
    const render = (nodes: CallNode[], indent: string): void => {
      for (const call of nodes) {
        lines.push(`${indent}- ${call.name} ${call.file}:${call.line}`);
        render(call.children ?? [], `${indent}  `);
      }
    };
    render(calls, "");
  }

  return { text: lines.join("\n"), data: { node, direction, depth, calls } };
}
