import * as z from "zod/v4";
import { andThen, resultToResponse } from "@codenav/core";
import type { TypeHierarchyResult, TypeNode } from "../core/model.js";
import { ElementRefInput, FailureFields, TypeNodeSchema, errorDetails, toElementRef } from "./schemas.js";
import { formatLocation, type Formatted, type ToolRegistrar } from "./types.js";

export const registerTypeHierarchy: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "type_hierarchy",
    {
      title: "Type hierarchy",
      description: `Get the supertype tree and the subtypes of a type.

Point at a type (or anything inside one) by file position, or name it with qualifiedName.
Implicit roots such as Object are left out.

Use cases:
- See what a class extends and implements, transitively
- Find every class deriving from an interface
- Check the blast radius of changing a base class`,
      inputSchema: ElementRefInput,
      outputSchema: {
        ...FailureFields,
        node: TypeNodeSchema.optional(),
        supertypes: z.array(TypeNodeSchema).optional(),
        subtypes: z.array(TypeNodeSchema).optional(),
      },
    },
    async (input, extra) =>
      resultToResponse(
        andThen(toElementRef(input), (ref) => facade.typeHierarchy(ref, { signal: extra.signal })),
        formatTypeHierarchy,
        errorDetails
      )
  );
};

export function formatTypeHierarchy(result: TypeHierarchyResult): Formatted<{
  node: TypeNode;
  supertypes: TypeNode[];
  subtypes: TypeNode[];
}> {
  const { node, supertypes, subtypes } = result;
  const lines = [
    `# Type hierarchy: ${node.qualifiedName ?? node.name}`,
    "",
    `**Kind:** ${node.kind}`,
    `**Location:** ${formatLocation(node.file, node.line)}`,
    "",
    "## Supertypes",
  ];

  if (supertypes.length === 0) {
    lines.push("(none)");
  } else {
    const render = (nodes: TypeNode[], indent: string): void => {
      for (const supertype of nodes) {
        lines.push(`${indent}- ${describeType(supertype)}`);
        render(supertype.supertypes ?? [], `${indent}  `);
      }
    };
    render(supertypes, "");
  }

  lines.push("", `## Subtypes (${subtypes.length})`);
  if (subtypes.length === 0) lines.push("(none)");
  for (const subtype of subtypes) {
    lines.push(`- ${describeType(subtype)}`);
  }

  return { text: lines.join("\n"), data: { node, supertypes, subtypes } };
}

function describeType(node: TypeNode): string {
  return `${node.qualifiedName ?? node.name} (${node.kind}) ${formatLocation(node.file, node.line)}`;
}
