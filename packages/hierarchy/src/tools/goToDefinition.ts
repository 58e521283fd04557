import { andThen, resultToResponse } from "@codenav/core";
import type { DefinitionResult } from "../core/model.js";
import { DefinitionSchema, ElementRefInput, FailureFields, errorDetails, toElementRef } from "./schemas.js";
import { formatLocation, type Formatted, type ToolRegistrar } from "./types.js";

export const registerGoToDefinition: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "go_to_definition",
    {
      title: "Go to definition",
      description: `Find where the symbol at a position is declared.

Works on calls, type references and variable uses. A position on a declaration returns that declaration.`,
      inputSchema: ElementRefInput,
      outputSchema: {
        ...FailureFields,
        definition: DefinitionSchema.optional(),
      },
    },
    async (input) =>
      resultToResponse(andThen(toElementRef(input), (ref) => facade.goToDefinition(ref)), formatDefinition, errorDetails)
  );
};

export function formatDefinition(definition: DefinitionResult): Formatted<{ definition: DefinitionResult }> {
  const lines = [
    `# Definition: ${definition.qualifiedName ?? definition.name}`,
    "",
    `**Kind:** ${definition.kind}`,
    `**Language:** ${definition.language}`,
    `**Location:** ${formatLocation(definition.file, definition.line)}`,
  ];
  return { text: lines.join("\n"), data: { definition } };
}
