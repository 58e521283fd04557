import * as z from "zod/v4";
import { successResponse } from "@codenav/core";
import { CAPABILITIES, CAPABILITY_LABELS, type Capability } from "../core/ports/providers.js";
import type { LanguageTag } from "../core/model.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerListSupportedLanguages: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "list_supported_languages",
    {
      title: "List supported languages",
      description: "List the languages each query can answer for in this workspace.",
      inputSchema: {},
      outputSchema: {
        success: z.boolean(),
        capabilities: z.record(z.string(), z.array(z.string())),
      },
    },
    async () => {
      const { text, data } = formatSupportedLanguages(facade.supportedLanguages());
      return successResponse(text, data);
    }
  );
};

export function formatSupportedLanguages(
  capabilities: Record<Capability, LanguageTag[]>
): Formatted<{ capabilities: Record<Capability, LanguageTag[]> }> {
  const lines = ["# Supported languages", ""];
  for (const capability of CAPABILITIES) {
    const languages = capabilities[capability];
    lines.push(`- **${CAPABILITY_LABELS[capability]}:** ${languages.length > 0 ? languages.join(", ") : "none"}`);
  }
  return { text: lines.join("\n"), data: { capabilities } };
}
