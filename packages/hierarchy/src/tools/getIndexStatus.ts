import * as z from "zod/v4";
import { successResponse } from "@codenav/core";
import type { IndexStatus } from "../core/model.js";
import type { Formatted, ToolRegistrar } from "./types.js";

export const registerGetIndexStatus: ToolRegistrar = (server, facade) => {
  server.registerTool(
    "get_index_status",
    {
      title: "Index status",
      description: "Check whether the code model is ready. While it is being built, every query fails with INDEX_NOT_READY; wait and retry.",
      inputSchema: {},
      outputSchema: {
        success: z.boolean(),
        ready: z.boolean(),
        languages: z.array(z.string()),
      },
    },
    async () => {
      const { text, data } = formatIndexStatus(facade.indexStatus());
      return successResponse(text, data);
    }
  );
};

export function formatIndexStatus(status: IndexStatus): Formatted<{ ready: boolean; languages: string[] }> {
  const { ready, languages } = status;
  const text = ready
    ? `Index is ready.\n\n**Languages:** ${languages.length > 0 ? languages.join(", ") : "none"}`
    : "Index is still being built. Queries will fail until it completes.";
  return { text, data: { ready, languages } };
}
