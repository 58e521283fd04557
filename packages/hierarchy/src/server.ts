#!/usr/bin/env node
/**
 * MCP server for type, call and super-method hierarchies and symbol search.
 */

import { createLogger, runServer } from "@codenav/core";
import { loadConfig } from "./config.js";
import { buildServices } from "./services.js";
import { registerAllTools, type Services } from "./tools/index.js";

const log = createLogger("hierarchy");

runServer<Services>({
  config: {
    name: "codenav:hierarchy",
    version: "0.1.0",
  },
  createServices: () => {
    const config = loadConfig();
    if (!config.ok) throw config.error;

    const services = buildServices(config.value, log);
    if (!services.ok) throw services.error;
    return services.value;
  },
  registerTools: registerAllTools,
  onStartup: (services) => {
    const languages = new Set(Object.values(services.facade.supportedLanguages()).flat());
    log(`Ready; languages: ${[...languages].join(", ") || "none"}`);
  },
  log,
});
