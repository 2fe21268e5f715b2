#!/usr/bin/env node
/**
 * MCP server for type graph queries.
 * Loads TYPEGRAPH_DESCRIPTORS at start-up when it is set.
 */

import { createLogger, runServer } from "@typegraph/core";

import { registerAllTools, type Services } from "./tools/index.js";
import { TypeGraphService } from "./TypeGraphService.js";

runServer<Services>({
  info: {
    name: "typegraph",
    version: "0.1.0",
  },
  createServices: () => ({
    service: new TypeGraphService(),
  }),
  registerTools: registerAllTools,
  onStartup: async (services, config) => {
    const log = createLogger("typegraph");
    if (!config.descriptorsPath) {
      log.info("No descriptors configured; waiting for typegraph_load");
      return;
    }

    const loaded = await services.service.load(config.descriptorsPath);
    if (!loaded.ok) {
      log.warn(`Could not load ${config.descriptorsPath}; the graph stays empty until typegraph_load`);
    }
  },
});
