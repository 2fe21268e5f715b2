/**
 * typegraph_stats - Summarize the loaded graph.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatLoaded } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

export function registerStats(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_stats",
    {
      title: "Type graph stats",
      description:
        "Counts of types, code units and accesses in the loaded graph, plus referenced types outside the codebase.",
      inputSchema: {},
    },
    async () =>
      resultToResponse(service.getLoaded(), (loaded) =>
        markdownResponse("Type Graph Statistics", formatLoaded(loaded))
      )
  );
}
