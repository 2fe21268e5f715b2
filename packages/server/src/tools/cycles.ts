/**
 * typegraph_cycles - Dependency cycles between types.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatCycles } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

export function registerCycles(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_cycles",
    {
      title: "Dependency cycles",
      description: "Find cycles in the graph of direct type dependencies. Each cycle starts and ends with the same type.",
      inputSchema: {},
    },
    async () =>
      resultToResponse(service.findCycles(), (cycles) => markdownResponse("Dependency Cycles", formatCycles(cycles)))
  );
}
