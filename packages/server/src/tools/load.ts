/**
 * typegraph_load - Import a codebase descriptor file.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatLoaded } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

const InputSchema = {
  path: z.string().min(1).describe("Path to a codebase descriptor JSON file"),
};

export function registerLoad(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_load",
    {
      title: "Load type graph",
      description:
        "Import a codebase descriptor file and make it the graph all other typegraph tools query. Replaces the current graph.",
      inputSchema: InputSchema,
    },
    async ({ path }) =>
      resultToResponse(await service.load(path), (loaded) =>
        markdownResponse("Type Graph Loaded", formatLoaded(loaded))
      )
  );
}
