/**
 * typegraph_hierarchy - Superclass chain and subclasses of a type.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatHierarchy } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

const InputSchema = {
  name: z.string().min(1).describe("Qualified name, type id, or unique simple name"),
};

export function registerHierarchy(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_hierarchy",
    {
      title: "Type hierarchy",
      description:
        "Superclass chain (nearest first), direct and transitive subclasses, and the enclosing type.",
      inputSchema: InputSchema,
    },
    async ({ name }) =>
      resultToResponse(service.getHierarchy(name), (hierarchy) =>
        markdownResponse(`Hierarchy of ${hierarchy.type.name}`, formatHierarchy(hierarchy))
      )
  );
}
