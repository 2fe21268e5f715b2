/**
 * typegraph_dependencies - Type dependencies derived from accesses.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatDependencies } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

const InputSchema = {
  name: z.string().min(1).describe("Qualified name, type id, or unique simple name"),
  direction: z
    .enum(["outgoing", "incoming"])
    .default("outgoing")
    .describe("outgoing: what the type depends on. incoming: what depends on it"),
  scope: z
    .enum(["direct", "hierarchy"])
    .default("direct")
    .describe(
      "direct: the type alone. hierarchy: outgoing adds inherited accesses, incoming adds dependencies on subclasses"
    ),
};

export function registerDependencies(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_dependencies",
    {
      title: "Type dependencies",
      description:
        "List dependencies between types, one per access that crosses a type boundary, with the source line.",
      inputSchema: InputSchema,
    },
    async ({ name, direction, scope }) =>
      resultToResponse(service.getDependencies(name, direction, scope), (dependencies) =>
        markdownResponse(`${capitalize(direction)} dependencies of ${name}`, formatDependencies(dependencies))
      )
  );
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
