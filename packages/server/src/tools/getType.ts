/**
 * typegraph_get_type - Show one type with its members.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdownResponse, resultToResponse } from "@typegraph/core";

import { formatType } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

const InputSchema = {
  name: z.string().min(1).describe("Qualified name, type id, or unique simple name"),
};

export function registerGetType(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_get_type",
    {
      title: "Get type",
      description: "Get a type's package, superclass, fields, methods and constructors.",
      inputSchema: InputSchema,
    },
    async ({ name }) =>
      resultToResponse(service.getType(name), (type) => markdownResponse(type.name, formatType(type)))
  );
}
