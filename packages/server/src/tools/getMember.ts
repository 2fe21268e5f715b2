/**
 * typegraph_get_member - Show a field, method or constructor with its accesses.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { andThen, map, markdownResponse, resultToResponse } from "@typegraph/core";

import { formatMember } from "../format.js";
import type { TypeGraphService } from "../TypeGraphService.js";

const InputSchema = {
  type: z.string().min(1).describe("Declaring type: qualified name, type id, or unique simple name"),
  member: z.string().min(1).describe('Field or method name; "<init>" for constructors'),
  parameters: z
    .array(z.string())
    .optional()
    .describe("Parameter type ids, in order. Omit for fields and parameterless code units"),
};

export function registerGetMember(server: McpServer, service: TypeGraphService): void {
  server.registerTool(
    "typegraph_get_member",
    {
      title: "Get member",
      description:
        "Get a member of a type. Code units list the accesses they perform; every member lists the accesses that target it.",
      inputSchema: InputSchema,
    },
    async ({ type, member, parameters }) => {
      const result = andThen(service.getMember(type, member, parameters), (found) =>
        map(service.getAccessesTo(found), (accessedBy) => ({ found, accessedBy }))
      );
      return resultToResponse(result, ({ found, accessedBy }) =>
        markdownResponse(found.fullName, formatMember(found, accessedBy))
      );
    }
  );
}
