/**
 * MCP tool registration for the type graph server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { TypeGraphService } from "../TypeGraphService.js";
import { registerCycles } from "./cycles.js";
import { registerDependencies } from "./dependencies.js";
import { registerGetMember } from "./getMember.js";
import { registerGetType } from "./getType.js";
import { registerHierarchy } from "./hierarchy.js";
import { registerLoad } from "./load.js";
import { registerStats } from "./stats.js";

export interface Services {
  service: TypeGraphService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { service } = services;

  registerLoad(server, service);
  registerStats(server, service);
  registerGetType(server, service);
  registerHierarchy(server, service);
  registerGetMember(server, service);
  registerDependencies(server, service);
  registerCycles(server, service);
}
