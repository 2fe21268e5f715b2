/**
 * MCP server bootstrap shared by typegraph entry points.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig, type TypeGraphConfig } from "./config.js";
import { createLogger, setDefaultLogLevel } from "./logger.js";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  info: ServerInfo;

  /** Build the services the tools operate on */
  createServices: (config: TypeGraphConfig) => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S, config: TypeGraphConfig) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Load configuration, create services, register tools and connect over stdio.
 * SIGTERM and SIGINT run the shutdown hook and close the server.
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { info, createServices, registerTools, onStartup, onShutdown } = options;

  const configResult = loadConfig();
  if (!configResult.ok) {
    throw configResult.error;
  }
  const config = configResult.value;
  setDefaultLogLevel(config.logLevel);
  const log = createLogger(info.name);

  const services = await createServices(config);

  const server = new McpServer({ name: info.name, version: info.version });
  registerTools(server, services);

  const shutdown = async (): Promise<void> => {
    log.info("Shutting down");
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      log.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services, config);

  await server.connect(new StdioServerTransport());
  log.debug(`Connected over stdio as ${info.name}@${info.version}`);
}

/**
 * Entry point wrapper: any start-up failure is logged and exits with code 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    createLogger(options.info.name).error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
