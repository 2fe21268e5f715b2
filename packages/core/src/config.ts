/**
 * Environment configuration shared by typegraph entry points.
 */

import * as z from "zod/v4";

import type { LogLevel } from "./logger.js";
import { Err, Ok, type Result } from "./result.js";

const EnvSchema = z.object({
  TYPEGRAPH_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  TYPEGRAPH_DESCRIPTORS: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe("Path of a codebase descriptor JSON file imported at start-up"),
});

export interface TypeGraphConfig {
  logLevel: LogLevel;
  /** Descriptor file to import on start-up, if any */
  descriptorsPath?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read configuration from environment variables.
 * Unknown variables are ignored; an empty TYPEGRAPH_DESCRIPTORS counts as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<TypeGraphConfig, ConfigError> {
  const descriptors = env.TYPEGRAPH_DESCRIPTORS;
  const parsed = EnvSchema.safeParse({
    TYPEGRAPH_LOG_LEVEL: env.TYPEGRAPH_LOG_LEVEL || undefined,
    TYPEGRAPH_DESCRIPTORS: descriptors && descriptors.trim() ? descriptors : undefined,
  });

  if (!parsed.success) {
    return Err(
      new ConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      )
    );
  }

  const config: TypeGraphConfig = { logLevel: parsed.data.TYPEGRAPH_LOG_LEVEL };
  if (parsed.data.TYPEGRAPH_DESCRIPTORS) {
    config.descriptorsPath = parsed.data.TYPEGRAPH_DESCRIPTORS;
  }
  return Ok(config);
}
