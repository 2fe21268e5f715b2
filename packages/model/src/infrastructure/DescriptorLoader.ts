/**
 * Read and validate codebase descriptor files.
 */

import { readFile } from "node:fs/promises";

import { Err, Ok, type Result } from "@typegraph/core";

import type { CodebaseDescriptor } from "../core/descriptors.js";
import type { ConstructionInvariantError } from "../core/errors.js";
import type { ImportResult, TypeGraphImporter } from "../TypeGraphImporter.js";
import { CodebaseDescriptorSchema } from "./schemas.js";

export type DescriptorLoadFailure = "unreadable" | "malformed_json" | "invalid_schema";

export class DescriptorLoadError extends Error {
  override readonly name = "DescriptorLoadError";

  constructor(
    readonly source: string,
    readonly reason: DescriptorLoadFailure,
    message: string,
    /** Schema violations as "path: message" */
    readonly issues: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Parse descriptor JSON text.
 *
 * @param source - Where the text came from, used in error messages
 */
export function parseCodebaseDescriptor(
  text: string,
  source = "<inline>"
): Result<CodebaseDescriptor, DescriptorLoadError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    return Err(new DescriptorLoadError(source, "malformed_json", `${source} is not valid JSON: ${detail}`));
  }

  const parsed = CodebaseDescriptorSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`
    );
    return Err(
      new DescriptorLoadError(
        source,
        "invalid_schema",
        `${source} is not a valid codebase descriptor (${issues.length} issues)`,
        issues
      )
    );
  }
  return Ok(parsed.data);
}

export async function loadCodebaseDescriptor(
  filePath: string
): Promise<Result<CodebaseDescriptor, DescriptorLoadError>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    return Err(new DescriptorLoadError(filePath, "unreadable", `Cannot read ${filePath}: ${detail}`));
  }
  return parseCodebaseDescriptor(text, filePath);
}

/**
 * Load a descriptor file and import it.
 */
export async function importCodebaseFile(
  filePath: string,
  importer: TypeGraphImporter
): Promise<Result<ImportResult, DescriptorLoadError | ConstructionInvariantError>> {
  const loaded = await loadCodebaseDescriptor(filePath);
  if (!loaded.ok) return loaded;
  return importer.importDescriptors(loaded.value.types);
}
