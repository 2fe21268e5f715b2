/**
 * Two-phase import: build every type from its descriptor, then complete
 * them all against an id-keyed context.
 */

import { createLogger, tryCatch, type Logger, type Result } from "@typegraph/core";

import type { TypeDescriptor, TypeId } from "./core/descriptors.js";
import { ConstructionInvariantError } from "./core/errors.js";
import type { GraphType } from "./core/GraphType.js";
import type { UnresolvedReference } from "./core/ports/ImportContext.js";
import { NO_OP_LISTENER, type TypeAnalysisListener } from "./core/ports/TypeAnalysisListener.js";
import { completeTypes } from "./core/services/Completion.js";
import { buildType } from "./core/services/TypeBuilder.js";
import { TypeGraph } from "./core/TypeGraph.js";
import { DescriptorImportContext } from "./infrastructure/DescriptorImportContext.js";

export interface ImportStats {
  types: number;
  codeUnits: number;
  accesses: number;
  unresolvedReferences: number;
}

export interface ImportResult {
  graph: TypeGraph;
  /** Type ids referenced by the codebase but not part of it */
  unresolved: UnresolvedReference[];
  stats: ImportStats;
}

export interface TypeGraphImporterOptions {
  listener?: TypeAnalysisListener;
  logger?: Logger;
}

export class TypeGraphImporter {
  private readonly listener: TypeAnalysisListener;
  private readonly log: Logger;

  constructor(options: TypeGraphImporterOptions = {}) {
    this.listener = options.listener ?? NO_OP_LISTENER;
    this.log = options.logger ?? createLogger("model").child("import");
  }

  /**
   * Import a codebase. Malformed descriptors (missing ids, duplicate ids or
   * signatures, cyclic superclass chains) yield an error; references to
   * types outside the descriptors do not, they are listed in the result.
   */
  importDescriptors(
    descriptors: readonly TypeDescriptor[]
  ): Result<ImportResult, ConstructionInvariantError> {
    return tryCatch(
      () => this.run(descriptors),
      (thrown) => {
        if (thrown instanceof ConstructionInvariantError) {
          this.log.warn(`Import failed: ${thrown.message}`);
          return thrown;
        }
        throw thrown;
      }
    );
  }

  private run(descriptors: readonly TypeDescriptor[]): ImportResult {
    const types = new Map<TypeId, GraphType>();
    for (const descriptor of descriptors) {
      if (types.has(descriptor.id)) {
        throw new ConstructionInvariantError(
          "unique-type-id",
          `Type id ${descriptor.id} is supplied more than once`
        );
      }
      types.set(descriptor.id, buildType(descriptor, this.listener));
    }
    this.log.debug(`Built ${types.size} types`);

    const context = new DescriptorImportContext(types, descriptors);
    completeTypes(types.values(), context);

    const graph = new TypeGraph(types.values());
    const unresolved = context.getUnresolved();
    for (const reference of unresolved) {
      this.log.debug(
        `Unresolved ${reference.typeId}, referenced from ${reference.referencedFrom.join(", ")}`
      );
    }

    const stats = summarize(graph, unresolved);
    this.log.info(
      `Imported ${stats.types} types with ${stats.accesses} accesses ` +
        `(${stats.unresolvedReferences} unresolved references)`
    );

    return { graph, unresolved, stats };
  }
}

function summarize(graph: TypeGraph, unresolved: UnresolvedReference[]): ImportStats {
  let codeUnits = 0;
  let accesses = 0;
  for (const type of graph) {
    codeUnits += type.codeUnits.size;
    accesses += type.getDirectAccesses().length;
  }
  return {
    types: graph.size,
    codeUnits,
    accesses,
    unresolvedReferences: unresolved.length,
  };
}
