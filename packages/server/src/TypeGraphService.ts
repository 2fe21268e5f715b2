/**
 * Holds the current import and answers the queries behind the MCP tools.
 */

import { Err, Ok, createLogger, type Logger, type Result } from "@typegraph/core";
import {
  MemberNotFoundError,
  TypeGraphImporter,
  byName,
  hasSimpleName,
  importCodebaseFile,
  toName,
  type Access,
  type Dependency,
  type GraphMember,
  type GraphType,
  type ImportResult,
  type ImportStats,
  type TypeDescriptor,
  type TypeGraph,
  type UnresolvedReference,
} from "@typegraph/model";

export type DependencyDirection = "outgoing" | "incoming";

/**
 * direct: only the type itself.
 * hierarchy: outgoing includes accesses inherited from superclasses;
 * incoming includes dependencies on any subclass.
 */
export type DependencyScope = "direct" | "hierarchy";

export interface TypeHierarchy {
  type: GraphType;
  /** Nearest first */
  superclasses: GraphType[];
  subclasses: GraphType[];
  allSubclasses: GraphType[];
  enclosingType: GraphType | null;
}

export interface LoadedGraph {
  source: string;
  stats: ImportStats;
  unresolved: UnresolvedReference[];
}

export const NOT_LOADED = "No type graph loaded. Call typegraph_load first.";

export class TypeGraphService {
  private current: (ImportResult & { source: string }) | null = null;
  private readonly importer: TypeGraphImporter;
  private readonly log: Logger;

  constructor(options: { importer?: TypeGraphImporter; logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger("server").child("service");
    this.importer = options.importer ?? new TypeGraphImporter({ logger: this.log.child("import") });
  }

  isEmpty(): boolean {
    return this.current === null;
  }

  /**
   * Import a descriptor file, replacing the current graph on success.
   * A failed load keeps the previous graph.
   */
  async load(filePath: string): Promise<Result<LoadedGraph, string>> {
    const result = await importCodebaseFile(filePath, this.importer);
    if (!result.ok) {
      this.log.warn(`Could not load ${filePath}: ${result.error.message}`);
      return Err(result.error.message);
    }
    return Ok(this.replace(result.value, filePath));
  }

  /**
   * Import descriptors already in memory.
   */
  loadDescriptors(descriptors: readonly TypeDescriptor[], source = "<memory>"): Result<LoadedGraph, string> {
    const result = this.importer.importDescriptors(descriptors);
    if (!result.ok) return Err(result.error.message);
    return Ok(this.replace(result.value, source));
  }

  private replace(imported: ImportResult, source: string): LoadedGraph {
    this.current = { ...imported, source };
    this.log.info(`Loaded ${imported.stats.types} types from ${source}`);
    return { source, stats: imported.stats, unresolved: imported.unresolved };
  }

  getLoaded(): Result<LoadedGraph, string> {
    if (!this.current) return Err(NOT_LOADED);
    const { source, stats, unresolved } = this.current;
    return Ok({ source, stats, unresolved });
  }

  /**
   * Resolve a type by qualified name, then id, then unique simple name.
   */
  getType(name: string): Result<GraphType, string> {
    return this.withGraph<GraphType>((graph) => {
      const exact = graph.tryGet(name) ?? graph.tryGetById(name);
      if (exact) return Ok(exact);

      const sameName = graph.toArray().filter((type) => type.name === name);
      if (sameName.length > 1) {
        return Err(`Type name ${name} is shared by ids ${sameName.map((type) => type.id).join(", ")}; query by id`);
      }

      const bySimpleName = graph.that(hasSimpleName(name));
      if (bySimpleName.length === 1) return Ok(bySimpleName[0]);
      if (bySimpleName.length > 1) {
        return Err(`Type name ${name} is ambiguous: ${bySimpleName.map(toName).join(", ")}`);
      }
      return Err(`Type not found: ${name}`);
    });
  }

  getHierarchy(name: string): Result<TypeHierarchy, string> {
    return this.withType<TypeHierarchy>(name, (type) =>
      Ok({
        type,
        superclasses: type.getAllSuperclasses(),
        subclasses: sortByName(type.getSubclasses()),
        allSubclasses: sortByName(type.getAllSubclasses()),
        enclosingType: type.getEnclosingType(),
      })
    );
  }

  /**
   * Look up a field, method or constructor ("<init>") by name and parameter
   * types. Without parameters a field is preferred, then a method with no
   * parameters.
   */
  getMember(typeName: string, memberName: string, parameters: string[] = []): Result<GraphMember, string> {
    return this.withType<GraphMember>(typeName, (type) => {
      if (parameters.length === 0) {
        const field = type.tryGetField(memberName);
        if (field) return Ok(field);
      }
      try {
        return Ok(type.getCodeUnit(memberName, ...parameters));
      } catch (error) {
        if (error instanceof MemberNotFoundError) return Err(error.message);
        throw error;
      }
    });
  }

  /**
   * Accesses anywhere in the graph whose target resolved to the given member.
   */
  getAccessesTo(member: GraphMember): Result<Access[], string> {
    return this.withGraph((graph) =>
      Ok(
        graph
          .toArray()
          .flatMap((type) => type.getDirectAccesses())
          .filter((access) => access.target.member === member)
      )
    );
  }

  getDependencies(
    name: string,
    direction: DependencyDirection,
    scope: DependencyScope
  ): Result<Dependency[], string> {
    return this.withType<Dependency[]>(name, (type) => {
      if (direction === "outgoing") {
        return Ok(scope === "direct" ? type.getDirectDependencies() : type.getAllDependencies());
      }
      const targets = scope === "direct" ? [type] : [type, ...sortByName(type.getAllSubclasses())];
      return this.withGraph<Dependency[]>((graph) => Ok(targets.flatMap((target) => graph.getDependenciesTo(target))));
    });
  }

  findCycles(): Result<GraphType[][], string> {
    return this.withGraph((graph) => Ok(graph.findDependencyCycles()));
  }

  private withGraph<T>(query: (graph: TypeGraph) => Result<T, string>): Result<T, string> {
    if (!this.current) return Err(NOT_LOADED);
    return query(this.current.graph);
  }

  private withType<T>(name: string, query: (type: GraphType) => Result<T, string>): Result<T, string> {
    const type = this.getType(name);
    return type.ok ? query(type.value) : type;
  }
}

function sortByName(types: Iterable<GraphType>): GraphType[] {
  return [...types].sort(byName);
}
