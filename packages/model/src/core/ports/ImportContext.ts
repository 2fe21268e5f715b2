import type { RawAccessDescriptor, TypeId } from "../descriptors.js";
import type { GraphType } from "../GraphType.js";
import type { GraphCodeUnit } from "../members.js";

/**
 * Port used during completion to resolve raw references against the types
 * built in phase 1.
 *
 * Implementations must be deterministic: one id always resolves to the same
 * GraphType, or always to null.
 */
export interface ImportContext {
  /**
   * @returns The built type for the id, or null when it lies outside the
   *          analyzed codebase
   */
  resolveType(id: TypeId): GraphType | null;

  /**
   * Raw accesses performed by a code unit, in source order.
   */
  rawAccessesOf(codeUnit: GraphCodeUnit): readonly RawAccessDescriptor[];

  /**
   * Record that a reference could not be resolved.
   *
   * @param id - The external type id
   * @param referencedFrom - Full name of the referencing type or member
   */
  reportUnresolved(id: TypeId, referencedFrom: string): void;
}

/**
 * A type id that no analyzed type answers to.
 */
export interface UnresolvedReference {
  typeId: TypeId;
  reason: "external";
  /** Full names of the types and members that reference it, sorted */
  referencedFrom: string[];
}
