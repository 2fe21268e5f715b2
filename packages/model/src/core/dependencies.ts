/**
 * Type-to-type dependencies derived from accesses.
 */

import type { Access } from "./accesses.js";
import type { GraphType } from "./GraphType.js";

/**
 * Directed edge between two distinct analyzed types, backed by one access.
 * Derived on demand, never stored.
 */
export interface Dependency {
  readonly origin: GraphType;
  readonly target: GraphType;
  /** The access this dependency was derived from */
  readonly access: Access;
  readonly description: string;
}

export function dependencyFromAccess(access: Access): Dependency {
  return {
    origin: access.origin.owner,
    target: access.target.owner,
    access,
    description: access.description,
  };
}

/**
 * One dependency per access that leaves its origin type, in input order.
 * Accesses a type makes to its own members are dropped; repeated accesses
 * between the same pair of types are kept.
 */
export function extractDependencies(accesses: Iterable<Access>): Dependency[] {
  const result: Dependency[] = [];
  for (const access of accesses) {
    if (access.target.owner.equals(access.origin.owner)) continue;
    result.push(dependencyFromAccess(access));
  }
  return result;
}

/**
 * Distinct target types of the given dependencies, in first-seen order.
 * Convenience for existence checks.
 */
export function dependencyTargets(dependencies: Iterable<Dependency>): GraphType[] {
  const seen = new Map<string, GraphType>();
  for (const dependency of dependencies) {
    if (!seen.has(dependency.target.id)) {
      seen.set(dependency.target.id, dependency.target);
    }
  }
  return [...seen.values()];
}
