/**
 * Phase 2: resolve cross-references once every type is built.
 */

import { ConstructionInvariantError } from "../errors.js";
import type { GraphType } from "../GraphType.js";
import type { ImportContext } from "../ports/ImportContext.js";

/**
 * Fail when following superclasses from any type revisits a type.
 */
export function assertAcyclicHierarchy(types: Iterable<GraphType>): void {
  const acyclic = new Set<GraphType>();
  for (const type of types) {
    const chain = new Set<GraphType>();
    let current: GraphType | null = type;
    while (current && !acyclic.has(current)) {
      if (chain.has(current)) {
        throw new ConstructionInvariantError(
          "acyclic-hierarchy",
          `Superclass chain of ${type.name} loops back to ${current.name}`
        );
      }
      chain.add(current);
      current = current.getSuperclass();
    }
    for (const checked of chain) {
      acyclic.add(checked);
    }
  }
}

/**
 * Complete all types: hierarchy links for every type first, then member
 * accesses, which search inherited members along the linked chains.
 * Safe to repeat with the same context.
 *
 * @throws ConstructionInvariantError when the superclass references form a cycle
 */
export function completeTypes(types: Iterable<GraphType>, context: ImportContext): void {
  const all = [...types];

  for (const type of all) {
    type.completeHierarchy(context);
  }
  assertAcyclicHierarchy(all);

  for (const type of all) {
    type.completeMembers(context);
  }
}
