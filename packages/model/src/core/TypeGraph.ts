/**
 * The completed set of analyzed types of one import.
 */

import { dependencyTargets, type Dependency } from "./dependencies.js";
import type { TypeId } from "./descriptors.js";
import { TypeNotFoundError } from "./errors.js";
import type { GraphType } from "./GraphType.js";
import { byName, type TypePredicate } from "./predicates.js";

export class TypeGraph implements Iterable<GraphType> {
  private readonly byId = new Map<TypeId, GraphType>();
  private readonly byQualifiedName = new Map<string, GraphType[]>();

  constructor(types: Iterable<GraphType>) {
    for (const type of [...types].sort(byName)) {
      this.byId.set(type.id, type);
      const sameName = this.byQualifiedName.get(type.name);
      if (sameName) {
        sameName.push(type);
      } else {
        this.byQualifiedName.set(type.name, [type]);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  /** Types ordered by name */
  [Symbol.iterator](): Iterator<GraphType> {
    return this.byId.values();
  }

  toArray(): GraphType[] {
    return [...this.byId.values()];
  }

  getById(id: TypeId): GraphType {
    const type = this.byId.get(id);
    if (!type) {
      throw new TypeNotFoundError(`type with id ${id}`, "the type graph", [...this.byId.keys()], 0);
    }
    return type;
  }

  tryGetById(id: TypeId): GraphType | null {
    return this.byId.get(id) ?? null;
  }

  /**
   * Look up by qualified name. Fails when no type or several types with
   * distinct ids carry the name.
   */
  get(name: string): GraphType {
    const found = this.byQualifiedName.get(name) ?? [];
    if (found.length !== 1) {
      throw new TypeNotFoundError(
        `type ${name}`,
        "the type graph",
        [...this.byQualifiedName.keys()],
        found.length
      );
    }
    return found[0];
  }

  tryGet(name: string): GraphType | null {
    const found = this.byQualifiedName.get(name);
    return found && found.length === 1 ? found[0] : null;
  }

  contains(name: string): boolean {
    return this.byQualifiedName.has(name);
  }

  that(predicate: TypePredicate): GraphType[] {
    return this.toArray().filter(predicate);
  }

  /**
   * Direct dependencies of every type that point at the given type.
   */
  getDependenciesTo(target: GraphType): Dependency[] {
    return this.toArray().flatMap((type) =>
      type.getDirectDependencies().filter((dependency) => dependency.target.equals(target))
    );
  }

  /**
   * Cycles in the graph of direct type dependencies, found by depth-first
   * search in name order. Each cycle is a closed path: its first and last
   * entries are the same type.
   */
  findDependencyCycles(): GraphType[][] {
    const cycles: GraphType[][] = [];
    const visited = new Set<GraphType>();
    const onStack = new Set<GraphType>();
    const path: GraphType[] = [];
    // No recursion: chains can be thousands of types deep
    const frames: Array<{ type: GraphType; targets: GraphType[]; index: number }> = [];

    const enter = (type: GraphType): void => {
      visited.add(type);
      onStack.add(type);
      path.push(type);
      frames.push({
        type,
        targets: dependencyTargets(type.getDirectDependencies()).sort(byName),
        index: 0,
      });
    };

    for (const root of this.byId.values()) {
      if (visited.has(root)) continue;
      enter(root);

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (frame.index === frame.targets.length) {
          frames.pop();
          path.pop();
          onStack.delete(frame.type);
          continue;
        }

        const target = frame.targets[frame.index++];
        if (!visited.has(target)) {
          enter(target);
        } else if (onStack.has(target)) {
          cycles.push([...path.slice(path.indexOf(target)), target]);
        }
      }
    }
    return cycles;
  }
}
