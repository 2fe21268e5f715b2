import type { RawAccessDescriptor, TypeDescriptor, TypeId } from "../core/descriptors.js";
import type { GraphType } from "../core/GraphType.js";
import type { GraphCodeUnit } from "../core/members.js";
import type { ImportContext, UnresolvedReference } from "../core/ports/ImportContext.js";

/**
 * In-memory import context over the types built from a set of descriptors.
 * Raw accesses are read from the same descriptors the types came from.
 */
export class DescriptorImportContext implements ImportContext {
  private readonly accesses = new Map<GraphCodeUnit, readonly RawAccessDescriptor[]>();
  private readonly unresolved = new Map<TypeId, Set<string>>();

  constructor(
    private readonly types: ReadonlyMap<TypeId, GraphType>,
    descriptors: Iterable<TypeDescriptor>
  ) {
    for (const descriptor of descriptors) {
      const type = types.get(descriptor.id);
      if (!type) continue;

      for (const method of descriptor.methods) {
        this.register(type.tryGetMethod(method.name, ...method.parameters), method.accesses);
      }
      for (const constructor of descriptor.constructors) {
        this.register(type.tryGetConstructor(...constructor.parameters), constructor.accesses);
      }
      this.register(type.staticInitializer, descriptor.staticInitializer?.accesses);
    }
  }

  private register(unit: GraphCodeUnit | null, accesses: RawAccessDescriptor[] | undefined): void {
    if (unit && accesses && accesses.length > 0) {
      this.accesses.set(unit, accesses);
    }
  }

  resolveType(id: TypeId): GraphType | null {
    return this.types.get(id) ?? null;
  }

  rawAccessesOf(codeUnit: GraphCodeUnit): readonly RawAccessDescriptor[] {
    return this.accesses.get(codeUnit) ?? [];
  }

  reportUnresolved(id: TypeId, referencedFrom: string): void {
    const sources = this.unresolved.get(id);
    if (sources) {
      sources.add(referencedFrom);
    } else {
      this.unresolved.set(id, new Set([referencedFrom]));
    }
  }

  /**
   * Everything reported so far, sorted by type id.
   */
  getUnresolved(): UnresolvedReference[] {
    return [...this.unresolved.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([typeId, sources]) => ({
        typeId,
        reason: "external" as const,
        referencedFrom: [...sources].sort(),
      }));
  }
}
