/**
 * One analyzed class, interface or enum.
 *
 * Built in phase 1 from its descriptor alone; completion then links the
 * hierarchy and member accesses. Read-only afterwards.
 */

import type { Access, Call, ConstructorCall, FieldAccess, MethodCall } from "./accesses.js";
import { extractDependencies, type Dependency } from "./dependencies.js";
import type { TypeDescriptor, TypeId } from "./descriptors.js";
import { MemberNotFoundError } from "./errors.js";
import {
  GraphConstructor,
  GraphField,
  GraphMethod,
  GraphStaticInitializer,
  type GraphCodeUnit,
  type GraphMember,
} from "./members.js";
import type { ImportContext } from "./ports/ImportContext.js";
import { CONSTRUCTOR_NAME, formatSignature } from "./signatures.js";

export class GraphType {
  readonly id: TypeId;
  readonly name: string;
  readonly simpleName: string;
  readonly packageName: string;

  readonly fields: ReadonlySet<GraphField>;
  readonly methods: ReadonlySet<GraphMethod>;
  readonly constructors: ReadonlySet<GraphConstructor>;
  readonly staticInitializer: GraphStaticInitializer;
  /** Methods, constructors and the static initializer */
  readonly codeUnits: ReadonlySet<GraphCodeUnit>;

  /** Raw references, resolved during completion */
  readonly superclassRef: TypeId | null;
  readonly enclosingTypeRef: TypeId | null;

  private superclass: GraphType | null = null;
  private enclosingType: GraphType | null = null;
  private readonly subclasses = new Set<GraphType>();

  constructor(descriptor: TypeDescriptor) {
    this.id = descriptor.id;
    this.name = descriptor.name;
    this.simpleName = descriptor.simpleName;
    this.packageName = descriptor.packageName ?? "";
    this.superclassRef = descriptor.superclass ?? null;
    this.enclosingTypeRef = descriptor.enclosingType ?? null;

    this.fields = new Set(descriptor.fields.map((field) => new GraphField(this, field)));
    this.methods = new Set(descriptor.methods.map((method) => new GraphMethod(this, method)));
    this.constructors = new Set(
      descriptor.constructors.map((constructor) => new GraphConstructor(this, constructor))
    );
    this.staticInitializer = new GraphStaticInitializer(this);
    this.codeUnits = new Set<GraphCodeUnit>([
      ...this.methods,
      ...this.constructors,
      this.staticInitializer,
    ]);
  }

  // --- Hierarchy ---

  getSuperclass(): GraphType | null {
    return this.superclass;
  }

  getSubclasses(): ReadonlySet<GraphType> {
    return this.subclasses;
  }

  getEnclosingType(): GraphType | null {
    return this.enclosingType;
  }

  /**
   * This type followed by its superclasses, nearest first.
   */
  getClassHierarchy(): GraphType[] {
    return [this, ...this.getAllSuperclasses()];
  }

  /**
   * Superclasses sorted by distance, ending at the topmost analyzed one.
   */
  getAllSuperclasses(): GraphType[] {
    const result: GraphType[] = [];
    let current = this.superclass;
    while (current) {
      result.push(current);
      current = current.superclass;
    }
    return result;
  }

  getAllSubclasses(): ReadonlySet<GraphType> {
    const result = new Set<GraphType>();
    const pending: GraphType[] = [this];
    let next = pending.pop();
    while (next) {
      for (const subclass of next.subclasses) {
        if (result.has(subclass)) continue;
        result.add(subclass);
        pending.push(subclass);
      }
      next = pending.pop();
    }
    return result;
  }

  // --- Member lookup ---

  getField(name: string): GraphField {
    return this.requireUnique(this.fields, `field ${name}`, (field) => field.name === name);
  }

  tryGetField(name: string): GraphField | null {
    return unique(this.fields, (field) => field.name === name);
  }

  getMethod(name: string, ...parameters: TypeId[]): GraphMethod {
    return this.requireUnique(this.methods, `method ${formatSignature(name, parameters)}`, (method) =>
      method.hasSignature(name, parameters)
    );
  }

  tryGetMethod(name: string, ...parameters: TypeId[]): GraphMethod | null {
    return unique(this.methods, (method) => method.hasSignature(name, parameters));
  }

  getConstructor(...parameters: TypeId[]): GraphConstructor {
    return this.requireUnique(
      this.constructors,
      `constructor ${formatSignature(CONSTRUCTOR_NAME, parameters)}`,
      (constructor) => constructor.hasSignature(CONSTRUCTOR_NAME, parameters)
    );
  }

  tryGetConstructor(...parameters: TypeId[]): GraphConstructor | null {
    return unique(this.constructors, (constructor) =>
      constructor.hasSignature(CONSTRUCTOR_NAME, parameters)
    );
  }

  /**
   * Look up a method, constructor or the static initializer. Use
   * CONSTRUCTOR_NAME or STATIC_INITIALIZER_NAME for the latter two.
   */
  getCodeUnit(name: string, ...parameters: TypeId[]): GraphCodeUnit {
    return this.requireUnique(this.codeUnits, `code unit ${formatSignature(name, parameters)}`, (unit) =>
      unit.hasSignature(name, parameters)
    );
  }

  tryGetCodeUnit(name: string, ...parameters: TypeId[]): GraphCodeUnit | null {
    return unique(this.codeUnits, (unit) => unit.hasSignature(name, parameters));
  }

  private requireUnique<T extends GraphMember>(
    members: ReadonlySet<T>,
    query: string,
    matches: (member: T) => boolean
  ): T {
    const found = [...members].filter(matches);
    if (found.length !== 1) {
      throw new MemberNotFoundError(
        query,
        this.name,
        [...members].map((member) => member.fullName),
        found.length
      );
    }
    return found[0];
  }

  // --- Accesses ---

  getFieldAccesses(): FieldAccess[] {
    return [...this.codeUnits].flatMap((unit) => unit.getFieldAccesses());
  }

  getMethodCalls(): MethodCall[] {
    return [...this.codeUnits].flatMap((unit) => unit.getMethodCalls());
  }

  getConstructorCalls(): ConstructorCall[] {
    return [...this.codeUnits].flatMap((unit) => unit.getConstructorCalls());
  }

  getCalls(): Call[] {
    return [...this.getMethodCalls(), ...this.getConstructorCalls()];
  }

  /**
   * Accesses performed by this type's own code units.
   */
  getDirectAccesses(): Access[] {
    return [...this.getFieldAccesses(), ...this.getCalls()];
  }

  /**
   * Accesses performed anywhere in the class hierarchy, this type first.
   * Inherited accesses keep their declaring code unit as origin.
   */
  getAllAccesses(): Access[] {
    return this.getClassHierarchy().flatMap((type) => type.getDirectAccesses());
  }

  // --- Dependencies ---

  getDirectDependencies(): Dependency[] {
    return extractDependencies(this.getDirectAccesses());
  }

  /**
   * Dependencies of every type in the hierarchy. Each dependency's origin is
   * the type that declares the accessing code unit.
   */
  getAllDependencies(): Dependency[] {
    return extractDependencies(this.getAllAccesses());
  }

  // --- Completion ---

  /**
   * Link superclass and enclosing type. Registers this type as a subclass of
   * its resolved superclass, detaching it from a previous one if the
   * resolution changed.
   */
  completeHierarchy(context: ImportContext): void {
    const superclass = this.resolveRef(this.superclassRef, context);
    if (this.superclass && this.superclass !== superclass) {
      this.superclass.subclasses.delete(this);
    }
    this.superclass = superclass;
    superclass?.subclasses.add(this);

    this.enclosingType = this.resolveRef(this.enclosingTypeRef, context);
  }

  /**
   * Resolve the accesses of every code unit.
   * Expects completeHierarchy to have run for all types first, since
   * inherited access targets are searched along superclass chains.
   */
  completeMembers(context: ImportContext): void {
    for (const unit of this.codeUnits) {
      unit.completeFrom(context);
    }
  }

  private resolveRef(ref: TypeId | null, context: ImportContext): GraphType | null {
    if (ref === null) return null;
    const resolved = context.resolveType(ref);
    if (!resolved) {
      context.reportUnresolved(ref, this.name);
    }
    return resolved;
  }

  // --- Identity ---

  get hashKey(): TypeId {
    return this.id;
  }

  equals(other: unknown): boolean {
    return this === other || (other instanceof GraphType && other.id === this.id);
  }

  toString(): string {
    return `GraphType{${this.name}}`;
  }
}

function unique<T>(items: Iterable<T>, matches: (item: T) => boolean): T | null {
  let found: T | null = null;
  for (const item of items) {
    if (!matches(item)) continue;
    if (found !== null) return null;
    found = item;
  }
  return found;
}
