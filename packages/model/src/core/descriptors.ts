/**
 * Raw descriptors produced by an introspection front-end.
 * Plain data: nothing here references another descriptor by object, only by TypeId.
 */

/**
 * Opaque handle of one raw type unit, usually its interned binary name.
 * Type identity, equality and hashing derive from it alone.
 */
export type TypeId = string;

export type RawAccessKind =
  | "get"        // field read
  | "set"        // field write
  | "call"       // method call
  | "construct"; // constructor call

/**
 * Reference to a member of some (possibly unanalyzed) type.
 * Parameters are ignored for field accesses.
 */
export interface MemberReference {
  owner: TypeId;
  name: string;
  parameters?: TypeId[];
}

export interface RawAccessDescriptor {
  kind: RawAccessKind;
  target: MemberReference;
  lineNumber: number;
}

export interface FieldDescriptor {
  name: string;
  type: TypeId;
}

export interface MethodDescriptor {
  name: string;
  parameters: TypeId[];
  returnType: TypeId;
  /** Accesses performed by the body, read at completion time */
  accesses?: RawAccessDescriptor[];
}

export interface ConstructorDescriptor {
  parameters: TypeId[];
  accesses?: RawAccessDescriptor[];
}

export interface StaticInitializerDescriptor {
  accesses?: RawAccessDescriptor[];
}

export interface TypeDescriptor {
  id: TypeId;
  /** Fully qualified name, e.g. "shop.billing.Invoice" */
  name: string;
  simpleName: string;
  /** Declaring package; absent or "" for the default package */
  packageName?: string;
  fields: FieldDescriptor[];
  methods: MethodDescriptor[];
  constructors: ConstructorDescriptor[];
  superclass?: TypeId;
  enclosingType?: TypeId;
  /** Present only when the static initializer performs accesses */
  staticInitializer?: StaticInitializerDescriptor;
}

/**
 * Document written by a front-end for one analyzed codebase.
 */
export interface CodebaseDescriptor {
  types: TypeDescriptor[];
}
