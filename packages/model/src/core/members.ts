/**
 * Members of a type: fields and code units (methods, constructors and the
 * synthetic static initializer).
 */

import {
  createConstructorCall,
  createFieldAccess,
  createMethodCall,
  resolveAccessTarget,
  type Access,
  type ConstructorCall,
  type FieldAccess,
  type MethodCall,
} from "./accesses.js";
import type {
  ConstructorDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  TypeId,
} from "./descriptors.js";
import type { GraphType } from "./GraphType.js";
import type { ImportContext } from "./ports/ImportContext.js";
import {
  CONSTRUCTOR_NAME,
  MEMBER_KIND_LABELS,
  STATIC_INITIALIZER_NAME,
  VOID_TYPE,
  formatSignature,
  sameParameters,
  type MemberKind,
} from "./signatures.js";

export abstract class GraphMember {
  abstract readonly kind: MemberKind;

  protected constructor(
    /** Declaring type, fixed at construction */
    readonly owner: GraphType,
    readonly name: string
  ) {}

  /** Owner-qualified name, e.g. "shop.Order.total" or "shop.Order.charge(int)" */
  abstract get fullName(): string;

  toString(): string {
    return `${MEMBER_KIND_LABELS[this.kind]}<${this.fullName}>`;
  }
}

export class GraphField extends GraphMember {
  readonly kind = "field";
  readonly type: TypeId;

  constructor(owner: GraphType, descriptor: FieldDescriptor) {
    super(owner, descriptor.name);
    this.type = descriptor.type;
  }

  get fullName(): string {
    return `${this.owner.name}.${this.name}`;
  }
}

/**
 * A member with a body. Its accesses are empty until completion.
 */
export abstract class GraphCodeUnit extends GraphMember {
  abstract override readonly kind: Exclude<MemberKind, "field">;
  readonly parameters: readonly TypeId[];
  readonly returnType: TypeId;

  private fieldAccesses: readonly FieldAccess[] = [];
  private methodCalls: readonly MethodCall[] = [];
  private constructorCalls: readonly ConstructorCall[] = [];

  protected constructor(
    owner: GraphType,
    name: string,
    parameters: readonly TypeId[],
    returnType: TypeId
  ) {
    super(owner, name);
    this.parameters = [...parameters];
    this.returnType = returnType;
  }

  get fullName(): string {
    return `${this.owner.name}.${formatSignature(this.name, this.parameters)}`;
  }

  hasSignature(name: string, parameters: readonly TypeId[]): boolean {
    return this.name === name && sameParameters(this.parameters, parameters);
  }

  getFieldAccesses(): readonly FieldAccess[] {
    return this.fieldAccesses;
  }

  getMethodCalls(): readonly MethodCall[] {
    return this.methodCalls;
  }

  getConstructorCalls(): readonly ConstructorCall[] {
    return this.constructorCalls;
  }

  getCalls(): Array<MethodCall | ConstructorCall> {
    return [...this.methodCalls, ...this.constructorCalls];
  }

  getAccesses(): Access[] {
    return [...this.fieldAccesses, ...this.getCalls()];
  }

  /**
   * Resolve this unit's raw accesses through the context.
   * Replaces previous results, so completing twice yields the same accesses.
   * Accesses whose target owner is outside the analyzed codebase are
   * reported to the context and left out.
   */
  completeFrom(context: ImportContext): void {
    const fieldAccesses: FieldAccess[] = [];
    const methodCalls: MethodCall[] = [];
    const constructorCalls: ConstructorCall[] = [];

    for (const raw of context.rawAccessesOf(this)) {
      const owner = context.resolveType(raw.target.owner);
      if (!owner) {
        context.reportUnresolved(raw.target.owner, this.fullName);
        continue;
      }

      switch (raw.kind) {
        case "get":
        case "set":
          fieldAccesses.push(
            createFieldAccess(this, resolveAccessTarget(owner, "field", raw.target), raw.kind, raw.lineNumber)
          );
          break;
        case "call":
          methodCalls.push(
            createMethodCall(this, resolveAccessTarget(owner, "method", raw.target), raw.lineNumber)
          );
          break;
        case "construct":
          constructorCalls.push(
            createConstructorCall(
              this,
              resolveAccessTarget(owner, "constructor", raw.target),
              raw.lineNumber
            )
          );
          break;
      }
    }

    this.fieldAccesses = fieldAccesses;
    this.methodCalls = methodCalls;
    this.constructorCalls = constructorCalls;
  }
}

export class GraphMethod extends GraphCodeUnit {
  readonly kind = "method";

  constructor(owner: GraphType, descriptor: MethodDescriptor) {
    super(owner, descriptor.name, descriptor.parameters, descriptor.returnType);
  }
}

export class GraphConstructor extends GraphCodeUnit {
  readonly kind = "constructor";

  constructor(owner: GraphType, descriptor: ConstructorDescriptor) {
    super(owner, CONSTRUCTOR_NAME, descriptor.parameters, owner.id);
  }
}

/**
 * Exactly one per type, present even when the type declares no static code.
 */
export class GraphStaticInitializer extends GraphCodeUnit {
  readonly kind = "static_initializer";

  constructor(owner: GraphType) {
    super(owner, STATIC_INITIALIZER_NAME, [], VOID_TYPE);
  }
}
