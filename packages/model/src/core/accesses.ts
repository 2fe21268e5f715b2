/**
 * Accesses: one member of an analyzed type referencing another member.
 */

import type { MemberReference, TypeId } from "./descriptors.js";
import type { GraphType } from "./GraphType.js";
import type { GraphCodeUnit, GraphMember } from "./members.js";
import { CONSTRUCTOR_NAME, MEMBER_KIND_LABELS, formatSignature } from "./signatures.js";

export type AccessKind = "field_access" | "method_call" | "constructor_call";

export type FieldAccessType = "get" | "set";

export type TargetKind = "field" | "method" | "constructor";

/**
 * What an access points at. The owner is always an analyzed type; the member
 * is the declaration found in the owner's class hierarchy, or null when none
 * of the analyzed types along it declares one.
 */
export interface AccessTarget {
  readonly kind: TargetKind;
  readonly owner: GraphType;
  readonly name: string;
  readonly parameters: readonly TypeId[];
  readonly fullName: string;
  readonly member: GraphMember | null;
}

interface AccessBase {
  readonly origin: GraphCodeUnit;
  readonly target: AccessTarget;
  readonly lineNumber: number;
  /** e.g. "Method <shop.Order.charge()> calls method <shop.Customer.notify()> in line 13" */
  readonly description: string;
}

export interface FieldAccess extends AccessBase {
  readonly kind: "field_access";
  readonly accessType: FieldAccessType;
}

export interface MethodCall extends AccessBase {
  readonly kind: "method_call";
}

export interface ConstructorCall extends AccessBase {
  readonly kind: "constructor_call";
}

export type Access = FieldAccess | MethodCall | ConstructorCall;

export type Call = MethodCall | ConstructorCall;

function findInHierarchy(
  owner: GraphType,
  find: (type: GraphType) => GraphMember | null
): GraphMember | null {
  for (const type of owner.getClassHierarchy()) {
    const member = find(type);
    if (member) return member;
  }
  return null;
}

/**
 * Build the target of a raw member reference whose owner already resolved.
 * Fields and methods may be inherited, so the owner's superclasses are
 * searched too; constructors are never inherited.
 */
export function resolveAccessTarget(
  owner: GraphType,
  kind: TargetKind,
  reference: MemberReference
): AccessTarget {
  if (kind === "field") {
    return {
      kind,
      owner,
      name: reference.name,
      parameters: [],
      fullName: `${owner.name}.${reference.name}`,
      member: findInHierarchy(owner, (type) => type.tryGetField(reference.name)),
    };
  }

  const parameters = [...(reference.parameters ?? [])];
  const name = kind === "constructor" ? CONSTRUCTOR_NAME : reference.name;
  const member =
    kind === "constructor"
      ? owner.tryGetConstructor(...parameters)
      : findInHierarchy(owner, (type) => type.tryGetMethod(name, ...parameters));

  return {
    kind,
    owner,
    name,
    parameters,
    fullName: `${owner.name}.${formatSignature(name, parameters)}`,
    member,
  };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function describe(origin: GraphCodeUnit, verb: string, target: AccessTarget, lineNumber: number): string {
  return (
    `${capitalize(MEMBER_KIND_LABELS[origin.kind])} <${origin.fullName}> ${verb} ` +
    `${target.kind} <${target.fullName}> in line ${lineNumber}`
  );
}

export function createFieldAccess(
  origin: GraphCodeUnit,
  target: AccessTarget,
  accessType: FieldAccessType,
  lineNumber: number
): FieldAccess {
  return {
    kind: "field_access",
    accessType,
    origin,
    target,
    lineNumber,
    description: describe(origin, accessType === "get" ? "gets" : "sets", target, lineNumber),
  };
}

export function createMethodCall(origin: GraphCodeUnit, target: AccessTarget, lineNumber: number): MethodCall {
  return {
    kind: "method_call",
    origin,
    target,
    lineNumber,
    description: describe(origin, "calls", target, lineNumber),
  };
}

export function createConstructorCall(
  origin: GraphCodeUnit,
  target: AccessTarget,
  lineNumber: number
): ConstructorCall {
  return {
    kind: "constructor_call",
    origin,
    target,
    lineNumber,
    description: describe(origin, "calls", target, lineNumber),
  };
}
