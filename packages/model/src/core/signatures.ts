/**
 * Member naming and signature conventions.
 */

import type { TypeId } from "./descriptors.js";

/** Reserved name of every constructor */
export const CONSTRUCTOR_NAME = "<init>";

/** Reserved name of the static initializer */
export const STATIC_INITIALIZER_NAME = "<clinit>";

export const VOID_TYPE: TypeId = "void";

export const RESERVED_NAMES: readonly string[] = [CONSTRUCTOR_NAME, STATIC_INITIALIZER_NAME];

export type MemberKind = "field" | "method" | "constructor" | "static_initializer";

export const MEMBER_KIND_LABELS: Record<MemberKind, string> = {
  field: "field",
  method: "method",
  constructor: "constructor",
  static_initializer: "static initializer",
};

export function sameParameters(a: readonly TypeId[], b: readonly TypeId[]): boolean {
  return a.length === b.length && a.every((parameter, i) => parameter === b[i]);
}

export function formatSignature(name: string, parameters: readonly TypeId[]): string {
  return `${name}(${parameters.join(", ")})`;
}
