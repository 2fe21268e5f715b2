/**
 * Phase 1: build a type from its own descriptor, without looking at any
 * other type.
 */

import type { TypeDescriptor, TypeId } from "../descriptors.js";
import { ConstructionInvariantError } from "../errors.js";
import { GraphType } from "../GraphType.js";
import { NO_OP_LISTENER, type TypeAnalysisListener } from "../ports/TypeAnalysisListener.js";
import { CONSTRUCTOR_NAME, RESERVED_NAMES, formatSignature } from "../signatures.js";

function isBlank(value: string | undefined): boolean {
  return typeof value !== "string" || value.trim() === "";
}

function assertDistinct<T>(
  items: T[],
  keyOf: (item: T) => string,
  invariant: string,
  describe: (item: T) => string
): void {
  const seen = new Set<string>();
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      throw new ConstructionInvariantError(invariant, describe(item));
    }
    seen.add(key);
  }
}

interface Signature {
  name: string;
  parameters: TypeId[];
}

/** Parameter names may contain ", ", so the key keeps the array structure */
function signatureKey({ name, parameters }: Signature): string {
  return JSON.stringify([name, parameters]);
}

/**
 * Validate a descriptor and build its type. The listener sees every method
 * and constructor before the type is constructed.
 *
 * @throws ConstructionInvariantError when the descriptor has no id or name,
 *         repeats a field name or code unit signature, or names a method
 *         with a reserved name
 */
export function buildType(
  descriptor: TypeDescriptor,
  listener: TypeAnalysisListener = NO_OP_LISTENER
): GraphType {
  if (isBlank(descriptor.id)) {
    throw new ConstructionInvariantError(
      "type-identity",
      `Type descriptor ${descriptor.name || "<unnamed>"} has no id`
    );
  }
  if (isBlank(descriptor.name)) {
    throw new ConstructionInvariantError("type-name", `Type descriptor ${descriptor.id} has no name`);
  }

  assertDistinct(
    descriptor.fields,
    (field) => field.name,
    "unique-field-name",
    (field) => `Field ${field.name} declared more than once in ${descriptor.name}`
  );

  for (const method of descriptor.methods) {
    if (RESERVED_NAMES.includes(method.name)) {
      throw new ConstructionInvariantError(
        "reserved-member-name",
        `Method ${method.name} of ${descriptor.name} uses a reserved name`
      );
    }
  }

  assertDistinct<Signature>(
    [
      ...descriptor.methods,
      ...descriptor.constructors.map((constructor) => ({
        name: CONSTRUCTOR_NAME,
        parameters: constructor.parameters,
      })),
    ],
    signatureKey,
    "unique-code-unit-signature",
    ({ name, parameters }) =>
      `Code unit ${formatSignature(name, parameters)} declared more than once in ${descriptor.name}`
  );

  for (const method of descriptor.methods) {
    listener.onMethodFound(method, descriptor);
  }
  for (const constructor of descriptor.constructors) {
    listener.onConstructorFound(constructor, descriptor);
  }

  return new GraphType(descriptor);
}
