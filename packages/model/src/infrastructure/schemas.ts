/**
 * zod schemas for the codebase descriptor JSON format.
 */

import * as z from "zod/v4";

const TypeIdSchema = z.string().min(1);

export const MemberReferenceSchema = z.object({
  owner: TypeIdSchema,
  name: z.string().min(1),
  parameters: z.array(TypeIdSchema).optional(),
});

export const RawAccessSchema = z.object({
  kind: z.enum(["get", "set", "call", "construct"]),
  target: MemberReferenceSchema,
  lineNumber: z.number().int().nonnegative(),
});

export const FieldSchema = z.object({
  name: z.string().min(1),
  type: TypeIdSchema,
});

export const MethodSchema = z.object({
  name: z.string().min(1),
  parameters: z.array(TypeIdSchema).default([]),
  returnType: TypeIdSchema.default("void"),
  accesses: z.array(RawAccessSchema).optional(),
});

export const ConstructorSchema = z.object({
  parameters: z.array(TypeIdSchema).default([]),
  accesses: z.array(RawAccessSchema).optional(),
});

/**
 * simpleName may be left out; it defaults to the last segment of the
 * qualified name after "." or "$".
 */
export const TypeDescriptorSchema = z
  .object({
    id: TypeIdSchema,
    name: z.string().min(1),
    simpleName: z.string().min(1).optional(),
    packageName: z.string().optional(),
    fields: z.array(FieldSchema).default([]),
    methods: z.array(MethodSchema).default([]),
    constructors: z.array(ConstructorSchema).default([]),
    superclass: TypeIdSchema.optional(),
    enclosingType: TypeIdSchema.optional(),
    staticInitializer: z.object({ accesses: z.array(RawAccessSchema).optional() }).optional(),
  })
  .transform((descriptor) => ({
    ...descriptor,
    simpleName: descriptor.simpleName ?? simpleNameOf(descriptor.name),
  }));

export const CodebaseDescriptorSchema = z.object({
  types: z.array(TypeDescriptorSchema),
});

export function simpleNameOf(qualifiedName: string): string {
  const cut = Math.max(qualifiedName.lastIndexOf("."), qualifiedName.lastIndexOf("$"));
  return qualifiedName.slice(cut + 1);
}
