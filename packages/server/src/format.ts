/**
 * Markdown lines for tool responses.
 */

import {
  GraphCodeUnit,
  GraphField,
  MEMBER_KIND_LABELS,
  formatSignature,
  toName,
  type Access,
  type Dependency,
  type GraphMember,
  type GraphType,
} from "@typegraph/model";

import type { LoadedGraph, TypeHierarchy } from "./TypeGraphService.js";

export const MAX_LIST_ITEMS = 50;

/**
 * Bullet list, cut off after `limit` items with a count of the rest.
 */
export function bulletList(items: string[], limit = MAX_LIST_ITEMS): string[] {
  if (items.length === 0) return ["- none"];
  const lines = items.slice(0, limit).map((item) => `- ${item}`);
  if (items.length > limit) {
    lines.push(`- ... (${items.length - limit} more)`);
  }
  return lines;
}

export function formatLoaded(loaded: LoadedGraph): string[] {
  const { source, stats, unresolved } = loaded;
  const lines = [
    `**Source:** ${source}`,
    `**Types:** ${stats.types}`,
    `**Code units:** ${stats.codeUnits}`,
    `**Accesses:** ${stats.accesses}`,
    `**Unresolved references:** ${stats.unresolvedReferences}`,
  ];
  if (unresolved.length > 0) {
    lines.push(
      "",
      "### Outside the codebase",
      ...bulletList(
        unresolved.map((reference) => `${reference.typeId} (from ${reference.referencedFrom.join(", ")})`)
      )
    );
  }
  return lines;
}

function describeSuperclass(type: GraphType): string {
  const superclass = type.getSuperclass();
  if (superclass) return superclass.name;
  return type.superclassRef ? `${type.superclassRef} (not analyzed)` : "none";
}

export function formatType(type: GraphType): string[] {
  const lines = [
    `**Id:** ${type.id}`,
    `**Simple name:** ${type.simpleName}`,
    `**Package:** ${type.packageName || "(default)"}`,
    `**Superclass:** ${describeSuperclass(type)}`,
  ];
  const enclosing = type.getEnclosingType();
  if (enclosing) {
    lines.push(`**Enclosing type:** ${enclosing.name}`);
  }

  lines.push(
    "",
    "### Fields",
    ...bulletList([...type.fields].map((field) => `${field.name}: ${field.type}`)),
    "",
    "### Methods",
    ...bulletList(
      [...type.methods].map((method) => `${formatSignature(method.name, method.parameters)}: ${method.returnType}`)
    ),
    "",
    "### Constructors",
    ...bulletList([...type.constructors].map((constructor) => formatSignature(constructor.name, constructor.parameters)))
  );
  return lines;
}

export function formatHierarchy(hierarchy: TypeHierarchy): string[] {
  const { type, superclasses, subclasses, allSubclasses, enclosingType } = hierarchy;
  const chain = [type, ...superclasses].map(toName).join(" -> ");
  const lines = [`**Chain:** ${chain}`];
  if (type.getSuperclass() === null && type.superclassRef) {
    lines.push(`**Superclass outside the codebase:** ${type.superclassRef}`);
  }
  if (enclosingType) {
    lines.push(`**Enclosing type:** ${enclosingType.name}`);
  }
  lines.push(
    "",
    "### Direct subclasses",
    ...bulletList(subclasses.map(toName)),
    "",
    "### All subclasses",
    ...bulletList(allSubclasses.map(toName))
  );
  return lines;
}

export function formatMember(member: GraphMember, accessedBy: Access[]): string[] {
  const lines = [`**Kind:** ${MEMBER_KIND_LABELS[member.kind]}`, `**Declared in:** ${member.owner.name}`];

  if (member instanceof GraphField) {
    lines.push(`**Type:** ${member.type}`);
  } else if (member instanceof GraphCodeUnit) {
    lines.push(
      `**Parameters:** ${member.parameters.join(", ") || "none"}`,
      `**Returns:** ${member.returnType}`,
      "",
      "### Accesses",
      ...bulletList(member.getAccesses().map((access) => access.description))
    );
  }

  lines.push("", "### Accessed by", ...bulletList(accessedBy.map((access) => access.description)));
  return lines;
}

export function formatDependencies(dependencies: Dependency[]): string[] {
  if (dependencies.length === 0) return ["No dependencies."];
  return [
    `Found ${dependencies.length} dependencies:`,
    "",
    ...bulletList(dependencies.map((dependency) => dependency.description)),
  ];
}

export function formatCycles(cycles: GraphType[][]): string[] {
  if (cycles.length === 0) return ["No dependency cycles."];
  return [
    `Found ${cycles.length} cycles:`,
    "",
    ...bulletList(cycles.map((cycle) => cycle.map(toName).join(" -> "))),
  ];
}
