/**
 * Reusable predicates, projections and orderings over types, so callers can
 * filter and sort type sets without reaching into GraphType.
 */

import type { TypeId } from "./descriptors.js";
import type { GraphType } from "./GraphType.js";

export type TypePredicate = (type: GraphType) => boolean;

export const hasTypeId =
  (id: TypeId): TypePredicate =>
  (type) =>
    type.id === id;

export const hasName =
  (name: string): TypePredicate =>
  (type) =>
    type.name === name;

export const hasSimpleName =
  (simpleName: string): TypePredicate =>
  (type) =>
    type.simpleName === simpleName;

/** Exact package match; "" selects the default package */
export const resideInPackage =
  (packageName: string): TypePredicate =>
  (type) =>
    type.packageName === packageName;

/** The package or any package below it, e.g. "shop" matches "shop.billing" */
export const resideInPackageTree =
  (packageName: string): TypePredicate =>
  (type) =>
    type.packageName === packageName || type.packageName.startsWith(`${packageName}.`);

/** Strict: a type is not its own subclass */
export const isSubclassOf =
  (superclass: GraphType): TypePredicate =>
  (type) =>
    type.getAllSuperclasses().some((candidate) => candidate.equals(superclass));

export const and =
  (...predicates: TypePredicate[]): TypePredicate =>
  (type) =>
    predicates.every((predicate) => predicate(type));

export const or =
  (...predicates: TypePredicate[]): TypePredicate =>
  (type) =>
    predicates.some((predicate) => predicate(type));

export const not =
  (predicate: TypePredicate): TypePredicate =>
  (type) =>
    !predicate(type);

export const toTypeId = (type: GraphType): TypeId => type.id;

export const toName = (type: GraphType): string => type.name;

/** Orders by qualified name, then id */
export function byName(a: GraphType, b: GraphType): number {
  return compare(a.name, b.name) || compare(a.id, b.id);
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
