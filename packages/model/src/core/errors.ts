/**
 * Errors raised by the type graph.
 */

/**
 * A strict lookup matched zero or several candidates.
 */
export abstract class NotFoundError extends Error {
  constructor(
    /** What was searched for, e.g. "method charge(int)" */
    readonly query: string,
    /** Where it was searched, e.g. a type name */
    readonly scope: string,
    /** Names of everything that was searched */
    readonly candidates: readonly string[],
    readonly matchCount: number
  ) {
    super(
      matchCount === 0
        ? `No ${query} in ${scope}; searched [${candidates.join(", ")}]`
        : `${matchCount} candidates match ${query} in ${scope}; searched [${candidates.join(", ")}]`
    );
  }
}

export class MemberNotFoundError extends NotFoundError {
  override readonly name = "MemberNotFoundError";
}

export class TypeNotFoundError extends NotFoundError {
  override readonly name = "TypeNotFoundError";
}

/**
 * Malformed input from the introspection front-end.
 * Never recovered from inside the graph.
 */
export class ConstructionInvariantError extends Error {
  override readonly name = "ConstructionInvariantError";

  constructor(
    /** Short id of the violated invariant, e.g. "unique-type-id" */
    readonly invariant: string,
    message: string
  ) {
    super(message);
  }
}
