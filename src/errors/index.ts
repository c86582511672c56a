/**
 * Error types raised by containers and coordinates.
 *
 * Every error is thrown synchronously at the offending call; nothing is
 * retried or recovered inside the library.
 */

export type CoordinateErrorKind =
  | "construction" // Input could not be parsed, or has no usable order
  | "key_mismatch" // Binary op between containers with different key sets
  | "missing_key" // get() of an absent key
  | "validation" // A space's validation hook rejected the instance
  | "immutable"; // Attempted assignment into an instance

export class CoordinateError extends Error {
  readonly kind: CoordinateErrorKind;

  constructor(kind: CoordinateErrorKind, message: string) {
    super(message);
    this.name = "CoordinateError";
    this.kind = kind;
  }
}

export class ConstructionError extends CoordinateError {
  constructor(message: string) {
    super("construction", message);
    this.name = "ConstructionError";
  }
}

export class KeyMismatchError extends CoordinateError {
  constructor(
    message: string,
    readonly leftKeys: readonly string[],
    readonly rightKeys: readonly string[]
  ) {
    super("key_mismatch", message);
    this.name = "KeyMismatchError";
  }
}

export class MissingKeyError extends CoordinateError {
  constructor(
    readonly typeName: string,
    readonly key: string
  ) {
    super("missing_key", `'${typeName}' object has no key '${key}'`);
    this.name = "MissingKeyError";
  }
}

export class ValidationError extends CoordinateError {
  constructor(
    readonly typeName: string,
    readonly requiredKeys: readonly string[],
    readonly actualKeys: readonly string[]
  ) {
    super(
      "validation",
      `${typeName} needs keys [${requiredKeys.join(", ")}] and got [${actualKeys.join(", ")}]`
    );
    this.name = "ValidationError";
  }
}

export class ImmutableError extends CoordinateError {
  constructor(typeName: string) {
    super("immutable", `Items of ${typeName} cannot be set`);
    this.name = "ImmutableError";
  }
}
