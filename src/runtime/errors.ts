/**
 * Error classes raised by bit-range compilation, lookup and value operations.
 *
 * Every error carries a `kind` so callers can branch without instanceof
 * chains across module boundaries.
 */

export type BitfieldErrorKind = "index" | "type" | "value" | "overflow";

export class BitfieldError extends Error {
  readonly kind: BitfieldErrorKind;

  constructor(kind: BitfieldErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = this.constructor.name;
  }
}

/**
 * Negative or inverted ranges, unmapped field names, indexes outside the
 * declared size, and overlapping fields under `overlap: "reject"`.
 */
export class BitfieldIndexError extends BitfieldError {
  constructor(message: string) {
    super("index", message);
  }
}

/** A value, operand or key of the wrong type. */
export class BitfieldTypeError extends BitfieldError {
  constructor(message: string) {
    super("type", message);
  }
}

/** A well-typed value that is not acceptable (negative result, bad size/mask). */
export class BitfieldValueError extends BitfieldError {
  constructor(message: string) {
    super("value", message);
  }
}

/** An in-place result that does not fit the declared bit size. */
export class BitfieldOverflowError extends BitfieldError {
  constructor(message: string) {
    super("overflow", message);
  }
}

/**
 * Malformed declaration or persisted state.
 *
 * `issues` holds one `path: message` line per problem found, in input order.
 */
export class BitfieldSchemaError extends BitfieldValueError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message);
    this.issues = Object.freeze([...issues]);
  }
}
