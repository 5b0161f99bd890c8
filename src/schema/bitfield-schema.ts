import { z } from "zod";
import { BitfieldSchemaError } from "../runtime/errors.js";
import { describeValue } from "../runtime/bits.js";
import { MAX_BIT_INDEX, RangeExpression, RangeExpressionSchema } from "./range.js";

/**
 * Bitfield Declaration
 *
 * A declaration is an ordered mapping from field name to a bit range, or to a
 * nested block that carries its own `_index_` range plus sub-fields whose
 * offsets are relative to the block. Two reserved keys may appear at the top
 * level only: `_size_` (bit count) and `_mask_` (bit mask).
 *
 * ```ts
 * const Status = defineBitfield({
 *   ready: 0,
 *   mode: [1, 4],
 *   channel: { _index_: [4, 8], enabled: 0, gain: [1, 4] },
 *   _size_: 8,
 * });
 * ```
 */

// ============================================================================
// Declaration Types
// ============================================================================

/**
 * Nested block: `_index_` locates the block, the rest are its fields
 */
export interface NestedFieldDeclaration {
  readonly _index_: RangeExpression;
  readonly [field: string]: FieldDeclaration;
}

export type FieldDeclaration = RangeExpression | NestedFieldDeclaration;

export interface BitfieldDeclaration {
  readonly _size_?: number;
  readonly _mask_?: number | bigint;
  readonly [field: string]: FieldDeclaration | bigint | undefined;
}

/**
 * Validated, order-preserving form of a declaration.
 * Ranges are still raw expressions; the compiler normalizes them.
 */
export interface ParsedField {
  readonly name: string;
  readonly range: RangeExpression;
  readonly children?: readonly ParsedField[];
}

export interface ParsedDeclaration {
  readonly size?: number;
  readonly mask?: bigint;
  readonly fields: readonly ParsedField[];
}

// ============================================================================
// Shape Schemas
// ============================================================================

/**
 * Field names must be identifiers. Integer-like keys are excluded because
 * plain objects enumerate them ahead of every other key, which would lose
 * declaration order.
 */
export const FIELD_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

const DeclarationRecordSchema = z.record(z.string(), z.unknown());

export const SizeSchema = z.number().int().positive().max(MAX_BIT_INDEX);

export const MaskSchema = z.union([
  z.number().int().positive(),
  z.bigint().positive(),
]);

/**
 * Compile options
 *
 * - overlap: "allow" (default) accepts sibling fields sharing bits,
 *   "reject" raises on any intersection
 * - name: label used when formatting values of the type
 */
export const CompileOptionsSchema = z.object({
  overlap: z.enum(["allow", "reject"]).optional(),
  name: z.string().min(1).optional(),
});
export type CompileOptions = z.infer<typeof CompileOptionsSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate the shape of a declaration and return its ordered parsed form.
 *
 * Range bounds are not checked here (negative or inverted ranges surface as
 * index errors from the compiler).
 *
 * @throws BitfieldSchemaError listing every problem found
 */
export function parseDeclaration(input: unknown): ParsedDeclaration {
  const issues: string[] = [];
  const record = DeclarationRecordSchema.safeParse(input);
  if (!record.success) {
    throw new BitfieldSchemaError("Invalid bitfield declaration", [
      `<root>: expected a plain object, got ${describeValue(input)}`,
    ]);
  }

  let size: number | undefined;
  let mask: bigint | undefined;
  const fields: ParsedField[] = [];

  for (const [key, value] of Object.entries(record.data)) {
    if (key === "_size_") {
      const parsed = SizeSchema.safeParse(value);
      if (parsed.success) {
        size = parsed.data;
      } else {
        issues.push(`_size_: expected a positive integer up to ${MAX_BIT_INDEX}, got ${describeValue(value)}`);
      }
    } else if (key === "_mask_") {
      const parsed = MaskSchema.safeParse(value);
      if (parsed.success) {
        mask = BigInt(parsed.data);
      } else {
        issues.push(`_mask_: expected a positive integer, got ${describeValue(value)}`);
      }
    } else if (key === "_index_") {
      issues.push("_index_: reserved for nested blocks");
    } else {
      const field = parseField(key, value, key, issues);
      if (field) fields.push(field);
    }
  }

  if (issues.length > 0) {
    throw new BitfieldSchemaError("Invalid bitfield declaration", issues);
  }

  return { size, mask, fields };
}

function parseField(name: string, value: unknown, path: string, issues: string[]): ParsedField | undefined {
  if (!FIELD_NAME_PATTERN.test(name)) {
    issues.push(`${path}: field names must match ${FIELD_NAME_PATTERN}`);
    return undefined;
  }

  const range = RangeExpressionSchema.safeParse(value);
  if (range.success) {
    return { name, range: range.data };
  }

  const block = DeclarationRecordSchema.safeParse(value);
  if (!block.success || !("_index_" in block.data)) {
    issues.push(`${path}: expected a bit index, a [start, end] pair, an interval or a nested block with _index_, got ${describeValue(value)}`);
    return undefined;
  }

  const index = RangeExpressionSchema.safeParse(block.data._index_);
  if (!index.success) {
    issues.push(`${path}._index_: expected a range expression, got ${describeValue(block.data._index_)}`);
  }

  const children: ParsedField[] = [];
  for (const [key, child] of Object.entries(block.data)) {
    if (key === "_index_") continue;
    if (key.startsWith("_")) {
      issues.push(`${path}.${key}: reserved keys are not allowed inside a nested block`);
      continue;
    }
    const parsed = parseField(key, child, `${path}.${key}`, issues);
    if (parsed) children.push(parsed);
  }

  return index.success ? { name, range: index.data, children } : undefined;
}

/**
 * Validate compile options
 *
 * @throws BitfieldSchemaError on unknown values
 */
export function parseCompileOptions(input: unknown): CompileOptions {
  const parsed = CompileOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new BitfieldSchemaError("Invalid compile options", formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Render zod issues as `path: message` lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map((segment) => String(segment)).join(".");
    return `${path || "<root>"}: ${issue.message}`;
  });
}
