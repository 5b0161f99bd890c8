import { z } from "zod";
import { BitfieldIndexError, BitfieldTypeError } from "../runtime/errors.js";
import { describeValue, spanMask } from "../runtime/bits.js";

/**
 * Bit Range Expressions
 *
 * Every way of naming a run of bits is normalized here into one canonical
 * half-open interval. Indexes count from bit 0 (least significant) upward;
 * there is no "from the end" indexing.
 */

// ============================================================================
// Expressions
// ============================================================================

/**
 * Half-open interval: bits start..end-1
 */
export interface BitRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Closed interval: bits first..last
 */
export interface InclusiveBitRange {
  readonly first: number;
  readonly last: number;
}

/**
 * A single bit index, a `[start, end)` pair, or an interval object
 */
export type RangeExpression = number | readonly [number, number] | BitRange | InclusiveBitRange;

/**
 * Highest bit position any range may reach (exclusive)
 */
export const MAX_BIT_INDEX = 1 << 24;

const BitIndexSchema = z.number().int();

/**
 * Shape of a range expression. Bounds are only checked for being integers
 * here; sign and ordering are checked by normalizeRange().
 */
export const RangeExpressionSchema = z.union([
  BitIndexSchema,
  z.tuple([BitIndexSchema, BitIndexSchema]),
  z.strictObject({ start: BitIndexSchema, end: BitIndexSchema }),
  z.strictObject({ first: BitIndexSchema, last: BitIndexSchema }),
]);

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize any range expression to a frozen `{ start, end }` pair.
 *
 * @throws BitfieldTypeError if the input is not a range expression
 * @throws BitfieldIndexError if a bound is negative or the range is empty/inverted
 */
export function normalizeRange(expression: unknown): BitRange {
  const parsed = RangeExpressionSchema.safeParse(expression);
  if (!parsed.success) {
    throw new BitfieldTypeError(`Unexpected range expression: ${describeValue(expression)}`);
  }

  const range = parsed.data;
  let start: number;
  let end: number;

  if (typeof range === "number") {
    start = range;
    end = range + 1;
  } else if (Array.isArray(range)) {
    [start, end] = range;
  } else if ("start" in range) {
    ({ start, end } = range);
  } else {
    start = range.first;
    end = range.last + 1;
  }

  if (start < 0 || end < 0) {
    throw new BitfieldIndexError(`Negative bit index in range ${formatBounds(start, end)}`);
  }
  if (end <= start) {
    throw new BitfieldIndexError(`Range ${formatBounds(start, end)} is empty or inverted`);
  }
  if (end > MAX_BIT_INDEX) {
    throw new BitfieldIndexError(`Range ${formatBounds(start, end)} reaches past bit ${MAX_BIT_INDEX}`);
  }

  return Object.freeze({ start, end });
}

export function rangeWidth(range: BitRange): number {
  return range.end - range.start;
}

/**
 * Bits covered by the range, in place
 */
export function rangeMask(range: BitRange): bigint {
  return spanMask(range.start, range.end);
}

export function formatRange(range: BitRange): string {
  return formatBounds(range.start, range.end);
}

function formatBounds(start: number, end: number): string {
  return `[${start}, ${end})`;
}
