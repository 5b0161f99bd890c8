import { BitfieldIndexError, BitfieldOverflowError, BitfieldTypeError, BitfieldValueError } from "./errors.js";
import { bitLength, bytesToBigInt, describeValue, onesMask, parseInteger, toBigInt } from "./bits.js";
import { BitRange, MAX_BIT_INDEX, RangeExpression, formatRange, normalizeRange, rangeWidth } from "../schema/range.js";
import type { FieldSpec, MappingDescription } from "../schema/compiler.js";
import { BitfieldType, rangeViewType, unboundedType, viewType } from "./bitfield-type.js";
import type { BitfieldState } from "./state.js";
import { formatBitfield } from "../format/formatter.js";

/**
 * Bitfield - one integer value seen through a compiled field mapping
 *
 * A root owns its value. A view (returned by get()) covers a bit range of
 * its parent: reads slice the parent's current value, writes merge into the
 * parent and from there into every ancestor. Views are not cached; any two
 * views over the same range of the same root observe the same bits.
 *
 * Roots and their views form one mutable aliasing group. Nothing here is
 * synchronized; sharing a group across workers is up to the caller.
 */

/** Accepted by construction: integer, numeral string, or big-endian bytes */
export type BitfieldInput = number | bigint | string | Uint8Array;

/** Accepted as the right-hand side of arithmetic and ordering */
export type IntegerLike = number | bigint | Bitfield;

/** Field name, bit index or range */
export type BitfieldKey = string | RangeExpression;

/** Plain snapshot of a mapped value: nested blocks become nested objects */
export interface BitfieldObject {
  [field: string]: bigint | BitfieldObject;
}

/**
 * Link from a view to the container it was sliced from.
 * Not a read-only back pointer: every write on the view is forwarded
 * through it.
 */
interface ParentLink {
  readonly owner: Bitfield;
  readonly offset: number;
  readonly mask: bigint;
}

export class Bitfield {
  readonly type: BitfieldType;
  private current: bigint;
  private readonly parent: ParentLink | undefined;

  private constructor(type: BitfieldType, value: bigint, parent?: ParentLink) {
    this.type = type;
    this.parent = parent;
    this.current = value;
  }

  /**
   * Create a root value of the given type.
   *
   * @throws BitfieldTypeError for non-integer numbers and unsupported inputs
   * @throws BitfieldValueError for malformed numerals, and negative values of an unbounded type
   */
  static create(type: BitfieldType, value: BitfieldInput = 0, base: number = 10): Bitfield {
    const root = new Bitfield(type, 0n);
    root.current = root.masked(coerceInput(value, base));
    return root;
  }

  // ==========================================================================
  // Value access
  // ==========================================================================

  /**
   * Current value. For a view this is re-read from the parent on every access.
   */
  get value(): bigint {
    if (this.parent !== undefined) {
      const { owner, offset, mask } = this.parent;
      this.current = (owner.value >> BigInt(offset)) & mask;
    }
    return this.current;
  }

  read(): bigint {
    return this.value;
  }

  /**
   * Replace the value. It is masked to this container's width first; on a
   * view only the covered bits of each ancestor change.
   *
   * @throws BitfieldTypeError if value is not an integer
   */
  write(value: number | bigint): this {
    this.store(this.masked(toBigInt(value, "value")));
    return this;
  }

  /**
   * @throws BitfieldOverflowError if the value is not a safe integer
   */
  toNumber(): number {
    const value = this.value;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new BitfieldOverflowError(`Value ${value} does not fit in a safe integer`);
    }
    return Number(value);
  }

  get size(): number | null {
    return this.type.size;
  }

  get mask(): bigint | null {
    return this.type.mask;
  }

  /** Declared size, or the bit length of the value for an unbounded type */
  get bitSize(): number {
    return this.type.size ?? bitLength(this.value);
  }

  /** Bytes needed for bitSize bits (at least 1) */
  get byteLength(): number {
    return Math.max(1, Math.ceil(this.bitSize / 8));
  }

  get isView(): boolean {
    return this.parent !== undefined;
  }

  get mapping(): MappingDescription {
    return this.type.mapping;
  }

  // ==========================================================================
  // View resolution
  // ==========================================================================

  /**
   * Resolve a field name, bit index or range to a view.
   *
   * @throws BitfieldIndexError for unmapped names and ranges outside the size
   * @throws BitfieldTypeError for keys that are neither names nor ranges
   */
  get(key: BitfieldKey): Bitfield {
    if (typeof key === "string") {
      const spec = this.lookupField(key);
      return this.slice(spec, (width, mask) => viewType(spec.name, width, mask, spec.children));
    }

    const range = normalizeRange(key);
    const size = this.type.size;
    if (size !== null && range.end > size) {
      throw new BitfieldIndexError(`Range ${formatRange(range)} is outside of ${size} bits`);
    }
    const name = `${this.type.name}[${range.start}:${range.end}]`;
    return this.slice(range, (width, mask) => rangeViewType(name, width, mask));
  }

  /**
   * Write through a key: same as `get(key).write(value)`.
   * Only the targeted bits change; `value` is masked to the range first.
   */
  set(key: BitfieldKey, value: number | bigint): this {
    const checked = toBigInt(value, "value");
    this.get(key).write(checked);
    return this;
  }

  has(name: string): boolean {
    return !name.startsWith("_") && this.type.descriptor.fields.has(name);
  }

  keys(): string[] {
    return this.type.fieldNames;
  }

  /**
   * Views of every mapped field, in declaration order
   */
  *entries(): IterableIterator<[string, Bitfield]> {
    for (const name of this.type.descriptor.fields.keys()) {
      yield [name, this.get(name)];
    }
  }

  /**
   * Snapshot of every mapped field's value; nested blocks become objects
   */
  toObject(): BitfieldObject {
    const result: BitfieldObject = {};
    for (const [name, view] of this.entries()) {
      result[name] = view.type.descriptor.fields.size > 0 ? view.toObject() : view.value;
    }
    return result;
  }

  private lookupField(name: string): FieldSpec {
    const spec = name.startsWith("_") ? undefined : this.type.descriptor.fields.get(name);
    if (spec === undefined) {
      throw new BitfieldIndexError(`Field '${name}' is not mapped in ${this.type.name}`);
    }
    return spec;
  }

  private slice(range: BitRange, typeOf: (width: number, mask: bigint) => BitfieldType): Bitfield {
    const width = rangeWidth(range);
    const offset = BigInt(range.start);
    const parentMask = this.type.mask;
    const mask = parentMask === null ? onesMask(width) : (parentMask >> offset) & onesMask(width);

    const type = typeOf(width, mask);
    return new Bitfield(type, (this.value >> offset) & mask, { owner: this, offset: range.start, mask });
  }

  // ==========================================================================
  // Propagation
  // ==========================================================================

  /**
   * Store an already masked value and merge it into every ancestor: clear
   * this view's bits in the parent, OR the new bits in, repeat upward.
   */
  private store(next: bigint): void {
    if (this.parent !== undefined) {
      const { owner, offset, mask } = this.parent;
      const shift = BigInt(offset);
      owner.store(owner.masked((owner.value & ~(mask << shift)) | (next << shift)));
    }
    this.current = next;
  }

  private masked(value: bigint): bigint {
    const mask = this.type.mask;
    if (mask !== null) {
      return value & mask;
    }
    if (value < 0n) {
      throw new BitfieldValueError(`Bitfield could not be negative: ${value}`);
    }
    return value;
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  /**
   * Sum as a new root of the same type. A result wider than the size wraps.
   *
   * @throws BitfieldValueError if the sum is negative
   */
  add(other: IntegerLike): Bitfield {
    return this.derive(this.checkedSum(operand(other, "add")));
  }

  /**
   * @throws BitfieldValueError if other is larger than this value
   */
  sub(other: IntegerLike): Bitfield {
    return this.derive(this.checkedSum(-operand(other, "sub")));
  }

  and(other: IntegerLike): Bitfield {
    return this.derive(this.value & operand(other, "and"));
  }

  or(other: IntegerLike): Bitfield {
    return this.derive(this.value | operand(other, "or"));
  }

  xor(other: IntegerLike): Bitfield {
    return this.derive(this.value ^ operand(other, "xor"));
  }

  /**
   * In-place sum. Unlike add(), a result wider than the size is an error.
   *
   * @throws BitfieldOverflowError if the result needs more than `size` bits
   * @throws BitfieldValueError if the result is negative
   */
  addInPlace(other: IntegerLike): this {
    return this.assignSum(operand(other, "add"));
  }

  subInPlace(other: IntegerLike): this {
    return this.assignSum(-operand(other, "sub"));
  }

  andInPlace(other: IntegerLike): this {
    this.store(this.masked(this.value & operand(other, "and")));
    return this;
  }

  orInPlace(other: IntegerLike): this {
    this.store(this.masked(this.value | operand(other, "or")));
    return this;
  }

  xorInPlace(other: IntegerLike): this {
    this.store(this.masked(this.value ^ operand(other, "xor")));
    return this;
  }

  // Results of these do not keep the field's meaning, so they are plain integers

  mul(other: IntegerLike): bigint {
    return this.value * operand(other, "mul");
  }

  /**
   * @throws BitfieldOverflowError if the result would reach past MAX_BIT_INDEX
   */
  shiftLeft(count: number | bigint): bigint {
    const shift = toBigInt(count, "shift count");
    if (this.value !== 0n && BigInt(bitLength(this.value)) + shift > BigInt(MAX_BIT_INDEX)) {
      throw new BitfieldOverflowError(`Shifting ${this.value} left by ${shift} reaches past bit ${MAX_BIT_INDEX}`);
    }
    return this.value << shift;
  }

  shiftRight(count: number | bigint): bigint {
    return this.value >> toBigInt(count, "shift count");
  }

  private checkedSum(delta: bigint): bigint {
    const result = this.value + delta;
    if (result < 0n) {
      throw new BitfieldValueError(`Bitfield could not be negative: ${this.value} + (${delta}) = ${result}`);
    }
    return result;
  }

  private assignSum(delta: bigint): this {
    const result = this.checkedSum(delta);
    const size = this.type.size;
    if (size !== null && bitLength(result) > size) {
      throw new BitfieldOverflowError(`Result value ${result} does not fit in ${size} bits`);
    }
    this.store(this.masked(result));
    return this;
  }

  private derive(value: bigint): Bitfield {
    return new Bitfield(this.type, this.masked(value));
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  /**
   * Value equality against integers and other bitfields. Another bitfield
   * must also have the same field mapping and byte length. Anything else is
   * simply not equal.
   */
  equals(other: unknown): boolean {
    if (typeof other === "bigint") {
      return this.value === other;
    }
    if (typeof other === "number") {
      return Number.isInteger(other) && this.value === BigInt(other);
    }
    if (other instanceof Bitfield) {
      return (
        this.value === other.value &&
        this.type.mappingKey === other.type.mappingKey &&
        this.byteLength === other.byteLength
      );
    }
    return false;
  }

  notEquals(other: unknown): boolean {
    return !this.equals(other);
  }

  /**
   * @throws BitfieldTypeError if other is not integer-like
   */
  compare(other: IntegerLike): -1 | 0 | 1 {
    const right = operand(other, "comparison");
    const left = this.value;
    return left < right ? -1 : left > right ? 1 : 0;
  }

  lt(other: IntegerLike): boolean {
    return this.compare(other) < 0;
  }

  le(other: IntegerLike): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: IntegerLike): boolean {
    return this.compare(other) > 0;
  }

  ge(other: IntegerLike): boolean {
    return this.compare(other) >= 0;
  }

  /**
   * Hash key from (value, size, mask); equal for interchangeable values
   */
  hash(): string {
    const size = this.type.size ?? "*";
    const mask = this.type.mask === null ? "*" : this.type.mask.toString(16);
    return `${this.value.toString(16)}/${size}/${mask}`;
  }

  // ==========================================================================
  // Copy and state
  // ==========================================================================

  /**
   * Detached copy: same type and value, no parent. Writes to the copy never
   * reach the original's ancestors.
   */
  copy(): Bitfield {
    return new Bitfield(this.type, this.value);
  }

  /**
   * Persisted state of a root.
   *
   * @throws BitfieldValueError on a view: its state only means something
   *         inside its owner
   */
  getState(): BitfieldState {
    if (this.parent !== undefined) {
      throw new BitfieldValueError("Views do not support state extraction; copy() the view first");
    }
    return Object.freeze({ value: this.current, size: this.type.size, mask: this.type.mask });
  }

  toString(): string {
    return formatBitfield(this);
  }

  toJSON(): string {
    return this.value.toString();
  }
}

/**
 * Ad-hoc value with no mapping, size or mask
 */
export function bitfield(value: BitfieldInput = 0, base: number = 10): Bitfield {
  return Bitfield.create(unboundedType(), value, base);
}

function coerceInput(value: BitfieldInput, base: number): bigint {
  if (typeof value === "string") {
    return parseInteger(value, base);
  }
  if (value instanceof Uint8Array) {
    return bytesToBigInt(value);
  }
  return toBigInt(value, "value");
}

function operand(other: unknown, operation: string): bigint {
  if (other instanceof Bitfield) {
    return other.value;
  }
  if (typeof other === "bigint" || (typeof other === "number" && Number.isSafeInteger(other))) {
    return BigInt(other);
  }
  throw new BitfieldTypeError(`Unsupported operand for ${operation}: ${describeValue(other)}`);
}
