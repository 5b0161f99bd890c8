import { BitfieldIndexError, BitfieldValueError } from "../runtime/errors.js";
import { bitLength, onesMask, toBinary } from "../runtime/bits.js";
import {
  BitfieldDeclaration,
  CompileOptions,
  ParsedDeclaration,
  ParsedField,
  parseCompileOptions,
  parseDeclaration,
} from "./bitfield-schema.js";
import { BitRange, formatRange, normalizeRange, rangeMask, rangeWidth } from "./range.js";

/**
 * Mapping Compiler
 *
 * Turns a declaration into a frozen TypeDescriptor: resolved size and mask
 * plus the ordered tree of field ranges. Compilation is pure; memoization of
 * the result lives with BitfieldType.
 */

// ============================================================================
// Descriptor Types
// ============================================================================

/**
 * One compiled field. Children of a nested block are relative to `start`.
 */
export interface FieldSpec {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  readonly children?: ReadonlyMap<string, FieldSpec>;
}

/**
 * Compiled declaration.
 *
 * `size` and `mask` are both null only for an unbounded type (no fields and
 * no explicit size or mask): values are then stored unmasked.
 */
export interface TypeDescriptor {
  readonly size: number | null;
  readonly mask: bigint | null;
  readonly fields: ReadonlyMap<string, FieldSpec>;
}

/**
 * Introspection copy of a field mapping, in declaration order
 */
export type MappingEntry = readonly [number, number] | MappingBlock;

export interface MappingBlock {
  readonly _index_: readonly [number, number];
  readonly [field: string]: MappingEntry;
}

export interface MappingDescription {
  readonly [field: string]: MappingEntry;
}

// ============================================================================
// Field Table
// ============================================================================

/**
 * Read-only, ordered name → FieldSpec table. Descriptors are shared between
 * every user of a memoized type, so the backing map is never handed out.
 */
export class FieldTable implements ReadonlyMap<string, FieldSpec> {
  readonly #specs: Map<string, FieldSpec>;

  constructor(entries: Iterable<readonly [string, FieldSpec]> = []) {
    this.#specs = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#specs.size;
  }

  get(name: string): FieldSpec | undefined {
    return this.#specs.get(name);
  }

  has(name: string): boolean {
    return this.#specs.has(name);
  }

  keys() {
    return this.#specs.keys();
  }

  values() {
    return this.#specs.values();
  }

  entries() {
    return this.#specs.entries();
  }

  [Symbol.iterator]() {
    return this.#specs[Symbol.iterator]();
  }

  forEach(
    callback: (spec: FieldSpec, name: string, table: ReadonlyMap<string, FieldSpec>) => void,
    thisArg?: unknown
  ): void {
    for (const [name, spec] of this.#specs) {
      callback.call(thisArg, spec, name, this);
    }
  }
}

const EMPTY_FIELDS = new FieldTable();

// ============================================================================
// Compilation
// ============================================================================

/**
 * Compile a declaration.
 *
 * @throws BitfieldSchemaError for a malformed declaration
 * @throws BitfieldIndexError for negative/inverted ranges, fields outside the
 *         size, children outside their block, and (with overlap: "reject")
 *         intersecting siblings
 * @throws BitfieldValueError when an explicit mask does not fit an explicit size
 */
export function compileMapping(declaration: BitfieldDeclaration, options?: CompileOptions): TypeDescriptor {
  return compileParsed(parseDeclaration(declaration), parseCompileOptions(options));
}

/**
 * Compile an already validated declaration
 */
export function compileParsed(declaration: ParsedDeclaration, options: CompileOptions = {}): TypeDescriptor {
  const rejectOverlap = options.overlap === "reject";
  const { fields, union } = compileFields(declaration.fields, null, rejectOverlap, "");

  let size = declaration.size ?? null;
  let mask = declaration.mask ?? null;

  if (size !== null && mask !== null && bitLength(mask) > size) {
    throw new BitfieldValueError(
      `Mask 0b${toBinary(mask, 0)} needs ${bitLength(mask)} bits, more than the declared size of ${size} bits`
    );
  }

  if (size === null && mask !== null) {
    size = bitLength(mask);
  } else if (size === null && fields.size > 0) {
    size = bitLength(union);
  }

  if (mask === null && size !== null) {
    mask = onesMask(size);
  }

  if (size !== null) {
    for (const spec of fields.values()) {
      if (spec.end > size) {
        throw new BitfieldIndexError(
          `Field '${spec.name}' ${formatRange(spec)} does not fit in ${size} bits`
        );
      }
    }
  }

  return createDescriptor(size, mask, fields);
}

/**
 * Freeze a descriptor. Used by the compiler and for view types, whose size
 * and mask come from the parent instead of a declaration.
 */
export function createDescriptor(
  size: number | null,
  mask: bigint | null,
  fields: ReadonlyMap<string, FieldSpec> = EMPTY_FIELDS
): TypeDescriptor {
  const table = fields instanceof FieldTable ? fields : new FieldTable(fields);
  return Object.freeze({ size, mask, fields: table });
}

function compileFields(
  declared: readonly ParsedField[],
  width: number | null,
  rejectOverlap: boolean,
  prefix: string
): { fields: ReadonlyMap<string, FieldSpec>; union: bigint } {
  const fields = new Map<string, FieldSpec>();
  let union = 0n;

  for (const field of declared) {
    const path = `${prefix}${field.name}`;
    const range = normalizeRange(field.range);

    if (width !== null && range.end > width) {
      throw new BitfieldIndexError(
        `Field '${path}' ${formatRange(range)} does not fit in its ${width}-bit block`
      );
    }

    const bits = rangeMask(range);
    if (rejectOverlap && (union & bits) !== 0n) {
      throw new BitfieldIndexError(
        `Field '${path}' intersects other fields on bits ${listBits(union & bits).join(", ")}`
      );
    }
    union |= bits;

    fields.set(field.name, compileSpec(field, range, rejectOverlap, `${path}.`));
  }

  return { fields: new FieldTable(fields), union };
}

function compileSpec(field: ParsedField, range: BitRange, rejectOverlap: boolean, prefix: string): FieldSpec {
  if (field.children === undefined) {
    return Object.freeze({ name: field.name, start: range.start, end: range.end });
  }

  const { fields } = compileFields(field.children, rangeWidth(range), rejectOverlap, prefix);
  return Object.freeze({ name: field.name, start: range.start, end: range.end, children: fields });
}

function listBits(bits: bigint): number[] {
  const indexes: number[] = [];
  for (let index = 0; bits >> BigInt(index) !== 0n; index++) {
    if ((bits >> BigInt(index)) & 1n) {
      indexes.push(index);
    }
  }
  return indexes;
}

// ============================================================================
// Introspection
// ============================================================================

/**
 * Fresh, frozen `{ name → [start, end] | { _index_, ...children } }` copy of
 * the descriptor's fields. The result is itself a valid declaration.
 */
export function describeMapping(descriptor: TypeDescriptor): MappingDescription {
  return describeFields(descriptor.fields);
}

function describeFields(fields: ReadonlyMap<string, FieldSpec>): MappingDescription {
  const result: Record<string, MappingEntry> = {};
  for (const spec of fields.values()) {
    const index = Object.freeze([spec.start, spec.end] as const);
    if (spec.children === undefined) {
      result[spec.name] = index;
    } else {
      const block: MappingBlock = { _index_: index, ...describeFields(spec.children) };
      result[spec.name] = Object.freeze(block);
    }
  }
  return Object.freeze(result);
}

/**
 * Stable structural key of a field tree: equal keys mean equal mappings
 */
export function fieldsKey(fields: ReadonlyMap<string, FieldSpec>): string {
  const parts: string[] = [];
  for (const spec of fields.values()) {
    const children = spec.children === undefined ? "" : `{${fieldsKey(spec.children)}}`;
    parts.push(`${spec.name}:${spec.start}-${spec.end}${children}`);
  }
  return parts.join(",");
}

/**
 * Stable structural key of a whole descriptor
 */
export function descriptorKey(descriptor: TypeDescriptor): string {
  const size = descriptor.size ?? "*";
  const mask = descriptor.mask === null ? "*" : descriptor.mask.toString(16);
  return `${size}/${mask}/${fieldsKey(descriptor.fields)}`;
}
