import {
  BitfieldDeclaration,
  CompileOptions,
  ParsedDeclaration,
  parseCompileOptions,
  parseDeclaration,
} from "../schema/bitfield-schema.js";
import {
  FieldSpec,
  MappingDescription,
  TypeDescriptor,
  compileParsed,
  createDescriptor,
  describeMapping,
  descriptorKey,
  fieldsKey,
} from "../schema/compiler.js";
import { Bitfield, BitfieldInput } from "./bitfield.js";
import { restoreBitfield } from "./state.js";

/**
 * A reusable, compiled field set. Instances are created through the type and
 * share its descriptor.
 */
export class BitfieldType {
  readonly name: string;
  readonly descriptor: TypeDescriptor;

  /** Structural key of the descriptor; equal keys mean interchangeable types */
  readonly key: string;

  /** Structural key of the field tree only */
  readonly mappingKey: string;

  constructor(name: string, descriptor: TypeDescriptor) {
    this.name = name;
    this.descriptor = descriptor;
    this.key = descriptorKey(descriptor);
    this.mappingKey = fieldsKey(descriptor.fields);
  }

  get size(): number | null {
    return this.descriptor.size;
  }

  get mask(): bigint | null {
    return this.descriptor.mask;
  }

  /**
   * Frozen copy of the field mapping, in declaration order
   */
  get mapping(): MappingDescription {
    return describeMapping(this.descriptor);
  }

  get fieldNames(): string[] {
    return [...this.descriptor.fields.keys()];
  }

  /**
   * Create a root value.
   *
   * @param value - Integer, numeral string (read in `base`) or big-endian bytes
   * @param base - Base for string values; 0 detects it from a 0x/0o/0b prefix
   */
  create(value: BitfieldInput = 0, base: number = 10): Bitfield {
    return Bitfield.create(this, value, base);
  }

  /**
   * Create a root value from big-endian bytes (no byte reordering is done)
   */
  fromBytes(bytes: Uint8Array): Bitfield {
    return Bitfield.create(this, bytes);
  }

  /**
   * Restore a root value from its persisted state.
   * The state's size and mask must match this type.
   */
  fromState(state: unknown): Bitfield {
    return restoreBitfield(state, this);
  }

  /**
   * Structural equality (size, mask and field tree)
   */
  equals(other: BitfieldType): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `BitfieldType(${this.name})`;
  }
}

// ============================================================================
// Type Cache
// ============================================================================

const typeCache = new Map<string, BitfieldType>();

/**
 * Compile a declaration into a reusable type.
 *
 * Structurally identical declarations return the same BitfieldType.
 *
 * ```ts
 * const Header = defineBitfield({ version: [0, 4], flags: { _index_: [4, 8], ack: 0, syn: 1 } });
 * const header = Header.create(0x45);
 * header.get("version").read(); // 5n
 * ```
 */
export function defineBitfield(declaration: BitfieldDeclaration, options?: CompileOptions): BitfieldType {
  return buildBitfieldType(parseDeclaration(declaration), parseCompileOptions(options));
}

/**
 * Compile an already validated declaration into a reusable type
 */
export function buildBitfieldType(declaration: ParsedDeclaration, options: CompileOptions = {}): BitfieldType {
  const descriptor = compileParsed(declaration, options);
  return internType(options.name ?? "Bitfield", descriptor);
}

/**
 * Type of a view: size and mask come from the parent's slice,
 * fields from the nested block (if any)
 */
export function viewType(
  name: string,
  width: number,
  mask: bigint,
  fields?: ReadonlyMap<string, FieldSpec>
): BitfieldType {
  return internType(name, createDescriptor(width, mask, fields));
}

/**
 * Type of an ad-hoc range view. Not memoized.
 */
export function rangeViewType(name: string, width: number, mask: bigint): BitfieldType {
  return new BitfieldType(name, createDescriptor(width, mask));
}

/**
 * Type with neither size nor mask: values are stored as given
 */
export function unboundedType(): BitfieldType {
  return internType("Bitfield", createDescriptor(null, null));
}

/**
 * Type from a persisted size/mask pair, without fields. Not memoized.
 */
export function detachedType(size: number | null, mask: bigint | null): BitfieldType {
  return new BitfieldType("Bitfield", createDescriptor(size, mask));
}

export function clearBitfieldTypeCache(): void {
  typeCache.clear();
}

function internType(name: string, descriptor: TypeDescriptor): BitfieldType {
  const cacheKey = `${name}#${descriptorKey(descriptor)}`;
  const cached = typeCache.get(cacheKey);
  if (cached) {
    return cached;
  }
  const type = new BitfieldType(name, descriptor);
  typeCache.set(cacheKey, type);
  return type;
}
