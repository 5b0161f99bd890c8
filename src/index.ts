// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  BitfieldError,
  BitfieldIndexError,
  BitfieldTypeError,
  BitfieldValueError,
  BitfieldOverflowError,
  BitfieldSchemaError,
} from "./runtime/errors.js";
export type { BitfieldErrorKind } from "./runtime/errors.js";

// ─── Ranges ───────────────────────────────────────────────────────────────────
export { normalizeRange, rangeWidth, rangeMask, formatRange, RangeExpressionSchema, MAX_BIT_INDEX } from "./schema/range.js";
export type { BitRange, InclusiveBitRange, RangeExpression } from "./schema/range.js";

// ─── Declarations ─────────────────────────────────────────────────────────────
export {
  parseDeclaration,
  parseCompileOptions,
  CompileOptionsSchema,
  FIELD_NAME_PATTERN,
} from "./schema/bitfield-schema.js";
export type {
  BitfieldDeclaration,
  FieldDeclaration,
  NestedFieldDeclaration,
  ParsedDeclaration,
  ParsedField,
  CompileOptions,
} from "./schema/bitfield-schema.js";

// ─── Compiler ─────────────────────────────────────────────────────────────────
export { compileMapping, compileParsed, describeMapping, FieldTable } from "./schema/compiler.js";
export type {
  FieldSpec,
  TypeDescriptor,
  MappingEntry,
  MappingBlock,
  MappingDescription,
} from "./schema/compiler.js";

// ─── Values ───────────────────────────────────────────────────────────────────
export {
  BitfieldType,
  defineBitfield,
  buildBitfieldType,
  clearBitfieldTypeCache,
} from "./runtime/bitfield-type.js";
export { Bitfield, bitfield } from "./runtime/bitfield.js";
export type { BitfieldInput, BitfieldKey, BitfieldObject, IntegerLike } from "./runtime/bitfield.js";
export { parseInteger, bytesToBigInt } from "./runtime/bits.js";

// ─── State ────────────────────────────────────────────────────────────────────
export {
  restoreBitfield,
  serializeState,
  parseState,
  BitfieldStateSchema,
  SerializedBitfieldStateSchema,
} from "./runtime/state.js";
export type { BitfieldState, SerializedBitfieldState } from "./runtime/state.js";

// ─── Formatting ───────────────────────────────────────────────────────────────
export { formatBitfield, summarizeBitfield } from "./format/formatter.js";
export type { FormatOptions } from "./format/formatter.js";

// ─── Schema files ─────────────────────────────────────────────────────────────
export { parseBitfieldSource, loadBitfieldFile, BitfieldFileSchema } from "./schema/load.js";
export type { BitfieldFile } from "./schema/load.js";
