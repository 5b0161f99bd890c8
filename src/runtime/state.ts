import { z } from "zod";
import { BitfieldSchemaError, BitfieldValueError } from "./errors.js";
import { bitLength } from "./bits.js";
import { formatZodIssues } from "../schema/bitfield-schema.js";
import type { Bitfield } from "./bitfield.js";
import { BitfieldType, detachedType, unboundedType } from "./bitfield-type.js";

/**
 * Persisted State
 *
 * The `{ value, size, mask }` triple of a detached (root) value. Views have no
 * persisted state; there is no field for a parent and strict parsing rejects
 * one.
 */

export interface BitfieldState {
  readonly value: bigint;
  readonly size: number | null;
  readonly mask: bigint | null;
}

/**
 * JSON-safe form: bigints as decimal strings
 */
export interface SerializedBitfieldState {
  readonly value: string;
  readonly size: number | null;
  readonly mask: string | null;
}

const SizeOrNullSchema = z.number().int().positive().nullable();

export const BitfieldStateSchema = z
  .strictObject({
    value: z.bigint().nonnegative(),
    size: SizeOrNullSchema,
    mask: z.bigint().positive().nullable(),
  })
  .superRefine((state, ctx) => {
    if ((state.size === null) !== (state.mask === null)) {
      ctx.addIssue({ code: "custom", message: "size and mask must both be set or both be null", path: ["mask"] });
      return;
    }
    if (state.size !== null && state.mask !== null && bitLength(state.mask) > state.size) {
      ctx.addIssue({ code: "custom", message: `mask does not fit in ${state.size} bits`, path: ["mask"] });
    }
    if (state.mask !== null && (state.value & ~state.mask) !== 0n) {
      ctx.addIssue({ code: "custom", message: "value has bits outside of the mask", path: ["value"] });
    }
  });

const DecimalSchema = z.string().regex(/^\d+$/, "expected a decimal integer string");

export const SerializedBitfieldStateSchema = z.strictObject({
  value: DecimalSchema,
  size: SizeOrNullSchema,
  mask: DecimalSchema.nullable(),
});

/**
 * Rebuild a root value from its persisted state.
 *
 * Without a type the result is unmapped but has exactly the persisted size
 * and mask. With a type, the state's size and mask must match the type's.
 *
 * @throws BitfieldSchemaError for anything that is not a valid state triple
 * @throws BitfieldValueError if the state does not belong to `type`
 */
export function restoreBitfield(state: unknown, type?: BitfieldType): Bitfield {
  const parsed = BitfieldStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new BitfieldSchemaError("Invalid bitfield state", formatZodIssues(parsed.error));
  }
  const { value, size, mask } = parsed.data;

  if (type !== undefined && (type.size !== size || type.mask !== mask)) {
    throw new BitfieldValueError(
      `State (size ${size ?? "unbounded"}, mask ${mask?.toString(16) ?? "none"}) does not match type ${type.name}`
    );
  }

  const target = type ?? (size === null ? unboundedType() : detachedType(size, mask));
  return target.create(value);
}

export function serializeState(state: BitfieldState): SerializedBitfieldState {
  return {
    value: state.value.toString(),
    size: state.size,
    mask: state.mask === null ? null : state.mask.toString(),
  };
}

/**
 * Parse the JSON-safe form back into a state
 *
 * @throws BitfieldSchemaError for malformed input
 */
export function parseState(input: unknown): BitfieldState {
  const parsed = SerializedBitfieldStateSchema.safeParse(input);
  if (!parsed.success) {
    throw new BitfieldSchemaError("Invalid serialized bitfield state", formatZodIssues(parsed.error));
  }
  const { value, size, mask } = parsed.data;
  return { value: BigInt(value), size, mask: mask === null ? null : BigInt(mask) };
}
