import { readFileSync } from "fs";
import { resolve } from "path";
import JSON5 from "json5";
import { z } from "zod";
import { BitfieldSchemaError } from "../runtime/errors.js";
import { BitfieldType, buildBitfieldType } from "../runtime/bitfield-type.js";
import { formatZodIssues, parseDeclaration } from "./bitfield-schema.js";

/**
 * Schema files
 *
 * A schema file is JSON5 so registers can be written with hex literals and
 * comments:
 *
 * ```json5
 * {
 *   name: "StatusRegister",
 *   config: { overlap: "reject" },
 *   fields: {
 *     ready: 0,
 *     mode: [1, 4],
 *     channel: { _index_: [4, 8], enabled: 0, gain: [1, 4] },
 *     _mask_: 0xFF,
 *   },
 * }
 * ```
 *
 * `fields` holds a declaration exactly as passed to defineBitfield().
 */

export const BitfieldFileSchema = z.strictObject({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  config: z
    .strictObject({
      overlap: z.enum(["allow", "reject"]).optional(),
    })
    .optional(),
  fields: z.record(z.string(), z.unknown()),
});
export type BitfieldFile = z.infer<typeof BitfieldFileSchema>;

/**
 * Parse JSON5 source text into a compiled type
 *
 * @param origin - Shown in error messages (file path or "<inline>")
 * @throws BitfieldSchemaError for syntax errors and malformed content
 */
export function parseBitfieldSource(source: string, origin: string = "<inline>"): BitfieldType {
  let raw: unknown;
  try {
    raw = JSON5.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BitfieldSchemaError(`Invalid schema file ${origin}`, [message]);
  }

  const file = BitfieldFileSchema.safeParse(raw);
  if (!file.success) {
    throw new BitfieldSchemaError(`Invalid schema file ${origin}`, formatZodIssues(file.error));
  }

  const { name, config, fields } = file.data;
  return buildBitfieldType(parseDeclaration(fields), { name, overlap: config?.overlap });
}

/**
 * Read and compile a schema file (relative paths resolve against the cwd)
 */
export function loadBitfieldFile(schemaPath: string): BitfieldType {
  const absolute = resolve(process.cwd(), schemaPath);
  const source = readFileSync(absolute, "utf-8");
  return parseBitfieldSource(source, absolute);
}
