import type { Bitfield } from "../runtime/bitfield.js";
import { toBinary, toHex } from "../runtime/bits.js";

/**
 * Human-readable rendering of a bitfield and its mapped fields.
 *
 * Uses only the public surface (value, size, mask, entries), so it works the
 * same for roots and views:
 *
 * ```text
 * <255 == 0xFF == 0b11111111 & 0b11111111
 *   first  = <1 == 0x01 == 0b1 & 0b1>
 *   nested = <31 == 0x1F == 0b11111 & 0b11111
 *     inner = <1 == 0x01 == 0b1 & 0b1>
 *   >
 * >
 * ```
 */

export interface FormatOptions {
  /** Spaces per nesting level (default 2) */
  indentStep?: number;
  /** Deeper fields are rendered as a single summary line (default 8) */
  maxDepth?: number;
}

export function formatBitfield(source: Bitfield, options: FormatOptions = {}): string {
  const indentStep = options.indentStep ?? 2;
  const maxDepth = options.maxDepth ?? 8;
  return render(source, 0, indentStep, maxDepth);
}

/**
 * One-line `value == hex == binary & mask` summary without fields
 */
export function summarizeBitfield(source: Bitfield): string {
  const value = source.value;
  const hex = `0x${toHex(value, source.byteLength * 2)}`;
  const binary = `0b${toBinary(value, source.bitSize)}`;
  const mask = source.mask === null ? "" : ` & 0b${toBinary(source.mask, 0)}`;
  return `${value} == ${hex} == ${binary}${mask}`;
}

function render(source: Bitfield, depth: number, indentStep: number, maxDepth: number): string {
  const names = source.keys();
  if (names.length === 0 || depth >= maxDepth) {
    return `<${summarizeBitfield(source)}>`;
  }

  const width = Math.max(...names.map((name) => name.length));
  const lines = [`<${summarizeBitfield(source)}`];
  for (const [name, view] of source.entries()) {
    const rendered = render(view, depth + 1, indentStep, maxDepth);
    lines.push(`${indent(depth + 1, indentStep)}${name.padEnd(width)} = ${rendered}`);
  }
  lines.push(`${indent(depth, indentStep)}>`);
  return lines.join("\n");
}

function indent(depth: number, indentStep: number): string {
  return " ".repeat(depth * indentStep);
}
