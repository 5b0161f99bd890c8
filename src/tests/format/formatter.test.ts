import { describe, it, expect } from "vitest";
import { defineBitfield } from "../../runtime/bitfield-type.js";
import { bitfield } from "../../runtime/bitfield.js";
import { formatBitfield, summarizeBitfield } from "../../format/formatter.js";

const Nested = defineBitfield({ first: 0, nested: { _index_: [3, 8], inner: 0 } });

describe("summarizeBitfield", () => {
  it("shows decimal, hex, binary and mask", () => {
    expect(summarizeBitfield(defineBitfield({ _size_: 8 }).create(5))).toBe(
      "5 == 0x05 == 0b00000101 & 0b11111111"
    );
  });

  it("shows sparse masks as declared", () => {
    expect(summarizeBitfield(defineBitfield({ _mask_: 0b1010 }).create(10))).toBe(
      "10 == 0x0A == 0b1010 & 0b1010"
    );
  });

  it("omits the mask of unbounded values", () => {
    expect(summarizeBitfield(bitfield(5))).toBe("5 == 0x05 == 0b101");
    expect(summarizeBitfield(bitfield(0))).toBe("0 == 0x00 == 0b0");
    expect(summarizeBitfield(bitfield(0x1234))).toBe("4660 == 0x1234 == 0b1001000110100");
  });
});

describe("formatBitfield", () => {
  it("renders values without fields on one line", () => {
    expect(bitfield(5).toString()).toBe("<5 == 0x05 == 0b101>");
  });

  it("renders nested fields indented by depth", () => {
    expect(Nested.create(0xff).toString()).toBe(
      [
        "<255 == 0xFF == 0b11111111 & 0b11111111",
        "  first  = <1 == 0x01 == 0b1 & 0b1>",
        "  nested = <31 == 0x1F == 0b11111 & 0b11111",
        "    inner = <1 == 0x01 == 0b1 & 0b1>",
        "  >",
        ">",
      ].join("\n")
    );
  });

  it("renders views the same way", () => {
    expect(formatBitfield(Nested.create(0xf7).get("nested"))).toBe(
      ["<30 == 0x1E == 0b11110 & 0b11111", "  inner = <0 == 0x00 == 0b0 & 0b1>", ">"].join("\n")
    );
  });

  it("collapses fields past maxDepth", () => {
    expect(formatBitfield(Nested.create(0xff), { maxDepth: 1 })).toBe(
      [
        "<255 == 0xFF == 0b11111111 & 0b11111111",
        "  first  = <1 == 0x01 == 0b1 & 0b1>",
        "  nested = <31 == 0x1F == 0b11111 & 0b11111>",
        ">",
      ].join("\n")
    );
  });

  it("honors indentStep", () => {
    const lines = formatBitfield(Nested.create(0), { indentStep: 4 }).split("\n");
    expect(lines[1]).toBe("    first  = <0 == 0x00 == 0b0 & 0b1>");
    expect(lines[3]).toBe("        inner = <0 == 0x00 == 0b0 & 0b1>");
    expect(lines[4]).toBe("    >");
  });
});
