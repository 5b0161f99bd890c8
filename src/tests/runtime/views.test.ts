import { describe, it, expect } from "vitest";
import { defineBitfield } from "../../runtime/bitfield-type.js";
import { onesMask } from "../../runtime/bits.js";

const Register = defineBitfield({
  low: [0, 3],
  mid: [3, 7],
  high: [7, 12],
  nested: { _index_: [8, 16], a: [0, 2], b: [2, 8] },
});

const samples = [0n, 1n, 0x5a5an, 0xa5a5n, 0xffffn, 0x1234n];
const writes = [0n, 1n, 0x3n, 0xffn, 0x1234n];

describe("views", () => {
  it("read (root >> start) & ones(width)", () => {
    for (const sample of samples) {
      const root = Register.create(sample);
      for (const [name, [start, end]] of fieldRanges()) {
        const expected = (sample >> BigInt(start)) & onesMask(end - start);
        expect(root.get(name).read(), `${name} of ${sample}`).toBe(expected);
      }
    }
  });

  it("writes change exactly the targeted bits of the root", () => {
    for (const sample of samples) {
      for (const [name, [start, end]] of fieldRanges()) {
        for (const written of writes) {
          const root = Register.create(sample);
          root.get(name).write(written);

          const width = onesMask(end - start);
          const shift = BigInt(start);
          const expected = (sample & ~(width << shift)) | ((written & width) << shift);
          expect(root.read(), `${name} = ${written} over ${sample}`).toBe(expected);
        }
      }
    }
  });

  it("re-read the root after it changes", () => {
    const root = Register.create(0);
    const low = root.get("low");
    root.write(0b101);
    expect(low.read()).toBe(0b101n);
  });

  it("over the same bits observe each other", () => {
    const root = Register.create(0);
    const first = root.get("nested");
    const second = root.get([8, 16]);
    first.write(0xab);
    expect(second.read()).toBe(0xabn);
  });

  it("of overlapping fields alias the shared bits", () => {
    const root = Register.create(0);
    root.get("nested").get("a").write(0b11);
    expect(root.get("high").read()).toBe(0b110n);
    expect(root.read()).toBe(0x300n);
  });

  it("propagate through every level", () => {
    const Deep = defineBitfield({
      outer: { _index_: [4, 16], middle: { _index_: [2, 10], inner: [1, 3] } },
    });
    const root = Deep.create(0);
    const inner = root.get("outer").get("middle").get("inner");
    inner.write(0b11);
    // inner sits at 4 + 2 + 1 = bit 7 of the root
    expect(root.read()).toBe(0b11n << 7n);
    expect(root.get("outer").read()).toBe(0b11n << 3n);
    expect(root.get("outer").get("middle").read()).toBe(0b11n << 1n);
  });

  it("write range views of views", () => {
    const root = Register.create(0xffff);
    root.get("nested").get([0, 4]).write(0);
    expect(root.read()).toBe(0xf0ffn);
  });

  it("are flagged as views", () => {
    const root = Register.create(0);
    expect(root.isView).toBe(false);
    expect(root.get("low").isView).toBe(true);
    expect(root.get("low").copy().isView).toBe(false);
  });
});

describe("nested mapping", () => {
  const Nested = defineBitfield({ first: 0, nested: { _index_: [3, 8], inner: 0 } });

  it("reads each level", () => {
    const root = Nested.create(0xff);
    expect(root.read()).toBe(0xffn);
    expect(root.get("first").read()).toBe(1n);
    expect(root.get("nested").read()).toBe(0b11111n);
    expect(root.get("nested").get("inner").read()).toBe(1n);
  });

  it("clears bit 3 when the inner field is zeroed", () => {
    const root = Nested.create(0xff);
    root.get("nested").get("inner").write(0);
    expect(root.read()).toBe(0xf7n);
    expect(root.get("nested").read()).toBe(0b11110n);
  });

  it("leaves the root alone when a copy changes", () => {
    const root = Nested.create(0xff);
    const copy = root.get("nested").copy();
    copy.get("inner").write(0);
    expect(copy.read()).toBe(0b11110n);
    expect(root.read()).toBe(0xffn);
  });
});

function fieldRanges(): [string, readonly [number, number]][] {
  const result: [string, readonly [number, number]][] = [];
  for (const [name, entry] of Object.entries(Register.mapping)) {
    result.push([name, "_index_" in entry ? entry._index_ : entry]);
  }
  return result;
}
