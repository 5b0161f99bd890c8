import { defineTestSuite } from "../../schema/test-schema.js";
import { registerTestSuite } from "../../test-runner/register.js";

/**
 * Test suite for a mask with holes
 *
 * Mask 0b1101: bit 1 never holds a value
 */
export const sparseMaskTestSuite = defineTestSuite({
  name: "sparse_mask",
  description: "Explicit mask narrower than the fields",

  schema: {
    lo: [0, 2],
    hi: [2, 4],
    _mask_: 0b1101,
  },

  test_cases: [
    {
      description: "construction applies the mask",
      value: 0xf,
      steps: [
        { op: "read", path: [], expect: 0b1101 },
        { op: "read", path: ["lo"], expect: 0b01 },
        { op: "read", path: ["hi"], expect: 0b11 },
      ],
    },
    {
      description: "writes through fields skip the masked-out bit",
      value: 0,
      steps: [
        { op: "write", path: ["lo"], value: 3, expect_root: 0b0001 },
        { op: "write", path: ["hi"], value: 3, expect_root: 0b1101 },
        { op: "write", path: [1], value: 1, expect_root: 0b1101 },
      ],
    },
  ],
});

registerTestSuite(sparseMaskTestSuite);
