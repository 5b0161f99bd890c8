import { defineTestSuite } from "../../schema/test-schema.js";
import { registerTestSuite } from "../../test-runner/register.js";

/**
 * Test suite for fields sharing bits
 *
 * word = bits 0..7, upper = bits 4..7, flag = bit 7
 */
export const overlappingFieldsTestSuite = defineTestSuite({
  name: "overlapping_fields",
  description: "Sibling fields that alias the same bits",

  schema: {
    word: [0, 8],
    upper: [4, 8],
    flag: 7,
  },

  test_cases: [
    {
      description: "setting flag shows up in word and upper",
      value: 0,
      steps: [
        { op: "write", path: ["flag"], value: 1, expect_root: 0x80 },
        { op: "read", path: ["upper"], expect: 0b1000 },
        { op: "read", path: ["word"], expect: 0x80 },
      ],
    },
    {
      description: "clearing upper clears flag",
      value: 0xff,
      steps: [
        { op: "write", path: ["upper"], value: 0, expect_root: 0x0f },
        { op: "read", path: ["flag"], expect: 0 },
      ],
    },
  ],
});

registerTestSuite(overlappingFieldsTestSuite);
