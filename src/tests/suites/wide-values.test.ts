import { defineTestSuite } from "../../schema/test-schema.js";
import { registerTestSuite } from "../../test-runner/register.js";

/**
 * Test suite for values wider than 64 bits
 */
export const wideValuesTestSuite = defineTestSuite({
  name: "wide_values",
  description: "128-bit register split into two 64-bit halves",

  schema: {
    low: [0, 64],
    high: [64, 128],
  },

  test_cases: [
    {
      description: "reads both halves",
      value: 0x1_0000_0000_0000_0005n,
      steps: [
        { op: "read", path: ["low"], expect: 5 },
        { op: "read", path: ["high"], expect: 1 },
      ],
    },
    {
      description: "writes the high half",
      value: 5,
      steps: [
        { op: "write", path: ["high"], value: 0xffn, expect_root: 0xff_0000_0000_0000_0005n },
        { op: "read", path: ["low"], expect: 5 },
      ],
    },
    {
      description: "writes the top bit",
      value: 0,
      steps: [
        { op: "write", path: [127], value: 1, expect_root: 1n << 127n },
        { op: "read", path: ["high"], expect: 1n << 63n },
        { op: "read", path: [[120, 128]], expect: 0x80 },
      ],
    },
  ],
});

registerTestSuite(wideValuesTestSuite);
