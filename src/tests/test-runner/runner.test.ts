import { afterEach, describe, expect, it, vi } from "vitest";
import { defineTestSuite } from "../../schema/test-schema.js";
import { printTestResults, runTestSuite } from "../../test-runner/runner.js";

const brokenSuite = defineTestSuite({
  name: "broken",
  schema: { a: [0, 4] },
  test_cases: [
    {
      description: "passes",
      value: 5,
      steps: [{ op: "read", path: ["a"], expect: 5 }],
    },
    {
      description: "wrong read",
      value: 5,
      steps: [{ op: "read", path: ["a"], expect: 6 }],
    },
    {
      description: "wrong write",
      value: 0,
      steps: [
        { op: "read", path: [], expect: 0 },
        { op: "write", path: ["a"], value: 3, expect_root: 4 },
      ],
    },
    {
      description: "unknown field",
      value: 0,
      steps: [{ op: "read", path: ["nope"], expect: 0 }],
    },
  ],
});

describe("runTestSuite", () => {
  it("counts passing and failing cases", () => {
    const result = runTestSuite(brokenSuite);
    expect(result.testSuite).toBe("broken");
    expect(result.passed).toBe(1);
    expect(result.failed).toBe(3);
  });

  it("reports every mismatch", () => {
    const { failures } = runTestSuite(brokenSuite);
    expect(failures).toEqual([
      {
        description: "wrong read",
        step: 0,
        type: "read",
        expected: "6",
        actual: "5",
        message: 'Value at "a" does not match',
      },
      {
        description: "wrong write",
        step: 1,
        type: "write",
        expected: "4",
        actual: "3",
        message: 'Root value after writing 3 at "a" does not match',
      },
      {
        description: "unknown field",
        step: 0,
        type: "read",
        expected: "0",
        actual: "exception",
        message: "Exception: Field 'nope' is not mapped in broken",
      },
    ]);
  });
});

describe("defineTestSuite", () => {
  it("rejects cases without steps", () => {
    expect(() =>
      defineTestSuite({
        name: "empty",
        schema: { a: 0 },
        test_cases: [{ description: "nothing", value: 0, steps: [] }],
      })
    ).toThrow();
  });
});

describe("printTestResults", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints a summary per suite and a total", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    printTestResults([runTestSuite(brokenSuite)]);

    const lines = log.mock.calls.map((call) => call.join(" "));
    expect(lines[0]).toBe("\nbroken:");
    expect(lines[1]).toBe("  ✓ 1 passed");
    expect(lines[2]).toBe("  ✗ 3 failed");
    expect(lines[3]).toBe('    - wrong read (step 0): Value at "a" does not match');
    expect(lines[4]).toBe("      expected 6, got 5");
    expect(lines[lines.length - 1]).toBe("\nTotal: 1 passed, 3 failed");
  });
});
