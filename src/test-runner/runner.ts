import { TestSuite, TestCase, TestStep } from "../schema/test-schema.js";
import { parseDeclaration } from "../schema/bitfield-schema.js";
import { buildBitfieldType, BitfieldType } from "../runtime/bitfield-type.js";
import { Bitfield } from "../runtime/bitfield.js";

/**
 * Test Runner
 *
 * Runs table-driven suites in-process:
 * 1. Compiling the suite's declaration
 * 2. Creating a root value per test case
 * 3. Running each step (read / write) through key paths
 * 4. Comparing results with expected integers
 */

export interface TestResult {
  testSuite: string;
  passed: number;
  failed: number;
  failures: TestFailure[];
}

export interface TestFailure {
  description: string;
  step: number;
  type: "read" | "write";
  expected: string;
  actual: string;
  message: string;
}

/**
 * Run a test suite
 */
export function runTestSuite(suite: TestSuite): TestResult {
  const result: TestResult = {
    testSuite: suite.name,
    passed: 0,
    failed: 0,
    failures: [],
  };

  const type = buildBitfieldType(parseDeclaration(suite.schema), { name: suite.name });

  for (const testCase of suite.test_cases) {
    const failures = runTestCase(testCase, type);
    if (failures.length === 0) {
      result.passed++;
    } else {
      result.failed++;
      result.failures.push(...failures);
    }
  }

  return result;
}

/**
 * Run a single test case; an empty result means it passed
 */
export function runTestCase(testCase: TestCase, type: BitfieldType): TestFailure[] {
  const failures: TestFailure[] = [];
  const root = type.create(testCase.value);

  testCase.steps.forEach((step, index) => {
    try {
      const failure = runStep(root, step);
      if (failure) {
        failures.push({ description: testCase.description, step: index, ...failure });
      }
    } catch (error) {
      failures.push({
        description: testCase.description,
        step: index,
        type: step.op,
        expected: step.op === "read" ? String(step.expect) : String(step.expect_root),
        actual: "exception",
        message: `Exception: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

  return failures;
}

function runStep(root: Bitfield, step: TestStep): Omit<TestFailure, "description" | "step"> | undefined {
  const target = step.path.reduce<Bitfield>((current, key) => current.get(key), root);

  if (step.op === "read") {
    const actual = target.read();
    if (actual !== BigInt(step.expect)) {
      return {
        type: "read",
        expected: String(step.expect),
        actual: String(actual),
        message: `Value at ${formatPath(step.path)} does not match`,
      };
    }
    return undefined;
  }

  target.write(step.value);
  const actual = root.read();
  if (actual !== BigInt(step.expect_root)) {
    return {
      type: "write",
      expected: String(step.expect_root),
      actual: String(actual),
      message: `Root value after writing ${step.value} at ${formatPath(step.path)} does not match`,
    };
  }
  return undefined;
}

function formatPath(path: TestStep["path"]): string {
  return path.length === 0 ? "<root>" : path.map((key) => JSON.stringify(key)).join(" → ");
}

/**
 * Pretty print test results
 */
export function printTestResults(results: TestResult[]): void {
  let totalPassed = 0;
  let totalFailed = 0;

  for (const result of results) {
    totalPassed += result.passed;
    totalFailed += result.failed;

    console.log(`\n${result.testSuite}:`);
    console.log(`  ✓ ${result.passed} passed`);
    if (result.failed > 0) {
      console.log(`  ✗ ${result.failed} failed`);
      for (const failure of result.failures) {
        console.log(`    - ${failure.description} (step ${failure.step}): ${failure.message}`);
        console.log(`      expected ${failure.expected}, got ${failure.actual}`);
      }
    }
  }

  console.log(`\nTotal: ${totalPassed} passed, ${totalFailed} failed`);
}
