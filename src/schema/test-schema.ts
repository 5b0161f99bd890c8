import { z } from "zod";
import { RangeExpressionSchema } from "./range.js";

/**
 * Test Case Schema
 *
 * Table-driven tests for declarations. Each case builds a root value and runs
 * an ordered list of steps against it: reads through a key path, writes
 * through a key path, and checks of the root value after each write.
 */

const IntegerSchema = z.union([z.number().int(), z.bigint()]);

/**
 * One key in a path: field name, bit index or range
 */
const KeySchema = z.union([z.string(), RangeExpressionSchema]);

/**
 * Single step. `path` is resolved from the root with successive get() calls;
 * an empty path means the root itself.
 */
export const TestStepSchema = z.discriminatedUnion("op", [
  z.object({
    op: z.literal("read"),
    path: z.array(KeySchema),
    expect: IntegerSchema,
  }),
  z.object({
    op: z.literal("write"),
    path: z.array(KeySchema),
    value: IntegerSchema,
    // Root value after the write
    expect_root: IntegerSchema,
  }),
]);
export type TestStep = z.infer<typeof TestStepSchema>;

/**
 * Single test case
 */
export const TestCaseSchema = z.object({
  description: z.string(),

  // Initial root value
  value: IntegerSchema,

  steps: z.array(TestStepSchema).min(1),
});
export type TestCase = z.infer<typeof TestCaseSchema>;

/**
 * Test suite for one declaration
 */
export const TestSuiteSchema = z.object({
  name: z.string(),
  description: z.string().optional(),

  // The declaration being tested, as passed to defineBitfield()
  schema: z.record(z.string(), z.unknown()),

  test_cases: z.array(TestCaseSchema).min(1),
});
export type TestSuite = z.infer<typeof TestSuiteSchema>;

/**
 * Helper function to define a test suite with type checking
 */
export function defineTestSuite(suite: z.input<typeof TestSuiteSchema>): TestSuite {
  return TestSuiteSchema.parse(suite);
}
