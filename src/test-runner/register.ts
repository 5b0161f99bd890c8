import { describe, expect, it } from "vitest";
import type { TestSuite } from "../schema/test-schema.js";
import { parseDeclaration } from "../schema/bitfield-schema.js";
import { buildBitfieldType } from "../runtime/bitfield-type.js";
import { runTestCase } from "./runner.js";

/**
 * Register a table-driven suite with Vitest: one test per case, failing with
 * the list of mismatched steps.
 */
export function registerTestSuite(suite: TestSuite): void {
  describe(suite.description ? `${suite.name}: ${suite.description}` : suite.name, () => {
    const type = buildBitfieldType(parseDeclaration(suite.schema), { name: suite.name });

    for (const testCase of suite.test_cases) {
      it(testCase.description, () => {
        expect(runTestCase(testCase, type)).toEqual([]);
      });
    }
  });
}
