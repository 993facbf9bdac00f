#!/usr/bin/env tsx
/**
 * Golden Review Test Runner
 *
 * Validates that parsing produces stable outputs from known pages.
 * Run with: npm run reviews:golden
 */

import { ParseError } from "../lib/reviews/errors";
import { parseReview } from "../lib/reviews/parser";
import {
  criticBlogGoldenCases,
  loadGoldenDocument,
  validateGoldenCase,
  type GoldenReviewCase,
} from "../lib/reviews/sources/critic-blog/golden/cases";

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

function runCase(testCase: GoldenReviewCase): { passed: boolean; failures: string[] } {
  const document = loadGoldenDocument(testCase);
  try {
    return validateGoldenCase(parseReview(document), testCase.expect);
  } catch (error) {
    if (error instanceof ParseError) {
      return validateGoldenCase(error, testCase.expect);
    }
    throw error;
  }
}

function runGoldenTests(): void {
  console.log(`\n${colors.blue}=== Review Parsing Golden Tests ===${colors.reset}\n`);

  let passed = 0;
  let failed = 0;
  const allFailures: Array<{ case: GoldenReviewCase; errors: string[] }> = [];

  for (const testCase of criticBlogGoldenCases) {
    console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

    try {
      const result = runCase(testCase);
      if (result.passed) {
        console.log(`  ${colors.green}PASSED${colors.reset}`);
        passed++;
      } else {
        console.log(`  ${colors.red}FAILED${colors.reset}`);
        result.failures.forEach((f) => console.log(`    ${colors.red}- ${f}${colors.reset}`));
        failed++;
        allFailures.push({ case: testCase, errors: result.failures });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`  ${colors.red}ERROR: ${message}${colors.reset}`);
      failed++;
      allFailures.push({ case: testCase, errors: [message] });
    }
  }

  console.log(`\n${colors.blue}=== Summary ===${colors.reset}`);
  console.log(`  ${colors.green}Passed: ${passed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${failed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => console.log(`    - ${e}`));
    }
    process.exit(1);
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
}

runGoldenTests();
