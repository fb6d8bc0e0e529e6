import type { SuiteReport, SuiteReportPair } from '@pairforge/shared';

export function formatReportPair(pair: SuiteReportPair): string {
  return `${pair.first.parameter}=${pair.first.value} × ${pair.second.parameter}=${pair.second.value}`;
}

/**
 * "100.0% (12/12)"
 */
export function formatCoverage(report: SuiteReport): string {
  const { coverageRatio, coveredPairs, totalRequiredPairs } = report.summary;
  return `${(coverageRatio * 100).toFixed(1)}% (${coveredPairs}/${totalRequiredPairs})`;
}

export function formatTestCaseLabel(
  testCase: SuiteReport['testCases'][number]
): string {
  return testCase.seeded ? `${testCase.index} (seed)` : String(testCase.index);
}

/**
 * Header and body cells of the test case table, one row per test case.
 */
export function testCaseTable(report: SuiteReport): {
  header: string[];
  rows: string[][];
} {
  return {
    header: [
      'Test Case #',
      ...report.parameters.map((parameter) => parameter.name),
      'New Unique Pairs',
    ],
    rows: report.testCases.map((testCase) => [
      formatTestCaseLabel(testCase),
      ...testCase.values,
      String(testCase.newUniquePairs),
    ]),
  };
}
