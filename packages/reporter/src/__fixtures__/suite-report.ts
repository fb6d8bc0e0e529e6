import type { SuiteReport } from '@pairforge/shared';

export function makeSuiteReport(overrides: Partial<SuiteReport> = {}): SuiteReport {
  return {
    version: 1,
    tool: { name: 'pairforge', version: '0.1.0' },
    parameters: [
      { name: 'Browser', values: ['Chrome', 'Firefox'] },
      { name: 'OS', values: ['Windows', 'Mac'] },
    ],
    options: { order: 'declared', reduce: true },
    summary: {
      totalRequiredPairs: 4,
      totalTestCases: 3,
      coveredPairs: 3,
      uncoveredPairs: 1,
      coverageRatio: 0.75,
      complete: false,
      seedTestCases: 1,
      droppedTestCases: 0,
    },
    testCases: [
      { index: 1, values: ['Chrome', 'Windows'], newUniquePairs: 1, pairs: 1, seeded: true },
      { index: 2, values: ['Firefox', 'Windows'], newUniquePairs: 1, pairs: 1 },
      { index: 3, values: ['Chrome', 'Mac'], newUniquePairs: 1, pairs: 1 },
    ],
    uncoveredPairs: [
      {
        first: { parameter: 'Browser', value: 'Firefox' },
        second: { parameter: 'OS', value: 'Mac' },
      },
    ],
    ...overrides,
  };
}
