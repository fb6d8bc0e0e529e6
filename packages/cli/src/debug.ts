import { formatLogLine } from '@pairforge/shared';
import { formatPair, type GenerateSuiteResult } from '@pairforge/core';

const MAX_LISTED_PAIRS = 16;

/**
 * Print builder internals to stderr. Intended to be used behind the
 * --debug-passes flag.
 */
export function printBuildDebug(result: GenerateSuiteResult): void {
  process.stderr.write(
    formatLogLine('pairs', {
      required: result.requiredPairs.size,
      parameters: result.parameters.parameters.length,
    })
  );
  process.stderr.write(
    formatLogLine('builder', {
      testCases: result.testSuite.length,
      seedTestCases: result.seedCount,
      dropped: result.droppedCount,
      candidates: result.metrics?.candidatesBuilt,
    })
  );

  const gains = result.metrics?.iterationGains;
  if (gains) {
    process.stderr.write(formatLogLine('builder.gains', gains));
  }

  const uncovered = result.analysis.uncoveredPairs;
  if (uncovered.length > 0) {
    process.stderr.write(
      formatLogLine(
        'coverage.uncovered',
        uncovered.slice(0, MAX_LISTED_PAIRS).map(formatPair)
      )
    );
  }
}
