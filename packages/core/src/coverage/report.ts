import {
  SUITE_REPORT_VERSION,
  TOOL_NAME,
  TOOL_VERSION,
  type SuiteReport,
  type SuiteReportOptions,
  type SuiteReportPair,
} from '@pairforge/shared';
import { toParameterDefinitions } from '../model/parameters.js';
import type { Pair, ParameterSet, TestSuite } from '../types/model.js';
import type { MetricsSnapshot } from '../util/metrics.js';
import type { CoverageAnalysis } from './analyzer.js';

export interface SuiteReportInput {
  parameters: ParameterSet;
  testSuite: TestSuite;
  analysis: CoverageAnalysis;
  /** Leading rows supplied by the caller */
  seedCount?: number;
  droppedCount?: number;
  options?: SuiteReportOptions;
  metrics?: MetricsSnapshot;
}

function toReportPair(pair: Pair): SuiteReportPair {
  return {
    first: { parameter: pair.first.parameter, value: pair.first.value },
    second: { parameter: pair.second.parameter, value: pair.second.value },
  };
}

function flattenMetrics(snapshot: MetricsSnapshot): Record<string, number> {
  const flat: Record<string, number> = {};
  for (const [key, value] of Object.entries(snapshot)) {
    if (typeof value === 'number') {
      flat[key] = value;
    }
  }
  return flat;
}

/**
 * Assemble the JSON report consumed by the renderers and `--out json`.
 */
export function buildSuiteReport(input: SuiteReportInput): SuiteReport {
  const { analysis, testSuite } = input;
  const seedCount = input.seedCount ?? 0;

  const report: SuiteReport = {
    version: SUITE_REPORT_VERSION,
    tool: { name: TOOL_NAME, version: TOOL_VERSION },
    parameters: toParameterDefinitions(input.parameters),
    summary: {
      totalRequiredPairs: analysis.summary.requiredPairs,
      totalTestCases: testSuite.length,
      coveredPairs: analysis.summary.coveredPairs,
      uncoveredPairs: analysis.summary.uncoveredPairs,
      coverageRatio: analysis.summary.coverageRatio,
      complete: analysis.summary.complete,
      seedTestCases: seedCount,
      droppedTestCases: input.droppedCount ?? 0,
    },
    testCases: testSuite.map((testCase, position) => ({
      index: position + 1,
      values: [...testCase],
      newUniquePairs: analysis.newUniqueCounts[position] ?? 0,
      pairs: analysis.testCasePairs[position]?.size ?? 0,
      ...(position < seedCount ? { seeded: true } : {}),
    })),
    uncoveredPairs: analysis.uncoveredPairs.map(toReportPair),
  };

  if (input.options) {
    report.options = { ...input.options };
  }
  if (input.metrics) {
    report.metrics = flattenMetrics(input.metrics);
  }
  return report;
}
