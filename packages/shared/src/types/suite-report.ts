import type { ParameterDefinition, ParameterOrder } from '../types.js';

export const SUITE_REPORT_VERSION = 1 as const;

export interface SuiteReportAssignment {
  parameter: string;
  value: string;
}

export interface SuiteReportPair {
  first: SuiteReportAssignment;
  second: SuiteReportAssignment;
}

export interface SuiteReportTestCase {
  /**
   * 1-based position of the test case in the suite.
   */
  index: number;
  /**
   * One value per parameter, aligned with `SuiteReport.parameters`.
   */
  values: string[];
  /**
   * Required pairs first covered by this test case (in suite order).
   */
  newUniquePairs: number;
  /**
   * Required pairs covered by this test case on its own.
   */
  pairs: number;
  /**
   * True when the row was supplied by the caller rather than generated.
   */
  seeded?: boolean;
}

export interface SuiteReportSummary {
  totalRequiredPairs: number;
  totalTestCases: number;
  coveredPairs: number;
  uncoveredPairs: number;
  /**
   * coveredPairs / totalRequiredPairs, in [0, 1].
   */
  coverageRatio: number;
  complete: boolean;
  seedTestCases: number;
  droppedTestCases: number;
}

export interface SuiteReportOptions {
  order: ParameterOrder;
  reduce: boolean;
}

export interface SuiteReport {
  version: typeof SUITE_REPORT_VERSION;
  tool: {
    name: string;
    version: string;
  };
  parameters: ParameterDefinition[];
  /**
   * Generation options; absent when the report describes an existing suite.
   */
  options?: SuiteReportOptions;
  summary: SuiteReportSummary;
  testCases: SuiteReportTestCase[];
  /**
   * Required pairs no test case covers. Empty for a generated suite.
   */
  uncoveredPairs: SuiteReportPair[];
  /**
   * Timings and counters collected during the run, when enabled.
   */
  metrics?: Record<string, number>;
}
