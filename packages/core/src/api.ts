import type { ParameterInput, SuiteReport } from '@pairforge/shared';
import { buildTestSuite, type BuildResult } from './builder/greedy-suite-builder.js';
import { analyzeCoverage, type CoverageAnalysis } from './coverage/analyzer.js';
import { buildSuiteReport } from './coverage/report.js';
import { ensureParameterSet } from './model/parameters.js';
import { enumeratePairs } from './pairs/enumerator.js';
import type {
  ParameterSet,
  RequiredPairs,
  TestSuite,
} from './types/model.js';
import { resolveOptions, type GenerationOptions } from './types/options.js';
import {
  MetricsCollector,
  type MetricsSnapshot,
  type MetricsVerbosity,
} from './util/metrics.js';

export interface EnumerateAndBuildResult {
  testSuite: TestSuite;
  requiredPairs: RequiredPairs;
  /**
   * Frozen copy of the caller's parameters the suite is aligned with.
   */
  parameters: ParameterSet;
}

export interface GenerateSuiteOptions extends GenerationOptions {
  /**
   * 'ci' adds the per-iteration gain trace to the metrics snapshot.
   * Defaults to 'runtime'.
   */
  metricsVerbosity?: MetricsVerbosity;
}

export interface GenerateSuiteResult extends EnumerateAndBuildResult {
  analysis: CoverageAnalysis;
  report: SuiteReport;
  metrics?: MetricsSnapshot;
  seedCount: number;
  droppedCount: number;
}

function enumerateAndBuild(
  input: ParameterInput | ParameterSet,
  options: Partial<GenerationOptions>,
  metrics?: MetricsCollector
): EnumerateAndBuildResult & BuildResult {
  const parameters = ensureParameterSet(input);
  const requiredPairs = metrics
    ? metrics.measure('ENUMERATE', () => enumeratePairs(parameters))
    : enumeratePairs(parameters);
  metrics?.setRequiredPairs(requiredPairs.size);
  const build = buildTestSuite(parameters, requiredPairs, options, metrics);
  return { ...build, requiredPairs, parameters };
}

/**
 * EnumerateAndBuild: validate parameters, enumerate the required pairs and
 * build a covering suite.
 *
 * Throws PreconditionError on invalid parameters (before any work is done)
 * and InternalConsistencyError if the greedy loop hits its safety bound.
 * Nothing partial is ever returned.
 */
export function EnumerateAndBuild(
  parameters: ParameterInput | ParameterSet,
  options: Partial<GenerationOptions> = {}
): EnumerateAndBuildResult {
  const { testSuite, requiredPairs, parameters: set } = enumerateAndBuild(
    parameters,
    options
  );
  return { testSuite, requiredPairs, parameters: set };
}

/**
 * AnalyzeCoverage: per-row attribution of the required pairs a suite
 * covers. Accepts any suite, complete or not.
 */
export function AnalyzeCoverage(
  testSuite: TestSuite,
  requiredPairs: RequiredPairs,
  parameters: ParameterInput | ParameterSet
): CoverageAnalysis {
  return analyzeCoverage(
    testSuite,
    requiredPairs,
    ensureParameterSet(parameters)
  );
}

/**
 * GenerateSuite: EnumerateAndBuild followed by AnalyzeCoverage, returning
 * the JSON SuiteReport used by the reporter and the CLI.
 */
export function GenerateSuite(
  parameters: ParameterInput | ParameterSet,
  options: GenerateSuiteOptions = {}
): GenerateSuiteResult {
  const resolved = resolveOptions(options);
  const collector = new MetricsCollector({
    enabled: resolved.metrics,
    verbosity: options.metricsVerbosity ?? 'runtime',
  });

  const built = enumerateAndBuild(parameters, resolved, collector);
  const analysis = collector.measure('ANALYZE', () =>
    analyzeCoverage(built.testSuite, built.requiredPairs, built.parameters)
  );
  const metrics = resolved.metrics ? collector.snapshotMetrics() : undefined;

  const report = buildSuiteReport({
    parameters: built.parameters,
    testSuite: built.testSuite,
    analysis,
    seedCount: built.seedCount,
    droppedCount: built.droppedCount,
    options: { order: resolved.order, reduce: resolved.reduce },
    metrics,
  });

  return {
    testSuite: built.testSuite,
    requiredPairs: built.requiredPairs,
    parameters: built.parameters,
    analysis,
    report,
    metrics,
    seedCount: built.seedCount,
    droppedCount: built.droppedCount,
  };
}
