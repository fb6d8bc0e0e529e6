// @pairforge/core entry point
//
// The PascalCase facades in ./api.js (EnumerateAndBuild, AnalyzeCoverage,
// GenerateSuite) are the preferred entry points. The building blocks below
// are exported for callers that need to drive a single stage.

export * from './api.js';

// Domain model
export type {
  Parameter,
  ParameterSet,
  Assignment,
  PairKey,
  Pair,
  RequiredPairs,
  TestCase,
  TestSuite,
} from './types/model.js';
export {
  MIN_PARAMETERS,
  MIN_VALUES_PER_PARAMETER,
  assertValidParameters,
  createParameterSet,
  ensureParameterSet,
  isParameterSet,
  processingOrder,
  toParameterDefinitions,
} from './model/parameters.js';

// Options
export {
  DEFAULT_OPTIONS,
  parseParameterOrder,
  resolveOptions,
  type GenerationOptions,
  type ResolvedOptions,
} from './types/options.js';

// Pairs
export { pairKey, createPair, formatPair } from './pairs/pair.js';
export {
  enumeratePairs,
  expectedPairCount,
  pairsOfTestCase,
} from './pairs/enumerator.js';

// Builder
export {
  buildTestSuite,
  type BuildResult,
} from './builder/greedy-suite-builder.js';

// Coverage
export {
  analyzeCoverage,
  type CoverageAnalysis,
  type CoverageSummary,
} from './coverage/analyzer.js';
export {
  buildSuiteReport,
  type SuiteReportInput,
} from './coverage/report.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  getHttpStatus,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type APIErrorView,
  type ProductionView,
} from './errors/presenter.js';
export {
  PairforgeError,
  PreconditionError,
  InternalConsistencyError,
  ConfigError,
  ParseError,
  isPairforgeError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';

// Metrics
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsVerbosity,
  type MetricsSnapshot,
} from './util/metrics.js';
