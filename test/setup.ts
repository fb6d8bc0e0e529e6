import fc from 'fast-check';

/**
 * Shared fast-check defaults for every property suite. Specs still pin their
 * own seed so a failure replays the same counterexample.
 */
const numRuns = Number.parseInt(process.env.FC_NUM_RUNS ?? '100', 10);

fc.configureGlobal({
  numRuns: Number.isInteger(numRuns) && numRuns > 0 ? numRuns : 100,
  interruptAfterTimeLimit: 8000,
  markInterruptAsFailure: true,
});
