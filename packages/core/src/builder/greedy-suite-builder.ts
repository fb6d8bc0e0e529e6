import { processingOrder } from '../model/parameters.js';
import { PairSlotIndex } from '../pairs/slot-index.js';
import { InternalConsistencyError } from '../types/errors.js';
import type {
  ParameterSet,
  RequiredPairs,
  TestSuite,
} from '../types/model.js';
import { resolveOptions, type GenerationOptions } from '../types/options.js';
import type { MetricsCollector } from '../util/metrics.js';
import { CoverageState } from './coverage-state.js';
import { reduceSuite } from './reducer.js';

export interface BuildResult {
  testSuite: TestSuite;
  /** Seed test cases at the front of the suite */
  seedCount: number;
  /** Greedy candidates appended before reduction */
  iterations: number;
  /** Generated test cases removed by the reduction pass */
  droppedCount: number;
}

/**
 * Greedy one-test-at-a-time construction of a covering suite.
 *
 * Each candidate is built parameter by parameter in a fixed processing
 * order. A value is scored by the uncovered required pairs it closes with
 * the values already chosen in the candidate; ties go to the value with
 * the most uncovered pairs towards parameters still unassigned, then to
 * the earliest value in the domain. The lookahead tie-break means the
 * earliest-processed parameter that still has uncovered pairs picks a
 * value that can be completed, so every candidate covers at least one new
 * pair.
 */
export function buildTestSuite(
  set: ParameterSet,
  requiredPairs: RequiredPairs,
  options: Partial<GenerationOptions> = {},
  metrics?: MetricsCollector
): BuildResult {
  const resolved = resolveOptions(options);
  const index = new PairSlotIndex(set);
  const state = new CoverageState(index, requiredPairs);
  const order = processingOrder(set, resolved.order);

  metrics?.begin('BUILD');
  const rows: number[][] = [];
  let iterations = 0;
  try {
    resolved.seedTestCases.forEach((testCase, position) => {
      const row = index.valueIndices(testCase, position);
      state.mark(index.slotsOf(row));
      rows.push(row);
    });
    metrics?.addSeedTestCases(rows.length);

    const maxIterations = resolved.maxIterations ?? state.requiredCount;
    while (state.uncoveredCount > 0) {
      if (iterations >= maxIterations) {
        throw new InternalConsistencyError({
          message: `Greedy construction stopped after ${iterations} iterations with ${state.uncoveredCount} of ${state.requiredCount} required pairs uncovered`,
          context: {
            rule: 'max-iterations',
            iterations,
            maxIterations,
            uncoveredPairs: state.uncoveredCount,
          },
          suggestions:
            resolved.maxIterations === undefined
              ? []
              : ['Raise maxIterations or leave it unset'],
        });
      }
      const candidate = buildCandidate(index, state, order, metrics);
      const gained = state.mark(index.slotsOf(candidate));
      if (gained === 0) {
        throw new InternalConsistencyError({
          message: `Greedy candidate #${iterations + 1} covered no new pair`,
          context: { rule: 'progress', iterations },
        });
      }
      rows.push(candidate);
      iterations += 1;
      metrics?.addCandidate(gained);
    }
  } finally {
    metrics?.end('BUILD');
  }

  const seedCount = resolved.seedTestCases.length;
  let finalRows: readonly number[][] = rows;
  let droppedCount = 0;
  if (resolved.reduce) {
    const reduction = metrics
      ? metrics.measure('REDUCE', () =>
          reduceSuite(index, state, rows, seedCount)
        )
      : reduceSuite(index, state, rows, seedCount);
    finalRows = reduction.rows;
    droppedCount = reduction.dropped;
    metrics?.addDroppedTestCases(droppedCount);
  }

  return {
    testSuite: Object.freeze(finalRows.map((row) => index.testCaseOf(row))),
    seedCount,
    iterations,
    droppedCount,
  };
}

function buildCandidate(
  index: PairSlotIndex,
  state: CoverageState,
  order: readonly number[],
  metrics?: MetricsCollector
): number[] {
  const chosen = new Array<number>(index.parameterCount).fill(0);
  const assigned: number[] = [];
  let scored = 0;

  order.forEach((parameter, position) => {
    const pending = order.slice(position + 1);
    let best = 0;
    let bestGain = -1;
    let bestLookahead = -1;

    for (let value = 0; value < index.domainSize(parameter); value += 1) {
      scored += 1;
      let gain = 0;
      for (const other of assigned) {
        const slot = index.slot(parameter, value, other, chosen[other] ?? 0);
        if (state.isUncovered(slot)) gain += 1;
      }
      if (gain < bestGain) continue;

      let lookahead = 0;
      for (const other of pending) {
        for (let otherValue = 0; otherValue < index.domainSize(other); otherValue += 1) {
          if (state.isUncovered(index.slot(parameter, value, other, otherValue))) {
            lookahead += 1;
          }
        }
      }
      if (gain > bestGain || lookahead > bestLookahead) {
        best = value;
        bestGain = gain;
        bestLookahead = lookahead;
      }
    }

    chosen[parameter] = best;
    assigned.push(parameter);
  });

  metrics?.addValuesScored(scored);
  return chosen;
}
