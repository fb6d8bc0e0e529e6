import { assertValidParameters } from '../model/parameters.js';
import type {
  Pair,
  ParameterSet,
  RequiredPairs,
  TestCase,
} from '../types/model.js';
import { PairSlotIndex } from './slot-index.js';

/**
 * Closed-form size of the required pair universe: Σ_{i<j} |Di|·|Dj|.
 */
export function expectedPairCount(set: ParameterSet): number {
  const sizes = set.parameters.map((parameter) => parameter.values.length);
  let total = 0;
  let seen = 0;
  for (const size of sizes) {
    total += seen * size;
    seen += size;
  }
  return total;
}

/**
 * Build the exact set of pairs a covering suite must exercise.
 *
 * Preconditions are re-checked here so a hand-built ParameterSet cannot
 * yield a degenerate universe.
 */
export function enumeratePairs(set: ParameterSet): RequiredPairs {
  assertValidParameters(set.parameters);
  const index = new PairSlotIndex(set);
  return new Map(index.allPairs().map((pair) => [pair.key, pair] as const));
}

/**
 * The C(k, 2) pairs covered by a single test case.
 */
export function pairsOfTestCase(
  set: ParameterSet,
  testCase: TestCase,
  testCaseIndex = 0
): Pair[] {
  const index = new PairSlotIndex(set);
  const values = index.valueIndices(testCase, testCaseIndex);
  return index.slotsOf(values).map((slot) => index.pairAt(slot));
}
