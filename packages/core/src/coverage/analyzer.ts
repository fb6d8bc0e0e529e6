import { PairSlotIndex } from '../pairs/slot-index.js';
import type {
  Pair,
  PairKey,
  ParameterSet,
  RequiredPairs,
  TestSuite,
} from '../types/model.js';

export interface CoverageSummary {
  requiredPairs: number;
  coveredPairs: number;
  uncoveredPairs: number;
  testCases: number;
  /** coveredPairs / requiredPairs, 1 for an empty universe */
  coverageRatio: number;
  complete: boolean;
}

export interface CoverageAnalysis {
  /** Required pairs observed anywhere in the suite, in first-covered order */
  coveredPairs: ReadonlyMap<PairKey, Pair>;
  /** Per test case, the required pairs that row covers on its own */
  testCasePairs: ReadonlySet<PairKey>[];
  /** Per test case, required pairs not covered by any earlier row */
  newUniqueCounts: number[];
  /** Required pairs no row covers, in universe order */
  uncoveredPairs: Pair[];
  summary: CoverageSummary;
}

/**
 * Attribute required pairs to the rows of a suite.
 *
 * Pure: nothing is enforced about completeness, and the same input always
 * yields an equal analysis. Rows with a wrong arity or an unknown value
 * raise PreconditionError.
 */
export function analyzeCoverage(
  testSuite: TestSuite,
  requiredPairs: RequiredPairs,
  set: ParameterSet
): CoverageAnalysis {
  const index = new PairSlotIndex(set);
  const coveredPairs = new Map<PairKey, Pair>();
  const testCasePairs: ReadonlySet<PairKey>[] = [];
  const newUniqueCounts: number[] = [];

  testSuite.forEach((testCase, position) => {
    const slots = index.slotsOf(index.valueIndices(testCase, position));
    const rowPairs = new Set<PairKey>();
    let fresh = 0;
    for (const slot of slots) {
      const pair = requiredPairs.get(index.pairAt(slot).key);
      if (!pair) continue;
      rowPairs.add(pair.key);
      if (!coveredPairs.has(pair.key)) {
        coveredPairs.set(pair.key, pair);
        fresh += 1;
      }
    }
    testCasePairs.push(rowPairs);
    newUniqueCounts.push(fresh);
  });

  const uncoveredPairs = [...requiredPairs.values()].filter(
    (pair) => !coveredPairs.has(pair.key)
  );
  const required = requiredPairs.size;

  return {
    coveredPairs,
    testCasePairs,
    newUniqueCounts,
    uncoveredPairs,
    summary: {
      requiredPairs: required,
      coveredPairs: coveredPairs.size,
      uncoveredPairs: uncoveredPairs.length,
      testCases: testSuite.length,
      coverageRatio: required === 0 ? 1 : coveredPairs.size / required,
      complete: uncoveredPairs.length === 0,
    },
  };
}
