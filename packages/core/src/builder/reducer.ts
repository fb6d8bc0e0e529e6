import type { PairSlotIndex } from '../pairs/slot-index.js';
import type { CoverageState } from './coverage-state.js';

export interface ReductionResult {
  rows: number[][];
  dropped: number;
}

/**
 * Front-to-back redundancy pass over a complete suite.
 *
 * A row is dropped when every required pair it covers is still covered by
 * some other remaining row. The first `protectedCount` rows (seed test
 * cases) always stay.
 */
export function reduceSuite(
  index: PairSlotIndex,
  state: CoverageState,
  rows: readonly number[][],
  protectedCount: number
): ReductionResult {
  const counts = new Uint32Array(index.size);
  const rowSlots = rows.map((row) =>
    index.slotsOf(row).filter((slot) => state.isRequired(slot))
  );
  for (const slots of rowSlots) {
    for (const slot of slots) counts[slot] = (counts[slot] ?? 0) + 1;
  }

  const kept: number[][] = [];
  let dropped = 0;
  rows.forEach((row, position) => {
    const slots = rowSlots[position] ?? [];
    const redundant =
      position >= protectedCount &&
      slots.every((slot) => (counts[slot] ?? 0) >= 2);
    if (redundant) {
      for (const slot of slots) counts[slot] = (counts[slot] ?? 0) - 1;
      dropped += 1;
      return;
    }
    kept.push(row);
  });

  return { rows: kept, dropped };
}
