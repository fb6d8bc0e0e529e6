import { ErrorCode } from '../errors/codes.js';
import type { PairSlotIndex } from '../pairs/slot-index.js';
import { PreconditionError } from '../types/errors.js';
import type { RequiredPairs } from '../types/model.js';

/**
 * Running set of covered pairs during one build.
 *
 * Slots that are not part of the required universe start out covered, so
 * the uncovered count only ever reflects required pairs.
 */
export class CoverageState {
  private readonly covered: Uint8Array;
  private readonly required: Uint8Array;
  private readonly requiredTotal: number;
  private uncovered: number;

  constructor(index: PairSlotIndex, requiredPairs: RequiredPairs) {
    this.covered = new Uint8Array(index.size).fill(1);
    this.required = new Uint8Array(index.size);

    let total = 0;
    for (const pair of requiredPairs.values()) {
      const slot = index.slotOf(pair.key);
      if (slot === undefined) {
        throw new PreconditionError({
          message: `Required pair ${pair.key} does not belong to the parameter set`,
          errorCode: ErrorCode.UNKNOWN_PAIR,
          context: {
            rule: 'pair-in-universe',
            parameter: pair.first.parameter,
            value: pair.first.value,
          },
        });
      }
      if (this.required[slot] === 1) continue;
      this.required[slot] = 1;
      this.covered[slot] = 0;
      total += 1;
    }
    this.requiredTotal = total;
    this.uncovered = total;
  }

  get requiredCount(): number {
    return this.requiredTotal;
  }

  get uncoveredCount(): number {
    return this.uncovered;
  }

  isRequired(slot: number): boolean {
    return this.required[slot] === 1;
  }

  isUncovered(slot: number): boolean {
    return this.covered[slot] === 0;
  }

  /**
   * Mark every slot covered; returns how many were newly covered.
   */
  mark(slots: readonly number[]): number {
    let gained = 0;
    for (const slot of slots) {
      if (this.covered[slot] === 0) {
        this.covered[slot] = 1;
        gained += 1;
      }
    }
    this.uncovered -= gained;
    return gained;
  }
}
