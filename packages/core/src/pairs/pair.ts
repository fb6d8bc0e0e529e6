import { ErrorCode } from '../errors/codes.js';
import { PreconditionError } from '../types/errors.js';
import type { Assignment, Pair, PairKey } from '../types/model.js';

function orient(a: Assignment, b: Assignment): [Assignment, Assignment] {
  if (a.parameter === b.parameter) {
    throw new PreconditionError({
      message: `Assignments "${a.parameter}=${a.value}" and "${b.parameter}=${b.value}" belong to the same parameter`,
      errorCode: ErrorCode.INCOMPATIBLE_ASSIGNMENTS,
      context: { rule: 'distinct-parameters', parameter: a.parameter },
    });
  }
  return a.parameter < b.parameter ? [a, b] : [b, a];
}

function keyOf(first: Assignment, second: Assignment): PairKey {
  return JSON.stringify([
    first.parameter,
    first.value,
    second.parameter,
    second.value,
  ]);
}

/**
 * Canonical key of the unordered pair {a, b}: a JSON tuple of both members,
 * ordered by parameter name.
 */
export function pairKey(a: Assignment, b: Assignment): PairKey {
  const [first, second] = orient(a, b);
  return keyOf(first, second);
}

export function createPair(a: Assignment, b: Assignment): Pair {
  const [first, second] = orient(a, b);
  return Object.freeze({
    key: keyOf(first, second),
    first: Object.freeze({ parameter: first.parameter, value: first.value }),
    second: Object.freeze({ parameter: second.parameter, value: second.value }),
  });
}

export function formatPair(pair: Pair): string {
  return `${pair.first.parameter}=${pair.first.value} × ${pair.second.parameter}=${pair.second.value}`;
}
