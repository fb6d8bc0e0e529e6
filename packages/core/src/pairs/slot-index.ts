import { ErrorCode } from '../errors/codes.js';
import { PreconditionError } from '../types/errors.js';
import type {
  Pair,
  PairKey,
  ParameterSet,
  TestCase,
} from '../types/model.js';
import { createPair } from './pair.js';

/**
 * Dense numbering of every pair of a parameter set.
 *
 * For parameters i < j the block of (i, j) pairs starts at offset(i, j) and
 * holds |Di|·|Dj| slots laid out value-major: offset + a·|Dj| + b.
 */
export class PairSlotIndex {
  readonly size: number;
  readonly parameterCount: number;

  private readonly domainSizes: number[];
  private readonly blockOffsets: number[];
  private readonly valueLookup: ReadonlyMap<string, number>[];
  private readonly pairs: Pair[] = [];
  private readonly slotByKey = new Map<PairKey, number>();

  constructor(private readonly set: ParameterSet) {
    const parameters = set.parameters;
    const k = parameters.length;
    this.parameterCount = k;
    this.domainSizes = parameters.map((parameter) => parameter.values.length);
    this.valueLookup = parameters.map(
      (parameter) =>
        new Map(
          parameter.values.map((value, index): [string, number] => [
            value,
            index,
          ])
        )
    );

    this.blockOffsets = new Array<number>(k * k).fill(0);
    let size = 0;
    for (let i = 0; i < k; i += 1) {
      for (let j = i + 1; j < k; j += 1) {
        this.blockOffsets[i * k + j] = size;
        size += this.domainSize(i) * this.domainSize(j);
      }
    }
    this.size = size;

    for (let i = 0; i < k; i += 1) {
      const left = parameters[i];
      if (!left) continue;
      for (let j = i + 1; j < k; j += 1) {
        const right = parameters[j];
        if (!right) continue;
        for (const leftValue of left.values) {
          for (const rightValue of right.values) {
            const pair = createPair(
              { parameter: left.name, value: leftValue },
              { parameter: right.name, value: rightValue }
            );
            this.slotByKey.set(pair.key, this.pairs.length);
            this.pairs.push(pair);
          }
        }
      }
    }
  }

  get parameterSet(): ParameterSet {
    return this.set;
  }

  domainSize(parameterIndex: number): number {
    return this.domainSizes[parameterIndex] ?? 0;
  }

  /**
   * Slot of the pair {(i, a), (j, b)}; argument order does not matter.
   */
  slot(i: number, a: number, j: number, b: number): number {
    if (i > j) {
      return this.slot(j, b, i, a);
    }
    const offset = this.blockOffsets[i * this.parameterCount + j] ?? 0;
    return offset + a * this.domainSize(j) + b;
  }

  pairAt(slot: number): Pair {
    const pair = this.pairs[slot];
    if (!pair) {
      throw new RangeError(`Pair slot ${slot} is outside [0, ${this.size})`);
    }
    return pair;
  }

  slotOf(key: PairKey): number | undefined {
    return this.slotByKey.get(key);
  }

  /**
   * Every pair, in slot order (parameter-pair blocks in declaration order,
   * values in domain order).
   */
  allPairs(): readonly Pair[] {
    return this.pairs;
  }

  /**
   * Resolve a test case into value indices, one per parameter.
   * Throws PreconditionError for a wrong arity or an unknown value.
   */
  valueIndices(testCase: TestCase, testCaseIndex: number): number[] {
    if (!Array.isArray(testCase) || testCase.length !== this.parameterCount) {
      const arity = Array.isArray(testCase) ? testCase.length : 0;
      throw new PreconditionError({
        message: `Test case #${testCaseIndex + 1} assigns ${arity} values, expected ${this.parameterCount}`,
        errorCode: ErrorCode.INVALID_TEST_CASE,
        context: { rule: 'test-case-arity', testCaseIndex },
      });
    }
    return testCase.map((value, parameterIndex) => {
      const index = this.valueLookup[parameterIndex]?.get(value);
      if (index === undefined) {
        const parameter = this.set.parameters[parameterIndex]?.name;
        throw new PreconditionError({
          message: `Test case #${testCaseIndex + 1} uses unknown value "${value}" for parameter "${parameter ?? parameterIndex}"`,
          errorCode: ErrorCode.INVALID_TEST_CASE,
          context: {
            rule: 'test-case-value',
            testCaseIndex,
            parameter,
            value,
          },
        });
      }
      return index;
    });
  }

  /**
   * Map value indices back to value labels.
   */
  testCaseOf(valueIndices: readonly number[]): TestCase {
    return Object.freeze(
      valueIndices.map((valueIndex, parameterIndex) => {
        const value =
          this.set.parameters[parameterIndex]?.values[valueIndex];
        if (value === undefined) {
          throw new RangeError(
            `Value index ${valueIndex} is outside the domain of parameter #${parameterIndex + 1}`
          );
        }
        return value;
      })
    );
  }

  /**
   * Slots of the C(k, 2) pairs a total assignment covers.
   */
  slotsOf(valueIndices: readonly number[]): number[] {
    const slots: number[] = [];
    for (let i = 0; i < valueIndices.length; i += 1) {
      const a = valueIndices[i] ?? 0;
      for (let j = i + 1; j < valueIndices.length; j += 1) {
        slots.push(this.slot(i, a, j, valueIndices[j] ?? 0));
      }
    }
    return slots;
  }
}
