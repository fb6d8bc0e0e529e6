import { describe, it, expect } from 'vitest';
import {
  assertValidParameters,
  createParameterSet,
  ensureParameterSet,
  isParameterSet,
  processingOrder,
  toParameterDefinitions,
} from '../parameters.js';
import { ErrorCode } from '../../errors/codes.js';
import { PreconditionError } from '../../types/errors.js';

function codeOf(run: () => unknown): ErrorCode | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof PreconditionError) return error.errorCode;
    throw error;
  }
  return undefined;
}

describe('createParameterSet', () => {
  it('keeps mapping declaration order', () => {
    const set = createParameterSet({
      OS: ['Windows', 'Mac'],
      Browser: ['Chrome', 'Firefox', 'Safari'],
    });
    expect(set.parameters.map((p) => p.name)).toEqual(['OS', 'Browser']);
    expect(set.parameters[1]?.values).toEqual(['Chrome', 'Firefox', 'Safari']);
  });

  it('accepts the definition list form', () => {
    const set = createParameterSet([
      { name: 'A', values: ['a1', 'a2'] },
      { name: 'B', values: ['b1', 'b2'] },
    ]);
    expect(toParameterDefinitions(set)).toEqual([
      { name: 'A', values: ['a1', 'a2'] },
      { name: 'B', values: ['b1', 'b2'] },
    ]);
  });

  it('works on a frozen private copy', () => {
    const values = ['a1', 'a2'];
    const set = createParameterSet({ A: values, B: ['b1', 'b2'] });
    values.push('a3');
    expect(set.parameters[0]?.values).toEqual(['a1', 'a2']);
    expect(Object.isFrozen(set.parameters)).toBe(true);
    expect(Object.isFrozen(set.parameters[0]?.values)).toBe(true);
  });

  it('ensureParameterSet passes a validated set through', () => {
    const set = createParameterSet({ A: ['a1', 'a2'], B: ['b1', 'b2'] });
    expect(isParameterSet(set)).toBe(true);
    expect(ensureParameterSet(set)).toBe(set);
    expect(isParameterSet({ A: ['a1', 'a2'] })).toBe(false);
  });
});

describe('assertValidParameters', () => {
  it('rejects fewer than two parameters', () => {
    expect(() =>
      assertValidParameters([{ name: 'Browser', values: ['Chrome', 'Firefox'] }])
    ).toThrowError('At least 2 parameters are required, got 1');
    expect(codeOf(() => assertValidParameters([]))).toBe(
      ErrorCode.TOO_FEW_PARAMETERS
    );
  });

  it('rejects a one-value domain with the parameter in context', () => {
    try {
      createParameterSet({ Browser: ['Chrome', 'Firefox'], OS: ['Mac'] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PreconditionError);
      if (error instanceof PreconditionError) {
        expect(error.errorCode).toBe(ErrorCode.TOO_FEW_VALUES);
        expect(error.message).toBe('Parameter "OS" needs at least 2 values, got 1');
        expect(error.parameter).toBe('OS');
        expect(error.rule).toBe('min-values');
      }
    }
  });

  it.each([
    {
      label: 'an empty name',
      definitions: [
        { name: '', values: ['a', 'b'] },
        { name: 'B', values: ['b1', 'b2'] },
      ],
      code: ErrorCode.EMPTY_PARAMETER_NAME,
    },
    {
      label: 'a duplicate name',
      definitions: [
        { name: 'A', values: ['a1', 'a2'] },
        { name: 'A', values: ['b1', 'b2'] },
      ],
      code: ErrorCode.DUPLICATE_PARAMETER_NAME,
    },
    {
      label: 'an empty value',
      definitions: [
        { name: 'A', values: ['a1', ''] },
        { name: 'B', values: ['b1', 'b2'] },
      ],
      code: ErrorCode.EMPTY_VALUE,
    },
    {
      label: 'a duplicate value',
      definitions: [
        { name: 'A', values: ['a1', 'a1'] },
        { name: 'B', values: ['b1', 'b2'] },
      ],
      code: ErrorCode.DUPLICATE_VALUE,
    },
  ])('rejects $label', ({ definitions, code }) => {
    expect(codeOf(() => assertValidParameters(definitions))).toBe(code);
  });

  it('reports the first violation in declaration order', () => {
    expect(
      codeOf(() =>
        assertValidParameters([
          { name: 'A', values: ['a1'] },
          { name: 'A', values: ['b1', 'b2'] },
        ])
      )
    ).toBe(ErrorCode.TOO_FEW_VALUES);
  });
});

describe('processingOrder', () => {
  const set = createParameterSet({
    A: ['1', '2'],
    B: ['1', '2', '3'],
    C: ['1', '2'],
    D: ['1', '2', '3'],
  });

  it('keeps declaration order by default', () => {
    expect(processingOrder(set, 'declared')).toEqual([0, 1, 2, 3]);
  });

  it('sorts largest domains first, stable on declaration order', () => {
    expect(processingOrder(set, 'largest-domain-first')).toEqual([1, 3, 0, 2]);
  });
});
