import {
  isParameterDefinitionList,
  type ParameterDefinition,
  type ParameterInput,
  type ParameterOrder,
} from '@pairforge/shared';
import { ErrorCode } from '../errors/codes.js';
import { PreconditionError } from '../types/errors.js';
import type { Parameter, ParameterSet } from '../types/model.js';

export const MIN_PARAMETERS = 2;
export const MIN_VALUES_PER_PARAMETER = 2;

const VALIDATED_SETS = new WeakSet<object>();

function toDefinitions(input: ParameterInput): readonly ParameterDefinition[] {
  if (isParameterDefinitionList(input)) {
    return input;
  }
  return Object.entries(input).map(([name, values]) => ({ name, values }));
}

/**
 * Check every boundary invariant of a parameter list, in declaration order.
 * Throws PreconditionError on the first violation.
 */
// eslint-disable-next-line complexity
export function assertValidParameters(
  definitions: readonly ParameterDefinition[]
): void {
  if (definitions.length < MIN_PARAMETERS) {
    throw new PreconditionError({
      message: `At least ${MIN_PARAMETERS} parameters are required, got ${definitions.length}`,
      errorCode: ErrorCode.TOO_FEW_PARAMETERS,
      context: { rule: 'min-parameters' },
      suggestions: ['Add another parameter with at least 2 values'],
    });
  }

  const names = new Set<string>();
  definitions.forEach((definition, position) => {
    const { name, values } = definition;
    if (typeof name !== 'string' || name.length === 0) {
      throw new PreconditionError({
        message: `Parameter #${position + 1} has an empty name`,
        errorCode: ErrorCode.EMPTY_PARAMETER_NAME,
        context: { rule: 'non-empty-name', position },
      });
    }
    if (names.has(name)) {
      throw new PreconditionError({
        message: `Parameter name "${name}" is declared more than once`,
        errorCode: ErrorCode.DUPLICATE_PARAMETER_NAME,
        context: { rule: 'unique-name', parameter: name, position },
        suggestions: [`Rename or merge the duplicate "${name}" parameters`],
      });
    }
    names.add(name);

    if (!Array.isArray(values) || values.length < MIN_VALUES_PER_PARAMETER) {
      const count = Array.isArray(values) ? values.length : 0;
      throw new PreconditionError({
        message: `Parameter "${name}" needs at least ${MIN_VALUES_PER_PARAMETER} values, got ${count}`,
        errorCode: ErrorCode.TOO_FEW_VALUES,
        context: { rule: 'min-values', parameter: name },
        suggestions: [
          `Add at least ${MIN_VALUES_PER_PARAMETER} values to "${name}"`,
        ],
      });
    }

    const seen = new Set<string>();
    for (const value of values) {
      if (typeof value !== 'string' || value.length === 0) {
        throw new PreconditionError({
          message: `Parameter "${name}" has an empty value`,
          errorCode: ErrorCode.EMPTY_VALUE,
          context: { rule: 'non-empty-value', parameter: name },
        });
      }
      if (seen.has(value)) {
        throw new PreconditionError({
          message: `Parameter "${name}" lists value "${value}" more than once`,
          errorCode: ErrorCode.DUPLICATE_VALUE,
          context: { rule: 'unique-value', parameter: name, value },
        });
      }
      seen.add(value);
    }
  });
}

/**
 * Validate caller input and return a frozen private copy of it.
 */
export function createParameterSet(input: ParameterInput): ParameterSet {
  const definitions = toDefinitions(input);
  assertValidParameters(definitions);

  const parameters: Parameter[] = definitions.map((definition) =>
    Object.freeze({
      name: definition.name,
      values: Object.freeze([...definition.values]),
    })
  );
  const set: ParameterSet = Object.freeze({
    parameters: Object.freeze(parameters),
  });
  VALIDATED_SETS.add(set);
  return set;
}

export function isParameterSet(
  value: ParameterSet | ParameterInput
): value is ParameterSet {
  return VALIDATED_SETS.has(value);
}

/**
 * Accept either an already validated set or raw caller input.
 */
export function ensureParameterSet(
  input: ParameterSet | ParameterInput
): ParameterSet {
  if (isParameterSet(input)) {
    return input;
  }
  return createParameterSet(input);
}

/**
 * Fixed processing order for one run, as indices into the declared list.
 * 'largest-domain-first' is stable on declaration order.
 */
export function processingOrder(
  set: ParameterSet,
  order: ParameterOrder
): number[] {
  const indices = set.parameters.map((_, index) => index);
  if (order === 'declared') {
    return indices;
  }
  return indices.sort((left, right) => {
    const sizeDelta = domainSize(set, right) - domainSize(set, left);
    return sizeDelta !== 0 ? sizeDelta : left - right;
  });
}

function domainSize(set: ParameterSet, index: number): number {
  return set.parameters[index]?.values.length ?? 0;
}

export function toParameterDefinitions(
  set: ParameterSet
): { name: string; values: string[] }[] {
  return set.parameters.map((parameter) => ({
    name: parameter.name,
    values: [...parameter.values],
  }));
}
