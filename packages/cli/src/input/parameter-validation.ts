import type { ParameterDefinition } from '@pairforge/shared';
import {
  ErrorCode,
  MIN_VALUES_PER_PARAMETER,
  PreconditionError,
} from '@pairforge/core';

/**
 * A parameter as typed by a user: a name and the raw comma-separated
 * values, before any cleanup.
 */
export interface ParameterDraft {
  name: string;
  rawValues: string | readonly string[];
}

export interface ValidationIssue {
  code: ErrorCode;
  message: string;
}

/**
 * Split a comma-separated list, trimming labels and dropping empty ones.
 */
export function splitValues(raw: string): string[] {
  return cleanValues(raw.split(','));
}

function cleanValues(values: readonly string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value !== '');
}

export function validateParameterName(
  name: string,
  existingNames: readonly string[]
): ValidationIssue | undefined {
  const trimmed = name.trim();
  if (trimmed === '') {
    return {
      code: ErrorCode.EMPTY_PARAMETER_NAME,
      message: 'Parameter name cannot be empty',
    };
  }
  if (existingNames.includes(trimmed)) {
    return {
      code: ErrorCode.DUPLICATE_PARAMETER_NAME,
      message: 'Parameter name already exists',
    };
  }
  return undefined;
}

export function validateParameterValues(
  rawValues: string | readonly string[]
): ValidationIssue | undefined {
  if (typeof rawValues === 'string' && rawValues.trim() === '') {
    return {
      code: ErrorCode.TOO_FEW_VALUES,
      message: 'Values cannot be empty',
    };
  }
  const values =
    typeof rawValues === 'string' ? splitValues(rawValues) : cleanValues(rawValues);
  if (values.length === 0) {
    return {
      code: ErrorCode.TOO_FEW_VALUES,
      message: 'No valid values provided',
    };
  }
  if (new Set(values).size !== values.length) {
    return {
      code: ErrorCode.DUPLICATE_VALUE,
      message: 'Duplicate values are not allowed',
    };
  }
  if (values.length < MIN_VALUES_PER_PARAMETER) {
    return {
      code: ErrorCode.TOO_FEW_VALUES,
      message: `At least ${MIN_VALUES_PER_PARAMETER} values are required for each parameter`,
    };
  }
  return undefined;
}

/**
 * Clean and check user drafts in order, failing on the first issue.
 * The result is ready to hand to the engine.
 */
export function toParameterDefinitions(
  drafts: readonly ParameterDraft[]
): ParameterDefinition[] {
  const definitions: ParameterDefinition[] = [];
  for (const draft of drafts) {
    const name = draft.name.trim();
    const issue =
      validateParameterName(
        draft.name,
        definitions.map((definition) => definition.name)
      ) ?? validateParameterValues(draft.rawValues);
    if (issue) {
      throw new PreconditionError({
        message: name === '' ? issue.message : `${issue.message}: "${name}"`,
        errorCode: issue.code,
        context: { rule: 'caller-validation', parameter: name || undefined },
      });
    }
    const values =
      typeof draft.rawValues === 'string'
        ? splitValues(draft.rawValues)
        : cleanValues(draft.rawValues);
    definitions.push({ name, values });
  }
  return definitions;
}
