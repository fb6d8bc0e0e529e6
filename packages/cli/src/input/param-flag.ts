import { ParseError } from '@pairforge/core';
import type { ParameterDraft } from './parameter-validation.js';

/**
 * Parse one `--param "Name=v1, v2"` flag. The name ends at the first '='.
 */
export function parseParamFlag(raw: string): ParameterDraft {
  const separator = raw.indexOf('=');
  if (separator === -1) {
    throw new ParseError({
      message: `Invalid --param value "${raw}". Expected Name=value1, value2`,
      context: { input: '--param' },
      suggestions: ['Example: --param "OS=Windows, Mac, Linux"'],
    });
  }
  return {
    name: raw.slice(0, separator),
    rawValues: raw.slice(separator + 1),
  };
}
