/**
 * Configuration options for the Pairforge generation run
 *
 * All options are optional with conservative defaults.
 */

import { PARAMETER_ORDERS, type ParameterOrder } from '@pairforge/shared';
import { ConfigError } from './errors.js';
import type { TestCase } from './model.js';

export interface GenerationOptions {
  /** Parameter processing order inside each candidate (default: 'declared') */
  order?: ParameterOrder;
  /** Drop redundant generated test cases once coverage is complete (default: true) */
  reduce?: boolean;
  /**
   * Safety bound on greedy iterations (default: number of required pairs).
   * Reaching it without full coverage raises InternalConsistencyError.
   */
  maxIterations?: number;
  /** Caller-supplied test cases placed at the front of the suite (default: none) */
  seedTestCases?: readonly TestCase[];
  /** Collect timings and counters (default: true) */
  metrics?: boolean;
}

export interface ResolvedOptions {
  order: ParameterOrder;
  reduce: boolean;
  maxIterations: number | undefined;
  seedTestCases: readonly TestCase[];
  metrics: boolean;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = {
  order: 'declared',
  reduce: true,
  maxIterations: undefined,
  seedTestCases: [],
  metrics: true,
};

/**
 * Merge user options over DEFAULT_OPTIONS and validate the result.
 */
export function resolveOptions(
  userOptions: Partial<GenerationOptions> = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    order: userOptions.order ?? DEFAULT_OPTIONS.order,
    reduce: userOptions.reduce ?? DEFAULT_OPTIONS.reduce,
    maxIterations: userOptions.maxIterations ?? DEFAULT_OPTIONS.maxIterations,
    seedTestCases: userOptions.seedTestCases ?? DEFAULT_OPTIONS.seedTestCases,
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function isParameterOrder(value: unknown): value is ParameterOrder {
  return PARAMETER_ORDERS.some((order) => order === value);
}

function unknownOrder(value: unknown): ConfigError {
  return new ConfigError({
    message: `Unknown parameter order "${String(value)}"`,
    context: { setting: 'order' },
    suggestions: [`Use one of: ${PARAMETER_ORDERS.join(', ')}`],
  });
}

/**
 * Narrow a user-supplied string (CLI flag, config file) to a ParameterOrder.
 */
export function parseParameterOrder(value: string): ParameterOrder {
  if (!isParameterOrder(value)) {
    throw unknownOrder(value);
  }
  return value;
}

function validateOptions(options: ResolvedOptions): void {
  if (!isParameterOrder(options.order)) {
    throw unknownOrder(options.order);
  }

  if (
    options.maxIterations !== undefined &&
    (!Number.isInteger(options.maxIterations) || options.maxIterations < 1)
  ) {
    throw new ConfigError({
      message: 'maxIterations must be a positive integer when set',
      context: { setting: 'maxIterations' },
    });
  }

  if (!Array.isArray(options.seedTestCases)) {
    throw new ConfigError({
      message: 'seedTestCases must be an array of test cases',
      context: { setting: 'seedTestCases' },
    });
  }
}
