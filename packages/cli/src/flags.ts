import {
  ConfigError,
  parseParameterOrder,
  type GenerationOptions,
} from '@pairforge/core';

export const OUTPUT_FORMATS = ['table', 'json', 'markdown', 'html'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  params?: string;
  param?: string[];
  sample?: boolean;
  order?: string;
  // Commander sets reduce=false when --no-reduce is used
  reduce?: boolean;
  maxIterations?: string | number;
  seedSuite?: string;
  suite?: string;
  out?: string;
  metrics?: boolean;
  printMetrics?: boolean;
  debugPasses?: boolean;
}

/**
 * Parse CLI options into engine GenerationOptions (seed rows are loaded
 * separately).
 */
export function parseGenerationOptions(
  options: CliOptions
): Partial<GenerationOptions> {
  const generation: Partial<GenerationOptions> = {};

  if (options.order !== undefined) {
    generation.order = parseParameterOrder(options.order.toLowerCase());
  }
  if (typeof options.reduce === 'boolean') {
    generation.reduce = options.reduce;
  }
  if (options.maxIterations !== undefined) {
    generation.maxIterations = parsePositiveInteger(
      options.maxIterations,
      'max-iterations'
    );
  }
  if (typeof options.metrics === 'boolean') {
    generation.metrics = options.metrics;
  }

  return generation;
}

function parsePositiveInteger(value: string | number, flag: string): number {
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigError({
      message: `Invalid --${flag} value "${String(value)}". Expected a positive integer.`,
      context: { setting: flag },
    });
  }
  return num;
}

export const PAIRS_OUTPUT_FORMATS = ['table', 'json'] as const;
export type PairsOutputFormat = (typeof PAIRS_OUTPUT_FORMATS)[number];

function resolveFormat<F extends string>(
  value: unknown,
  supported: readonly F[]
): F {
  const fallback = supported[0];
  if ((value === undefined || value === null || value === '') && fallback) {
    return fallback;
  }
  const raw = String(value).toLowerCase();
  const format = supported.find((candidate) => candidate === raw);
  if (format !== undefined) {
    return format;
  }
  throw new ConfigError({
    message: `Invalid --out value "${String(value)}". Supported formats are ${supported.map((f) => `"${f}"`).join(', ')}.`,
    context: { setting: 'out' },
  });
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  return resolveFormat(value, OUTPUT_FORMATS);
}

/**
 * The pair listing has no document renderings, only text and JSON.
 */
export function resolvePairsOutputFormat(value: unknown): PairsOutputFormat {
  return resolveFormat(value, PAIRS_OUTPUT_FORMATS);
}

/**
 * Commander accumulator for repeatable flags.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
