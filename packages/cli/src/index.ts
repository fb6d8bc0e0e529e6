#!/usr/bin/env node

// CLI entry point
// - Command name: `pairforge` with subcommands `generate`, `analyze` and `pairs`.
// - Parameters come from --params <file>, repeatable --param "Name=v1, v2", or --sample.
//   They are cleaned and checked here before the engine sees them.
// - `generate` calls GenerateSuite from @pairforge/core and prints the suite in the
//   format chosen with --out; `analyze` reports coverage of an existing suite.
// - Logs and metrics go to stderr; stdout carries only the rendered result.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorCode,
  ErrorPresenter,
  GenerateSuite,
  PairforgeError,
  analyzeCoverage,
  buildSuiteReport,
  createParameterSet,
  enumeratePairs,
  formatPair,
  isPairforgeError,
  resolveOptions,
} from '@pairforge/core';
import {
  TOOL_NAME,
  TOOL_VERSION,
  formatLogLine,
  type ParameterDefinition,
} from '@pairforge/shared';
import { renderCLIView } from './render.js';
import {
  collect,
  parseGenerationOptions,
  resolveOutputFormat,
  resolvePairsOutputFormat,
  type CliOptions,
} from './flags.js';
import { printBuildDebug } from './debug.js';
import { renderReport } from './output.js';
import { loadParametersFile, loadSuiteFile } from './input/files.js';
import { parseParamFlag } from './input/param-flag.js';
import { toParameterDefinitions } from './input/parameter-validation.js';
import { SAMPLE_PARAMETERS } from './input/sample.js';

/**
 * Pick exactly one parameter source among --params, --param and --sample.
 */
export function resolveParameters(options: CliOptions): ParameterDefinition[] {
  const flags = options.param ?? [];
  const sources = [
    options.params !== undefined,
    flags.length > 0,
    options.sample === true,
  ].filter(Boolean).length;

  if (sources === 0) {
    throw new ConfigError({
      message: 'No parameters given',
      context: { setting: 'params' },
      suggestions: [
        'Use --params <file.json>, one --param "Name=v1, v2" per parameter, or --sample',
      ],
    });
  }
  if (sources > 1) {
    throw new ConfigError({
      message: 'Use only one of --params, --param and --sample',
      context: { setting: 'params' },
    });
  }

  if (options.params !== undefined) {
    return loadParametersFile(options.params);
  }
  if (options.sample === true) {
    return SAMPLE_PARAMETERS.map((parameter) => ({
      name: parameter.name,
      values: [...parameter.values],
    }));
  }
  return toParameterDefinitions(flags.map(parseParamFlag));
}

function addParameterOptions(command: Command): Command {
  return command
    .option('-p, --params <file>', 'Parameters JSON file')
    .option(
      '--param <spec>',
      'Parameter as "Name=v1, v2" (repeatable)',
      collect,
      []
    )
    .option('--sample', 'Use the built-in display settings parameters');
}

function writeResult(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Generate pairwise (all-pairs) test suites')
    .version(TOOL_VERSION);

  addParameterOptions(program.command('generate'))
    .description('Build a test suite covering every pair of values')
    .option(
      '--order <order>',
      'Parameter processing order: declared|largest-domain-first',
      'declared'
    )
    .option('--no-reduce', 'Keep redundant test cases')
    .option(
      '--max-iterations <number>',
      'Safety bound on greedy iterations (default: number of pairs)'
    )
    .option(
      '--seed-suite <file>',
      'JSON file of test cases to place first in the suite'
    )
    .option('--out <format>', 'Output format: table|json|markdown|html', 'table')
    .option('--no-metrics', 'Disable metrics collection')
    .option('--print-metrics', 'Print metrics as JSON to stderr', false)
    .option('--debug-passes', 'Print effective configuration to stderr')
    .action(async (options: CliOptions) => {
      try {
        const parameters = resolveParameters(options);
        const outFormat = resolveOutputFormat(options.out);
        const generation = parseGenerationOptions(options);
        if (options.seedSuite !== undefined) {
          generation.seedTestCases = loadSuiteFile(options.seedSuite);
        }

        if (options.debugPasses) {
          const { seedTestCases, ...effective } = resolveOptions(generation);
          process.stderr.write(
            formatLogLine('effective config', {
              ...effective,
              seedTestCases: seedTestCases.length,
            })
          );
        }

        const result = GenerateSuite(parameters, {
          ...generation,
          metricsVerbosity: options.debugPasses ? 'ci' : 'runtime',
        });

        if (options.debugPasses) {
          printBuildDebug(result);
        }
        writeResult(renderReport(result.report, outFormat));
        if (options.printMetrics === true && result.metrics) {
          process.stderr.write(formatLogLine('metrics', result.metrics));
        }
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  addParameterOptions(program.command('analyze'))
    .description('Report the pair coverage of an existing test suite')
    .requiredOption('-s, --suite <file>', 'Suite JSON file to analyze')
    .option('--out <format>', 'Output format: table|json|markdown|html', 'table')
    .action(async (options: CliOptions) => {
      try {
        const set = createParameterSet(resolveParameters(options));
        const outFormat = resolveOutputFormat(options.out);
        const testSuite = loadSuiteFile(options.suite ?? '');
        const requiredPairs = enumeratePairs(set);
        const analysis = analyzeCoverage(testSuite, requiredPairs, set);
        writeResult(
          renderReport(
            buildSuiteReport({ parameters: set, testSuite, analysis }),
            outFormat
          )
        );
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  addParameterOptions(program.command('pairs'))
    .description('List every pair a covering suite must exercise')
    .option('--out <format>', 'Output format: table|json', 'table')
    .action(async (options: CliOptions) => {
      try {
        const requiredPairs = enumeratePairs(
          createParameterSet(resolveParameters(options))
        );
        const outFormat = resolvePairsOutputFormat(options.out);
        const pairs = [...requiredPairs.values()];
        if (outFormat === 'json') {
          writeResult(
            JSON.stringify(
              pairs.map(({ first, second }) => ({ first, second })),
              null,
              2
            )
          );
          return;
        }
        writeResult(
          [
            `Total Unique Pairs: ${pairs.length}`,
            ...pairs.map((pair) => `  ${formatPair(pair)}`),
          ].join('\n')
        );
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PairforgeError;
  if (isPairforgeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends PairforgeError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
