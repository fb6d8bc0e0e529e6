import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SuiteReport } from '@pairforge/shared';
import { createProgram, main, resolveParameters } from './index.js';
import { stripAnsi } from './render.js';

async function run(args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('pairforge CLI', () => {
  let stdout: string[] = [];
  let stderr: string[] = [];
  let errors: string[] = [];
  let dir = '';

  beforeEach(async () => {
    stdout = [];
    stderr = [];
    errors = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation((message?: unknown) => {
      errors.push(stripAnsi(String(message)));
    });
    vi.spyOn(process, 'exit').mockImplementation(
      (code?: string | number | null) => {
        throw new Error(`EXIT:${String(code)}`);
      }
    );
    dir = await mkdtemp(path.join(os.tmpdir(), 'pairforge-cli-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('prints the suite as an aligned table', async () => {
      await run(['generate', '--param', 'A=a1, a2', '--param', 'B=b1,b2']);

      expect(stdout.join('')).toBe(
        [
          'Total Unique Pairs: 4',
          'Total Test Cases: 4',
          '',
          'Test Case # | A  | B  | New Unique Pairs',
          '------------+----+----+-----------------',
          '1           | a1 | b1 | 1',
          '2           | a2 | b1 | 1',
          '3           | a1 | b2 | 1',
          '4           | a2 | b2 | 1',
          '',
        ].join('\n')
      );
      expect(stderr).toEqual([]);
    });

    it('prints the JSON report with --out json', async () => {
      await run([
        'generate',
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--out',
        'json',
        '--no-reduce',
      ]);

      const report: SuiteReport = JSON.parse(stdout.join(''));
      expect(report.options).toEqual({ order: 'declared', reduce: false });
      expect(report.summary.totalRequiredPairs).toBe(4);
      expect(report.summary.complete).toBe(true);
      expect(report.testCases.map((testCase) => testCase.values)).toEqual([
        ['a1', 'b1'],
        ['a2', 'b1'],
        ['a1', 'b2'],
        ['a2', 'b2'],
      ]);
      expect(report.metrics?.requiredPairs).toBe(4);
      expect(report.metrics?.candidatesBuilt).toBe(4);
    });

    it('omits metrics with --no-metrics', async () => {
      await run([
        'generate',
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--out',
        'json',
        '--no-metrics',
      ]);
      const report: SuiteReport = JSON.parse(stdout.join(''));
      expect(report.metrics).toBeUndefined();
    });

    it('places seed test cases first', async () => {
      const seeds = path.join(dir, 'seeds.json');
      await writeFile(seeds, JSON.stringify([['a2', 'b2']]), 'utf8');

      await run([
        'generate',
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--seed-suite',
        seeds,
        '--out',
        'json',
      ]);

      const report: SuiteReport = JSON.parse(stdout.join(''));
      expect(report.testCases[0]).toEqual({
        index: 1,
        values: ['a2', 'b2'],
        newUniquePairs: 1,
        pairs: 1,
        seeded: true,
      });
      expect(report.summary.seedTestCases).toBe(1);
      expect(report.summary.totalTestCases).toBe(4);
    });

    it('drops redundant rows unless --no-reduce is given', async () => {
      const fourBinary = [
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--param',
        'C=c1,c2',
        '--param',
        'D=d1,d2',
        '--out',
        'json',
      ];

      await run(['generate', ...fourBinary]);
      const reduced: SuiteReport = JSON.parse(stdout.join(''));
      stdout = [];
      await run(['generate', ...fourBinary, '--no-reduce']);
      const full: SuiteReport = JSON.parse(stdout.join(''));

      expect(reduced.summary.totalTestCases).toBe(5);
      expect(reduced.summary.droppedTestCases).toBe(1);
      expect(reduced.summary.complete).toBe(true);
      expect(full.summary.totalTestCases).toBe(6);
      expect(full.summary.droppedTestCases).toBe(0);
      expect(full.testCases[0]?.values).toEqual(['a1', 'b1', 'c1', 'd1']);
      expect(reduced.testCases[0]?.values).toEqual(['a2', 'b2', 'c2', 'd1']);
    });

    it('writes the effective config and builder trace with --debug-passes', async () => {
      await run([
        'generate',
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--debug-passes',
      ]);

      expect(stderr).toEqual([
        '[pairforge] effective config: {"order":"declared","reduce":true,"metrics":true,"seedTestCases":0}\n',
        '[pairforge] pairs: {"required":4,"parameters":2}\n',
        '[pairforge] builder: {"testCases":4,"seedTestCases":0,"dropped":0,"candidates":4}\n',
        '[pairforge] builder.gains: [1,1,1,1]\n',
      ]);
    });

    it('prints metrics to stderr with --print-metrics', async () => {
      await run(['generate', '--sample', '--print-metrics']);

      expect(stderr).toHaveLength(1);
      expect(stderr[0]?.startsWith('[pairforge] metrics: {')).toBe(true);
    });

    it('reports invalid parameters and exits with the error code', async () => {
      await expect(
        run(['generate', '--param', 'A=a1', '--param', 'B=b1,b2'])
      ).rejects.toThrow('EXIT:11');

      expect(stdout).toEqual([]);
      expect(errors[0]?.split('\n')).toEqual([
        '❌ Error E002: At least 2 values are required for each parameter: "A"',
        '📍 Parameter: A',
      ]);
    });

    it('requires a parameter source', async () => {
      await expect(run(['generate'])).rejects.toThrow('EXIT:50');
      expect(errors[0]?.split('\n')[0]).toBe(
        '❌ Error E300: No parameters given'
      );
    });

    it('rejects an unknown output format', async () => {
      await expect(run(['generate', '--sample', '--out', 'xml'])).rejects.toThrow(
        'EXIT:50'
      );
    });
  });

  describe('analyze', () => {
    it('reports the pairs an existing suite misses', async () => {
      const params = path.join(dir, 'params.json');
      const suite = path.join(dir, 'suite.json');
      await writeFile(
        params,
        JSON.stringify({ A: ['a1', 'a2'], B: ['b1', 'b2'] }),
        'utf8'
      );
      await writeFile(
        suite,
        JSON.stringify({
          testSuite: [
            ['a1', 'b1'],
            ['a2', 'b2'],
          ],
        }),
        'utf8'
      );

      await run(['analyze', '--params', params, '--suite', suite]);

      expect(stdout.join('').split('\n').slice(-5)).toEqual([
        '',
        'Uncovered pairs: 2',
        '  - A=a1 × B=b2',
        '  - A=a2 × B=b1',
        '',
      ]);
    });

    it('rejects a row outside the domain', async () => {
      const suite = path.join(dir, 'suite.json');
      await writeFile(suite, JSON.stringify([['a1', 'b9']]), 'utf8');

      await expect(
        run([
          'analyze',
          '--param',
          'A=a1,a2',
          '--param',
          'B=b1,b2',
          '--suite',
          suite,
        ])
      ).rejects.toThrow('EXIT:20');
    });
  });

  describe('pairs', () => {
    it('lists the required pair universe', async () => {
      await run(['pairs', '--param', 'A=a1,a2', '--param', 'B=b1,b2']);

      expect(stdout.join('')).toBe(
        [
          'Total Unique Pairs: 4',
          '  A=a1 × B=b1',
          '  A=a1 × B=b2',
          '  A=a2 × B=b1',
          '  A=a2 × B=b2',
          '',
        ].join('\n')
      );
    });

    it('prints the pairs as JSON', async () => {
      await run([
        'pairs',
        '--param',
        'A=a1,a2',
        '--param',
        'B=b1,b2',
        '--out',
        'json',
      ]);

      const pairs: unknown = JSON.parse(stdout.join(''));
      expect(Array.isArray(pairs) ? pairs.length : 0).toBe(4);
      expect(Array.isArray(pairs) ? pairs[0] : undefined).toEqual({
        first: { parameter: 'A', value: 'a1' },
        second: { parameter: 'B', value: 'b1' },
      });
    });

    it('rejects document formats it cannot render', async () => {
      await expect(
        run([
          'pairs',
          '--param',
          'A=a1,a2',
          '--param',
          'B=b1,b2',
          '--out',
          'html',
        ])
      ).rejects.toThrow('EXIT:50');

      expect(stdout).toEqual([]);
      expect(errors[0]?.split('\n')).toEqual([
        '❌ Error E300: Invalid --out value "html". Supported formats are "table", "json".',
        '📍 Option: out',
      ]);
    });
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts every parse from fresh option state', async () => {
    const chunks: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      chunks.push(String(chunk));
      return true;
    });
    const argv = ['node', 'pairforge', 'generate', '--sample', '--out', 'json'];

    await main([...argv, '--no-reduce']);
    const first: SuiteReport = JSON.parse(chunks.join(''));
    chunks.length = 0;
    await main(argv);
    const second: SuiteReport = JSON.parse(chunks.join(''));

    expect(first.options?.reduce).toBe(false);
    expect(second.options?.reduce).toBe(true);
  });
});

describe('resolveParameters', () => {
  it('rejects more than one parameter source', () => {
    expect(() =>
      resolveParameters({ sample: true, param: ['A=a1,a2'] })
    ).toThrowError('Use only one of --params, --param and --sample');
  });

  it('copies the sample parameters', () => {
    const parameters = resolveParameters({ sample: true });
    expect(parameters.map((parameter) => parameter.name)).toHaveLength(5);
  });
});
