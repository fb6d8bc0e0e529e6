import { describe, it, expect } from 'vitest';
import { buildSuiteReport } from '../report.js';
import { analyzeCoverage } from '../analyzer.js';
import { createParameterSet } from '../../model/parameters.js';
import { enumeratePairs } from '../../pairs/enumerator.js';

const set = createParameterSet({ A: ['a1', 'a2'], B: ['b1', 'b2'] });
const required = enumeratePairs(set);

describe('buildSuiteReport', () => {
  it('summarizes a generated suite row by row', () => {
    const testSuite = [
      ['a1', 'b1'],
      ['a2', 'b1'],
      ['a1', 'b2'],
    ];
    const report = buildSuiteReport({
      parameters: set,
      testSuite,
      analysis: analyzeCoverage(testSuite, required, set),
      seedCount: 1,
      options: { order: 'declared', reduce: true },
    });

    expect(report.version).toBe(1);
    expect(report.tool).toEqual({ name: 'pairforge', version: '0.1.0' });
    expect(report.parameters).toEqual([
      { name: 'A', values: ['a1', 'a2'] },
      { name: 'B', values: ['b1', 'b2'] },
    ]);
    expect(report.summary).toEqual({
      totalRequiredPairs: 4,
      totalTestCases: 3,
      coveredPairs: 3,
      uncoveredPairs: 1,
      coverageRatio: 0.75,
      complete: false,
      seedTestCases: 1,
      droppedTestCases: 0,
    });
    expect(report.testCases[0]).toEqual({
      index: 1,
      values: ['a1', 'b1'],
      newUniquePairs: 1,
      pairs: 1,
      seeded: true,
    });
    expect(report.testCases[1]?.seeded).toBeUndefined();
    expect(report.uncoveredPairs).toEqual([
      {
        first: { parameter: 'A', value: 'a2' },
        second: { parameter: 'B', value: 'b2' },
      },
    ]);
    expect(report.options).toEqual({ order: 'declared', reduce: true });
    expect(report.metrics).toBeUndefined();
  });

  it('keeps numeric metrics only', () => {
    const report = buildSuiteReport({
      parameters: set,
      testSuite: [],
      analysis: analyzeCoverage([], required, set),
      metrics: {
        enumerateMs: 1,
        buildMs: 2,
        reduceMs: 0,
        analyzeMs: 0,
        requiredPairs: 4,
        candidatesBuilt: 0,
        valuesScored: 0,
        seedTestCases: 0,
        testCasesDropped: 0,
        iterationGains: [1],
      },
    });
    expect(report.metrics).toEqual({
      enumerateMs: 1,
      buildMs: 2,
      reduceMs: 0,
      analyzeMs: 0,
      requiredPairs: 4,
      candidatesBuilt: 0,
      valuesScored: 0,
      seedTestCases: 0,
      testCasesDropped: 0,
    });
  });
});
