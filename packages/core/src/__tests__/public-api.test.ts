import { describe, it, expect } from 'vitest';
import {
  AnalyzeCoverage,
  EnumerateAndBuild,
  ErrorCode,
  GenerateSuite,
  PreconditionError,
  createParameterSet,
  type GenerationOptions,
} from '../index.js';

const browsers = {
  Browser: ['Chrome', 'Firefox'],
  OS: ['Windows', 'Mac'],
  Language: ['EN', 'FR'],
};

describe('public API surface', () => {
  it('EnumerateAndBuild returns the suite with its universe and parameters', () => {
    const result = EnumerateAndBuild(browsers);
    expect(result.requiredPairs.size).toBe(12);
    expect(result.testSuite).toHaveLength(4);
    expect(result.parameters.parameters.map((p) => p.name)).toEqual([
      'Browser',
      'OS',
      'Language',
    ]);
  });

  it('AnalyzeCoverage accepts raw parameter input', () => {
    const { testSuite, requiredPairs } = EnumerateAndBuild(browsers);
    const analysis = AnalyzeCoverage(testSuite, requiredPairs, browsers);
    expect(analysis.summary.complete).toBe(true);
    expect(analysis.newUniqueCounts).toEqual([3, 3, 3, 3]);
  });

  it('accepts an already validated parameter set', () => {
    const set = createParameterSet(browsers);
    expect(EnumerateAndBuild(set).parameters).toBe(set);
  });

  it('rejects invalid parameters before returning anything', () => {
    let result: ReturnType<typeof EnumerateAndBuild> | undefined;
    try {
      result = EnumerateAndBuild({ Browser: ['Chrome'], OS: ['Windows', 'Mac'] });
    } catch (error) {
      expect(error).toBeInstanceOf(PreconditionError);
      if (error instanceof PreconditionError) {
        expect(error.errorCode).toBe(ErrorCode.TOO_FEW_VALUES);
      }
    }
    expect(result).toBeUndefined();
  });

  it('GenerateSuite builds the report and metrics in one call', () => {
    const options: GenerationOptions = { order: 'declared' };
    const result = GenerateSuite(browsers, options);
    expect(result.report.summary.totalRequiredPairs).toBe(12);
    expect(result.report.summary.totalTestCases).toBe(4);
    expect(result.report.testCases.map((row) => row.newUniquePairs)).toEqual([
      3, 3, 3, 3,
    ]);
    expect(result.report.options).toEqual({ order: 'declared', reduce: true });
    expect(result.metrics?.candidatesBuilt).toBe(4);
    expect(result.metrics?.requiredPairs).toBe(12);
    expect(result.report.metrics?.candidatesBuilt).toBe(4);
  });

  it('GenerateSuite leaves metrics out when disabled', () => {
    const result = GenerateSuite(browsers, { metrics: false });
    expect(result.metrics).toBeUndefined();
    expect(result.report.metrics).toBeUndefined();
  });
});
