import { describe, it, expect } from 'vitest';
import { ConfigError } from '@pairforge/core';
import {
  collect,
  parseGenerationOptions,
  resolveOutputFormat,
  resolvePairsOutputFormat,
} from '../flags.js';

describe('parseGenerationOptions', () => {
  it('maps CLI flags onto generation options', () => {
    expect(
      parseGenerationOptions({
        order: 'Largest-Domain-First',
        reduce: false,
        maxIterations: '40',
        metrics: false,
      })
    ).toEqual({
      order: 'largest-domain-first',
      reduce: false,
      maxIterations: 40,
      metrics: false,
    });
  });

  it('leaves unset flags out', () => {
    expect(parseGenerationOptions({})).toEqual({});
  });

  it('rejects a non-positive --max-iterations', () => {
    expect(() => parseGenerationOptions({ maxIterations: '0' })).toThrowError(
      'Invalid --max-iterations value "0". Expected a positive integer.'
    );
    expect(() => parseGenerationOptions({ maxIterations: 'ten' })).toThrowError(
      ConfigError
    );
  });

  it('rejects an unknown order', () => {
    expect(() => parseGenerationOptions({ order: 'shuffled' })).toThrowError(
      'Unknown parameter order "shuffled"'
    );
  });
});

describe('resolveOutputFormat', () => {
  it('defaults to table and normalizes case', () => {
    expect(resolveOutputFormat(undefined)).toBe('table');
    expect(resolveOutputFormat('')).toBe('table');
    expect(resolveOutputFormat('JSON')).toBe('json');
    expect(resolveOutputFormat('markdown')).toBe('markdown');
  });

  it('rejects unknown formats', () => {
    expect(() => resolveOutputFormat('xml')).toThrowError(
      'Invalid --out value "xml". Supported formats are "table", "json", "markdown", "html".'
    );
  });
});

describe('resolvePairsOutputFormat', () => {
  it('accepts only table and json', () => {
    expect(resolvePairsOutputFormat(undefined)).toBe('table');
    expect(resolvePairsOutputFormat('JSON')).toBe('json');
    expect(() => resolvePairsOutputFormat('markdown')).toThrowError(
      'Invalid --out value "markdown". Supported formats are "table", "json".'
    );
  });
});

describe('collect', () => {
  it('accumulates repeated values in order', () => {
    expect(collect('B=b1,b2', collect('A=a1,a2'))).toEqual([
      'A=a1,a2',
      'B=b1,b2',
    ]);
  });
});
