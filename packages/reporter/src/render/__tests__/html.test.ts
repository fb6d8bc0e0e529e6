import { describe, expect, it } from 'vitest';

import { makeSuiteReport } from '../../__fixtures__/suite-report.js';
import { renderHtmlSuite } from '../html.js';

describe('renderHtmlSuite', () => {
  it('creates a full HTML document with the suite table', () => {
    const html = renderHtmlSuite(makeSuiteReport());

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<h1>Pairwise Test Suite</h1>');
    expect(html).toContain(
      '<p>Total Unique Pairs: 4 · Total Test Cases: 3</p>'
    );
    expect(html).toContain(
      '<span class="badge badge-incomplete">75.0% (3/4)</span>'
    );
    expect(html).toContain(
      '<tr class="seed"><td>1 (seed)</td><td>Chrome</td><td>Windows</td><td>1</td></tr>'
    );
    expect(html).toContain('<li>Browser=Firefox × OS=Mac</li>');
  });

  it('escapes labels', () => {
    const html = renderHtmlSuite(
      makeSuiteReport({
        parameters: [
          { name: '<Browser>', values: ['Chrome', 'Firefox'] },
          { name: 'OS', values: ['Windows', 'Mac'] },
        ],
        testCases: [
          { index: 1, values: ['"quoted"', 'Mac'], newUniquePairs: 1, pairs: 1 },
        ],
        uncoveredPairs: [],
      })
    );
    expect(html).toContain('<th>&lt;Browser&gt;</th>');
    expect(html).toContain('<td>&quot;quoted&quot;</td>');
    expect(html).toContain('Every required pair is covered.');
    expect(html).not.toContain('<h2>Metrics</h2>');
  });
});
