import type { SuiteReport } from '@pairforge/shared';
import { formatReportPair, testCaseTable } from './format.js';

function padRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, column) => cell.padEnd(widths[column] ?? 0))
    .join(' | ')
    .trimEnd();
}

/**
 * Plain-text rendering for terminals: the two aggregate metrics, then one
 * aligned row per test case.
 */
export function renderTable(report: SuiteReport): string {
  const { header, rows } = testCaseTable(report);
  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...rows.map((row) => (row[column] ?? '').length))
  );

  const lines = [
    `Total Unique Pairs: ${report.summary.totalRequiredPairs}`,
    `Total Test Cases: ${report.summary.totalTestCases}`,
    '',
    padRow(header, widths),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...rows.map((row) => padRow(row, widths)),
  ];

  if (report.uncoveredPairs.length > 0) {
    lines.push('', `Uncovered pairs: ${report.uncoveredPairs.length}`);
    for (const pair of report.uncoveredPairs) {
      lines.push(`  - ${formatReportPair(pair)}`);
    }
  }

  return lines.join('\n');
}
