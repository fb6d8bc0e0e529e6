import type { SuiteReport } from '@pairforge/shared';
import { formatCoverage, formatReportPair, testCaseTable } from './format.js';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function renderRow(cells: string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

function renderMetrics(metrics: Record<string, number> | undefined): string[] {
  if (!metrics) {
    return [];
  }
  const lines = ['', '## Metrics', '', '| Metric | Value |', '|---|---|'];
  for (const [name, value] of Object.entries(metrics)) {
    lines.push(`| ${name} | ${value} |`);
  }
  return lines;
}

export function renderMarkdownSuite(report: SuiteReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push('# Pairwise Test Suite', '');
  lines.push(`- Tool: ${report.tool.name} ${report.tool.version}`);
  lines.push(`- Total Unique Pairs: ${summary.totalRequiredPairs}`);
  lines.push(`- Total Test Cases: ${summary.totalTestCases}`);
  lines.push(`- Coverage: ${formatCoverage(report)}`);
  if (report.options) {
    lines.push(
      `- Order: ${report.options.order} · Reduction: ${report.options.reduce ? 'on' : 'off'}`
    );
  }
  lines.push(
    `- Seed test cases: ${summary.seedTestCases} · Dropped: ${summary.droppedTestCases}`
  );

  const { header, rows } = testCaseTable(report);
  lines.push('', '## Test Cases', '');
  lines.push(renderRow(header));
  lines.push(`|${header.map(() => '---').join('|')}|`);
  rows.forEach((row) => lines.push(renderRow(row)));

  lines.push('', '## Uncovered Pairs', '');
  if (report.uncoveredPairs.length === 0) {
    lines.push('None.');
  } else {
    report.uncoveredPairs.forEach((pair) => {
      lines.push(`- ${escapeCell(formatReportPair(pair))}`);
    });
  }

  lines.push(...renderMetrics(report.metrics));

  return lines.join('\n');
}
