import type { SuiteReport } from '@pairforge/shared';
import { formatCoverage, formatReportPair, testCaseTable } from './format.js';

function escapeHtml(value: unknown): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderSuiteTable(report: SuiteReport): string {
  const { header, rows } = testCaseTable(report);
  if (rows.length === 0) {
    return '<p class="empty">No test cases.</p>';
  }
  const head = header.map((cell) => `<th>${escapeHtml(cell)}</th>`).join('');
  const body = rows
    .map((row, position) => {
      const seeded = report.testCases[position]?.seeded === true;
      const cells = row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join('');
      return seeded ? `<tr class="seed">${cells}</tr>` : `<tr>${cells}</tr>`;
    })
    .join('');
  return `<table><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}

function renderUncovered(report: SuiteReport): string {
  if (report.uncoveredPairs.length === 0) {
    return '<p class="empty">Every required pair is covered.</p>';
  }
  const items = report.uncoveredPairs
    .map((pair) => `<li>${escapeHtml(formatReportPair(pair))}</li>`)
    .join('');
  return `<ul>${items}</ul>`;
}

function renderMetrics(metrics: Record<string, number> | undefined): string {
  if (!metrics) {
    return '';
  }
  const rows = Object.entries(metrics)
    .map(
      ([name, value]) =>
        `<tr><td>${escapeHtml(name)}</td><td>${escapeHtml(value)}</td></tr>`
    )
    .join('');
  return `
  <section>
    <h2>Metrics</h2>
    <table>
      <thead><tr><th>Metric</th><th>Value</th></tr></thead>
      <tbody>${rows}</tbody>
    </table>
  </section>`;
}

export function renderHtmlSuite(report: SuiteReport): string {
  const { summary } = report;
  const badgeClass = summary.complete ? 'badge badge-complete' : 'badge badge-incomplete';

  const styles = `body{font-family:system-ui,Segoe UI,sans-serif;margin:0;padding:2rem;background:#f7f7f8;color:#111}
header.hero{margin-bottom:2rem}
section{background:#fff;border-radius:0.75rem;padding:1.5rem;margin-bottom:1.5rem;box-shadow:0 1px 4px rgba(15,23,42,.08)}
h1{margin:0 0 .5rem 0;font-size:2rem}
.badge{display:inline-flex;align-items:center;padding:0.2rem 0.6rem;border-radius:999px;font-size:0.85rem;font-weight:600}
.badge-complete{background:#d1fae5;color:#047857}
.badge-incomplete{background:#fee2e2;color:#b91c1c}
table{width:100%;border-collapse:collapse;margin-top:0.5rem}
th,td{border:1px solid #e5e7eb;padding:0.5rem;text-align:left;font-size:0.9rem}
tr.seed td{background:#eef2ff}
.empty{color:#6b7280;font-style:italic}
`;

  const options = report.options
    ? `<p>Order ${escapeHtml(report.options.order)} · Reduction ${report.options.reduce ? 'on' : 'off'}</p>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>Pairwise Test Suite</title>
  <style>${styles}</style>
</head>
<body>
  <header class="hero">
    <h1>Pairwise Test Suite</h1>
    <p>Tool ${escapeHtml(report.tool.name)} ${escapeHtml(report.tool.version)}</p>
    <p>Total Unique Pairs: ${summary.totalRequiredPairs} · Total Test Cases: ${summary.totalTestCases}</p>
    <p><span class="${badgeClass}">${escapeHtml(formatCoverage(report))}</span></p>
    ${options}
  </header>

  <section>
    <h2>Test Cases</h2>
    ${renderSuiteTable(report)}
  </section>

  <section>
    <h2>Uncovered Pairs</h2>
    ${renderUncovered(report)}
  </section>
${renderMetrics(report.metrics)}
</body>
</html>`;
}
