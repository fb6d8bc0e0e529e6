import type { SuiteReport } from '@pairforge/shared';
import {
  renderHtmlSuite,
  renderMarkdownSuite,
  renderTable,
} from '@pairforge/reporter';
import type { OutputFormat } from './flags.js';

export function renderReport(report: SuiteReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return renderMarkdownSuite(report);
    case 'html':
      return renderHtmlSuite(report);
    case 'table':
      return renderTable(report);
  }
}
