// @pairforge/reporter: pure renderers over a SuiteReport

export { renderTable } from './render/table.js';
export { renderMarkdownSuite } from './render/markdown.js';
export { renderHtmlSuite } from './render/html.js';
export { formatCoverage, formatReportPair } from './render/format.js';
