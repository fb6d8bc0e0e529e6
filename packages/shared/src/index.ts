export * from './types.js';
export * from './utils.js';
export * from './types/suite-report.js';
