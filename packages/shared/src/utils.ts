// Shared utilities for pairforge packages

export const LOG_PREFIX = '[pairforge]';

/**
 * Format a single stderr log line with the tool prefix and a trailing newline.
 */
export const formatLogLine = (scope: string, payload: unknown): string => {
  const body = typeof payload === 'string' ? payload : JSON.stringify(payload);
  return `${LOG_PREFIX} ${scope}: ${body}\n`;
};

export const TOOL_NAME = 'pairforge';
export const TOOL_VERSION = '0.1.0';
