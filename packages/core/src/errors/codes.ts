/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Precondition Errors (E001–E099)
  TOO_FEW_PARAMETERS = 'E001',
  TOO_FEW_VALUES = 'E002',
  EMPTY_PARAMETER_NAME = 'E003',
  DUPLICATE_PARAMETER_NAME = 'E004',
  EMPTY_VALUE = 'E005',
  DUPLICATE_VALUE = 'E006',
  INVALID_TEST_CASE = 'E010',
  INCOMPATIBLE_ASSIGNMENTS = 'E011',
  UNKNOWN_PAIR = 'E012',

  // Generation Errors (E100–E199)
  COVERAGE_NOT_REACHED = 'E100',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.TOO_FEW_PARAMETERS]: 10,
  [ErrorCode.TOO_FEW_VALUES]: 11,
  [ErrorCode.EMPTY_PARAMETER_NAME]: 12,
  [ErrorCode.DUPLICATE_PARAMETER_NAME]: 13,
  [ErrorCode.EMPTY_VALUE]: 14,
  [ErrorCode.DUPLICATE_VALUE]: 15,
  [ErrorCode.INVALID_TEST_CASE]: 20,
  [ErrorCode.INCOMPATIBLE_ASSIGNMENTS]: 21,
  [ErrorCode.UNKNOWN_PAIR]: 22,
  [ErrorCode.COVERAGE_NOT_REACHED]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

// HTTP status mapping for API responses
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.TOO_FEW_PARAMETERS]: 400,
  [ErrorCode.TOO_FEW_VALUES]: 400,
  [ErrorCode.EMPTY_PARAMETER_NAME]: 400,
  [ErrorCode.DUPLICATE_PARAMETER_NAME]: 400,
  [ErrorCode.EMPTY_VALUE]: 400,
  [ErrorCode.DUPLICATE_VALUE]: 400,
  [ErrorCode.INVALID_TEST_CASE]: 422,
  [ErrorCode.INCOMPATIBLE_ASSIGNMENTS]: 400,
  [ErrorCode.UNKNOWN_PAIR]: 422,
  [ErrorCode.COVERAGE_NOT_REACHED]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 400,
  [ErrorCode.PARSE_ERROR]: 400,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

// Stable helper functions (preferred over direct mapping usage via root API)
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
