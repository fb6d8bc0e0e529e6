/**
 * Error hierarchy for Pairforge
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  parameter?: string; // Parameter name involved in the failure
  value?: string; // Value label involved in the failure
  rule?: string; // Short identifier of the violated rule
  testCaseIndex?: number; // 0-based row index for suite-level failures
  setting?: string; // Option name for configuration failures
  input?: string; // Input file or source label
  position?: number;
  // Allow unknown extras for callers attaching diagnostics
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  suggestions?: string[];
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  parameter?: string;
  value?: string;
}

export interface PairforgeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  suggestions?: string[];
  cause?: Error;
}

type SubclassParams = Omit<PairforgeErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Base error class for all Pairforge errors
 */
export abstract class PairforgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  public suggestions?: string[];
  public documentation?: string;

  constructor(params: PairforgeErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
    this.suggestions = params.suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      suggestions: this.suggestions,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      parameter: this.context?.parameter,
      value: this.context?.value,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Input that breaks a precondition of the engine (parameter count, domain
 * size, empty or duplicate labels, malformed test cases).
 */
export class PreconditionError extends PairforgeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.TOO_FEW_PARAMETERS,
    });
  }

  get parameter(): string | undefined {
    return this.context?.parameter;
  }

  get rule(): string | undefined {
    return this.context?.rule;
  }
}

/**
 * The greedy builder failed to reach full coverage within its safety bound.
 * Signals an engine defect, never bad input.
 */
export class InternalConsistencyError extends PairforgeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.COVERAGE_NOT_REACHED,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends PairforgeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Parser errors (unreadable or malformed parameter and suite files)
 */
export class ParseError extends PairforgeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
    });
  }

  get input(): string | undefined {
    return this.context?.input;
  }
}

/**
 * Utility functions for error handling
 */
export function isPairforgeError(error: unknown): error is PairforgeError {
  return error instanceof PairforgeError;
}
