/**
 * ErrorPresenter - pure presentation layer for PairforgeError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode, getHttpStatus } from './codes.js';
import type { PairforgeError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  detail?: string;
  workaround?: string;
  documentation?: string;
  colors: boolean;
  terminalWidth: number;
}

export interface APIErrorView {
  status: number;
  type: string;
  title: string;
  detail: string;
  instance?: string;
  code: ErrorCode;
  parameter?: string;
  suggestions: string[];
}

export type ProductionView = SerializedError & { requestId?: string };

/**
 * Engine defects surface with a generic title; the underlying message is
 * kept as detail in dev only.
 */
const GENERIC_FAILURE_TITLE = 'Could not generate a valid test suite';

function isEngineDefect(code: ErrorCode): boolean {
  return (
    code === ErrorCode.COVERAGE_NOT_REACHED ||
    code === ErrorCode.INTERNAL_ERROR
  );
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PairforgeError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error),
      detail: this.#formatDetail(error),
      workaround: this.#formatWorkaround(error),
      documentation: error.documentation,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForAPI(error: PairforgeError): APIErrorView {
    const defect = isEngineDefect(error.errorCode);
    return {
      status: getHttpStatus(error.errorCode),
      type: `urn:pairforge:error:${error.errorCode}`,
      title: defect ? GENERIC_FAILURE_TITLE : error.message,
      detail: defect ? GENERIC_FAILURE_TITLE : this.#getDetail(error),
      instance: this.#getRequestId(),
      code: error.errorCode,
      parameter: error.context?.parameter,
      suggestions: error.suggestions ?? [],
    };
  }

  formatForProduction(error: PairforgeError): ProductionView {
    return { ...error.toJSON('prod'), requestId: this.#getRequestId() };
  }

  // Helpers
  #formatTitle(error: PairforgeError): string {
    const message = isEngineDefect(error.errorCode)
      ? GENERIC_FAILURE_TITLE
      : error.message;
    return `Error ${error.errorCode}: ${message}`;
  }

  #formatLocation(error: PairforgeError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    if (ctx.parameter !== undefined && ctx.value !== undefined) {
      return `Parameter: ${ctx.parameter} = ${ctx.value}`;
    }
    if (ctx.parameter !== undefined) return `Parameter: ${ctx.parameter}`;
    if (ctx.testCaseIndex !== undefined) {
      return `Test case: #${ctx.testCaseIndex + 1}`;
    }
    if (ctx.setting !== undefined) return `Option: ${ctx.setting}`;
    if (ctx.input !== undefined) return `Input: ${ctx.input}`;
    return undefined;
  }

  #formatDetail(error: PairforgeError): string | undefined {
    if (!isEngineDefect(error.errorCode)) return undefined;
    return this._env === 'dev' ? error.message : undefined;
  }

  #formatWorkaround(error: PairforgeError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return undefined;
  }

  #getDetail(error: PairforgeError): string {
    const parts: string[] = [error.message];
    const parameter = error.context?.parameter;
    if (parameter !== undefined) parts.push(`(parameter "${parameter}")`);
    return parts.join(' ');
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
