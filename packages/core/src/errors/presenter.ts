/**
 * ErrorPresenter - pure presentation layer for DiffProbeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type { DiffProbeError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: DiffProbeError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error),
      excerpt: error.context?.valueExcerpt,
      workaround: this.#formatWorkaround(error),
      cause: error.cause ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  #formatLocation(error: DiffProbeError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    const parts: string[] = [];
    if (ctx.file) parts.push(ctx.file);
    if (ctx.operationId) parts.push(`operation ${ctx.operationId}`);
    if (ctx.target) parts.push(`target ${ctx.target}`);
    if (ctx.path) parts.push(ctx.path);
    return parts.length > 0 ? `Location: ${parts.join(' · ')}` : undefined;
  }

  #formatWorkaround(error: DiffProbeError): string | undefined {
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
