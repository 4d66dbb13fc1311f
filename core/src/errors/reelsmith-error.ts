import {
  getErrorCategory,
  type ErrorCategory,
  type ErrorCodeValue,
} from './codes.js';

export interface CreateErrorOptions {
  /** Scene the failure belongs to, when it is scoped to one */
  sceneIndex?: number;
  /** Exit status of the external tool that failed */
  exitCode?: number;
  /** Element context (e.g., "primary source", "output path /tmp/x.mp4") */
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base error for every failure the composition engine surfaces.
 *
 * The category is derived from the code, so callers route on `code` or
 * `category` rather than on subclasses.
 */
export class ReelsmithError extends Error {
  readonly code: ErrorCodeValue;
  readonly category: ErrorCategory;
  readonly sceneIndex?: number;
  readonly exitCode?: number;
  readonly context?: string;
  readonly suggestion?: string;

  constructor(code: ErrorCodeValue, message: string, options: CreateErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ReelsmithError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.sceneIndex = options.sceneIndex;
    this.exitCode = options.exitCode;
    this.context = options.context;
    this.suggestion = options.suggestion;
  }
}

export function createReelsmithError(
  code: ErrorCodeValue,
  message: string,
  options: CreateErrorOptions = {}
): ReelsmithError {
  return new ReelsmithError(code, message, options);
}

export function isReelsmithError(error: unknown): error is ReelsmithError {
  return error instanceof ReelsmithError;
}

export function hasErrorCode(error: unknown, code: ErrorCodeValue): error is ReelsmithError {
  return isReelsmithError(error) && error.code === code;
}

/**
 * Formats an error for terminal display.
 */
export function formatError(error: unknown): string {
  if (!isReelsmithError(error)) {
    return error instanceof Error ? error.message : String(error);
  }

  const parts: string[] = [`[${error.code}] ${error.message}`];
  if (error.sceneIndex !== undefined) {
    parts.push(`  Scene: ${error.sceneIndex}`);
  }
  if (error.context) {
    parts.push(`  Context: ${error.context}`);
  }
  if (error.exitCode !== undefined) {
    parts.push(`  Exit code: ${error.exitCode}`);
  }
  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }
  return parts.join('\n');
}
