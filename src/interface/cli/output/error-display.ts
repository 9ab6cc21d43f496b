/**
 * 3-layer error display: Error / Cause / Hint
 */

import pc from 'picocolors';
import { formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { RevtrackError } from '../../../shared/errors.js';

/** Exit status for failed commands; 1 is reserved for `diff --exit-code` */
export const EXIT_FAILURE = 2;
export const EXIT_CANCELLED = 130;

export interface ErrorDisplay {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof RevtrackError) {
    return {
      code: error.code,
      message: error.message,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'Check your .revtrack/config.json file.';
    case 'STORE_UNAVAILABLE':
      return 'Check that .revtrack/revisions.db is readable and writable and not locked by another process.';
    case 'CONSTRAINT_VIOLATION':
      return 'The record already exists; re-run the ingestion to replace it.';
    case 'DUPLICATE_RECORD':
      return 'Each file may appear once per revision (once per archive for archive members).';
    case 'INVALID_RECORD':
      return 'crc must be 0..4294967295, size a non-negative integer and dates YYYY-MM-DD.';
    case 'MANIFEST_ERROR':
      return 'Check the manifest JSON against the documented format.';
    case 'UNKNOWN_REVISION':
      return "Run 'revtrack revisions' to list known revisions.";
    case 'NOT_ENOUGH_REVISIONS':
      return 'Ingest another revision or pass both revision names.';
    default:
      return undefined;
  }
}

export function exitCodeFor(error: ErrorDisplay): number {
  return error.code === 'CANCELLED' ? EXIT_CANCELLED : EXIT_FAILURE;
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      code: error.code,
      message: error.message,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(pc.dim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  const display = toErrorDisplay(error);
  renderError(display, globals);
  process.exit(exitCodeFor(display));
}
