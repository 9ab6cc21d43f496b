import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  EXIT_CANCELLED,
  EXIT_FAILURE,
  exitCodeFor,
  renderError,
  toErrorDisplay,
} from './error-display.js';
import {
  CancelledError,
  ManifestError,
  UnknownRevisionError,
} from '../../../shared/errors.js';

describe('toErrorDisplay', () => {
  it('should carry code, message and hint of revtrack errors', () => {
    const display = toErrorDisplay(new UnknownRevisionError('9.9'));

    expect(display.code).toBe('UNKNOWN_REVISION');
    expect(display.message).toBe('Unknown revision: 9.9');
    expect(display.hint).toBe("Run 'revtrack revisions' to list known revisions.");
    expect(display.cause).toBeUndefined();
  });

  it('should include the message of the cause', () => {
    const display = toErrorDisplay(
      new ManifestError('not valid JSON', 'scan.json', new SyntaxError('Unexpected end of JSON input')),
    );

    expect(display.message).toBe('Invalid manifest scan.json: not valid JSON');
    expect(display.cause).toBe('Unexpected end of JSON input');
  });

  it('should describe plain errors and thrown values', () => {
    expect(toErrorDisplay(new Error('boom')).message).toBe('boom');
    expect(toErrorDisplay('text')).toEqual({ message: 'text' });
  });
});

describe('exitCodeFor', () => {
  it('should use 130 for cancellation and 2 otherwise', () => {
    expect(exitCodeFor(toErrorDisplay(new CancelledError('Diff 1.0..1.1')))).toBe(EXIT_CANCELLED);
    expect(exitCodeFor(toErrorDisplay(new UnknownRevisionError('x')))).toBe(EXIT_FAILURE);
    expect(EXIT_FAILURE).toBe(2);
  });
});

describe('renderError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print a JSON error object on stdout in JSON mode', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    renderError(toErrorDisplay(new UnknownRevisionError('9.9')), {
      json: true,
      noColor: true,
      verbose: false,
      quiet: false,
      cwd: '.',
    });

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toEqual({
      error: {
        code: 'UNKNOWN_REVISION',
        message: 'Unknown revision: 9.9',
        hint: "Run 'revtrack revisions' to list known revisions.",
      },
    });
  });
});
