/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';
import type { GlobalOptions } from '../utils/global-options.js';

export type Colors = ReturnType<typeof pc.createColors>;

export function formatSuccess(message: string): string {
  return pc.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return pc.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return pc.dim(text);
}

export function formatBold(text: string): string {
  return pc.bold(text);
}

export function shouldUseColor(globals: GlobalOptions): boolean {
  if (globals.noColor) return false;
  if (process.env['NO_COLOR']) return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/** Color functions honoring --no-color, NO_COLOR and non-TTY output */
export function getColors(globals: GlobalOptions): Colors {
  return pc.createColors(shouldUseColor(globals));
}

/** 32-bit checksum as fixed-width hex */
export function formatCrc(crc: number): string {
  return `0x${crc.toString(16).padStart(8, '0')}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
