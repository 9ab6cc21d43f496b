/**
 * commander argument parsers
 */

import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/** Decimal or 0x-prefixed hex 32-bit checksum */
export function parseCrc(value: string): number {
  let parsed: number;
  if (/^0x[0-9a-f]{1,8}$/i.test(value)) {
    parsed = parseInt(value.slice(2), 16);
  } else if (/^\d+$/.test(value)) {
    parsed = Number(value);
  } else {
    throw new InvalidArgumentError('Must be a decimal or 0x-prefixed hex checksum.');
  }
  if (parsed > 0xffffffff) {
    throw new InvalidArgumentError('Must fit in 32 bits.');
  }
  return parsed;
}
