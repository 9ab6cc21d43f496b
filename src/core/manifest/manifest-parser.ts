/**
 * Scan manifest parsing
 *
 * A scanner describes one revision as JSON:
 *   { revision, date?, files: [{ name, crc, size }], wads: [{ name, files: [...] }] }
 * crc is a number or a hex string such as "0x1a2b3c4d".
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { IngestInput } from '../../shared/types.js';
import { ManifestError, toError } from '../../shared/errors.js';
import { isCalendarDate, toCalendarDate } from '../../shared/date.js';
import { MAX_CRC } from '../ingest/revision-ingestor.js';

const crcSchema = z.union([
  z.number().int().min(0).max(MAX_CRC),
  z
    .string()
    .regex(/^0x[0-9a-f]{1,8}$/i, 'must be a hex string like 0x1a2b3c4d')
    .transform((value) => parseInt(value.slice(2), 16)),
]);

const fileSchema = z.object({
  name: z.string().min(1),
  crc: crcSchema,
  size: z.number().int().nonnegative(),
});

export const manifestSchema = z.object({
  revision: z.string().min(1),
  date: z
    .string()
    .refine(isCalendarDate, 'must be a YYYY-MM-DD calendar date')
    .optional(),
  files: z.array(fileSchema).default([]),
  wads: z
    .array(
      z.object({
        name: z.string().min(1),
        files: z.array(fileSchema).default([]),
      }),
    )
    .default([]),
});

export type ScanManifest = z.infer<typeof manifestSchema>;

/**
 * Validate parsed JSON and flatten it into ingestion input.
 * Duplicate names are kept as-is; the ingestor rejects them.
 */
export function parseManifest(
  data: unknown,
  source: string,
  today: () => string = toCalendarDate,
): IngestInput {
  const parsed = manifestSchema.safeParse(data);
  if (!parsed.success) {
    throw new ManifestError(formatIssues(parsed.error), source);
  }

  const manifest = parsed.data;
  return {
    revision: manifest.revision,
    date: manifest.date ?? today(),
    files: manifest.files.map((f) => ({ name: f.name, crc: f.crc, size: f.size })),
    wadFiles: manifest.wads.flatMap((wad) =>
      wad.files.map((f) => ({ name: f.name, wadName: wad.name, crc: f.crc, size: f.size })),
    ),
  };
}

export async function readManifest(filepath: string): Promise<IngestInput> {
  let raw: string;
  try {
    raw = await readFile(filepath, 'utf-8');
  } catch (err) {
    throw new ManifestError('cannot read file', filepath, toError(err));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError('not valid JSON', filepath, toError(err));
  }

  return parseManifest(data, filepath);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
