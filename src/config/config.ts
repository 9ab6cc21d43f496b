/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { RevtrackConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError, toError } from '../shared/errors.js';

const CONFIG_DIR = '.revtrack';
const CONFIG_FILE = 'config.json';
const DB_FILE = 'revisions.db';

const partialConfigSchema = z.object({
  store: z
    .object({
      timeout_ms: z.number().int().positive().optional(),
      retry_attempts: z.number().int().min(1).optional(),
    })
    .optional(),
  retention: z
    .object({
      keep_revisions: z.number().int().min(1).nullable().optional(),
    })
    .optional(),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      file: z.string().nullable().optional(),
    })
    .optional(),
});

type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Resolve the .revtrack directory path from a given working directory.
 */
export function resolveProjectDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

export function resolveConfigPath(cwd: string): string {
  return path.join(resolveProjectDir(cwd), CONFIG_FILE);
}

export function resolveDbPath(cwd: string): string {
  return path.join(resolveProjectDir(cwd), DB_FILE);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): RevtrackConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${toError(err).message}`,
      toError(err),
    );
  }

  const parsed = partialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${details}`);
  }

  return mergeWithDefaults(parsed.data);
}

export function saveConfig(cwd: string, config: RevtrackConfig): void {
  fs.mkdirSync(resolveProjectDir(cwd), { recursive: true });
  fs.writeFileSync(resolveConfigPath(cwd), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Delete the .revtrack directory, database included.
 */
export function cleanConfig(cwd: string): void {
  const projectDir = resolveProjectDir(cwd);
  if (fs.existsSync(projectDir)) {
    fs.rmSync(projectDir, { recursive: true, force: true });
  }
}

export function mergeWithDefaults(partial: PartialConfig): RevtrackConfig {
  return {
    store: {
      timeout_ms: partial.store?.timeout_ms ?? DEFAULT_CONFIG.store.timeout_ms,
      retry_attempts: partial.store?.retry_attempts ?? DEFAULT_CONFIG.store.retry_attempts,
    },
    retention: {
      keep_revisions:
        partial.retention?.keep_revisions !== undefined
          ? partial.retention.keep_revisions
          : DEFAULT_CONFIG.retention.keep_revisions,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file !== undefined ? partial.log.file : DEFAULT_CONFIG.log.file,
    },
  };
}
