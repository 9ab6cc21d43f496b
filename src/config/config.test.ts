import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  cleanConfig,
  configExists,
  loadConfig,
  mergeWithDefaults,
  resolveConfigPath,
  resolveDbPath,
  saveConfig,
} from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

describe('config', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'revtrack-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  function writeRawConfig(content: string): void {
    mkdirSync(join(cwd, '.revtrack'), { recursive: true });
    writeFileSync(resolveConfigPath(cwd), content);
  }

  it('should resolve paths inside the .revtrack directory', () => {
    expect(resolveConfigPath(cwd)).toBe(join(cwd, '.revtrack', 'config.json'));
    expect(resolveDbPath(cwd)).toBe(join(cwd, '.revtrack', 'revisions.db'));
  });

  it('should throw ConfigNotFoundError when no config exists', () => {
    expect(configExists(cwd)).toBe(false);
    expect(() => loadConfig(cwd)).toThrow(ConfigNotFoundError);
  });

  it('should save and load a config', () => {
    const config = { ...DEFAULT_CONFIG, retention: { keep_revisions: 10 } };
    saveConfig(cwd, config);

    expect(configExists(cwd)).toBe(true);
    expect(loadConfig(cwd)).toEqual(config);
  });

  it('should fill missing fields from the defaults', () => {
    writeRawConfig(JSON.stringify({ store: { timeout_ms: 250 } }));

    expect(loadConfig(cwd)).toEqual({
      ...DEFAULT_CONFIG,
      store: { timeout_ms: 250, retry_attempts: 3 },
    });
  });

  it('should reject invalid values with their path', () => {
    writeRawConfig(JSON.stringify({ store: { retry_attempts: 0 } }));

    expect(() => loadConfig(cwd)).toThrow(
      `Invalid config ${resolveConfigPath(cwd)}: store.retry_attempts: Number must be greater than or equal to 1`,
    );
  });

  it('should wrap malformed JSON in ConfigError', () => {
    writeRawConfig('{ not json');

    expect(() => loadConfig(cwd)).toThrow(ConfigError);
    expect(() => loadConfig(cwd)).toThrow(`Failed to load config from ${resolveConfigPath(cwd)}`);
  });

  it('should remove the project directory on clean', () => {
    saveConfig(cwd, DEFAULT_CONFIG);
    cleanConfig(cwd);

    expect(existsSync(join(cwd, '.revtrack'))).toBe(false);
  });
});

describe('mergeWithDefaults', () => {
  it('should keep an explicit null retention and log file', () => {
    const merged = mergeWithDefaults({ retention: { keep_revisions: null }, log: { file: null } });
    expect(merged.retention.keep_revisions).toBeNull();
    expect(merged.log).toEqual({ level: 'info', file: null });
  });

  it('should return the defaults for an empty object', () => {
    expect(mergeWithDefaults({})).toEqual(DEFAULT_CONFIG);
  });
});
