/**
 * RevtrackEngine - Core Layer facade
 *
 * The CLI reaches the store, ingestor and diff engine through this facade
 * only. It owns the project config, the logger setup and the database handle.
 */

import type { RevtrackConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  loadConfig,
  saveConfig,
  configExists as configExistsOnDisk,
  cleanConfig as cleanConfigOnDisk,
  resolveConfigPath,
  resolveDbPath,
} from '../config/config.js';
import type {
  DiffResult,
  FileUpdateType,
  IngestInput,
  IngestResult,
  RevisionInfo,
  StatusOutput,
} from '../shared/types.js';
import {
  ConfigNotFoundError,
  RevtrackError,
  UnknownRevisionError,
} from '../shared/errors.js';
import { configureLogger, createLogger, closeLogger, type Logger } from '../shared/logger.js';
import { DatabaseManager } from '../data/database-manager.js';
import {
  createMetadataStore,
  type DeleteRevisionResult,
  type MetadataStore,
} from '../data/metadata-store.js';
import { RevisionIngestor, type IngestOptions } from './ingest/revision-ingestor.js';
import { DiffEngine, type DiffOptions } from './diff/diff-engine.js';
import { readManifest } from './manifest/manifest-parser.js';

export interface InitOptions {
  /** Remove an existing project directory first */
  force?: boolean;
  config?: RevtrackConfig;
}

export interface InitResult {
  config_path: string;
  db_path: string;
  reinitialized: boolean;
}

export interface CheckFileInput {
  revision: string;
  name: string;
  crc: number;
  size: number;
  wadName?: string;
}

interface Components {
  db: DatabaseManager;
  store: MetadataStore;
  ingestor: RevisionIngestor;
  diffEngine: DiffEngine;
}

export class RevtrackEngine {
  private config: RevtrackConfig | null = null;
  private components: Components | null = null;
  private readonly cwd: string;
  private logger: Logger;

  constructor(cwd: string) {
    this.cwd = cwd;
    this.logger = createLogger('RevtrackEngine');
  }

  // --- Lifecycle ---

  async initialize(options: InitOptions = {}): Promise<InitResult> {
    const existed = configExistsOnDisk(this.cwd);
    if (existed && options.force) {
      await this.close();
      cleanConfigOnDisk(this.cwd);
    }

    const config = options.config ?? (existed && !options.force ? loadConfig(this.cwd) : DEFAULT_CONFIG);
    saveConfig(this.cwd, config);
    this.open(config);

    this.logger.info(`Initialized revtrack in ${this.cwd}`);
    return {
      config_path: resolveConfigPath(this.cwd),
      db_path: resolveDbPath(this.cwd),
      reinitialized: existed,
    };
  }

  /**
   * Open an existing project (for use by createRevtrackEngine).
   */
  async loadExisting(): Promise<void> {
    this.open(loadConfig(this.cwd));
  }

  isInitialized(): boolean {
    return this.components !== null;
  }

  getConfig(): RevtrackConfig {
    return this.config ?? DEFAULT_CONFIG;
  }

  async close(): Promise<void> {
    if (this.components) {
      this.components.db.close();
      this.components = null;
    }
    closeLogger();
  }

  // --- Ingestion ---

  async ingest(input: IngestInput, options: IngestOptions = {}): Promise<IngestResult> {
    const { ingestor } = this.requireComponents();
    const result = await ingestor.ingest(input, options);

    const keep = this.getConfig().retention.keep_revisions;
    if (keep !== null) {
      result.pruned = await ingestor.pruneRevisions(keep);
    }
    return result;
  }

  async ingestManifest(filepath: string, options: IngestOptions = {}): Promise<IngestResult> {
    this.requireComponents();
    const input = await readManifest(filepath);
    this.logger.debug(`Read manifest ${filepath} for revision ${input.revision}`);
    return this.ingest(input, options);
  }

  // --- Diff ---

  async diff(from: string, to: string, options: DiffOptions = {}): Promise<DiffResult> {
    return this.requireComponents().diffEngine.diff(from, to, options);
  }

  /**
   * Diff the revision before the latest one against the latest one.
   */
  async diffLatest(options: DiffOptions = {}): Promise<DiffResult> {
    const { store } = this.requireComponents();
    const latest = store.getLatestRevision();
    const previous = latest ? store.getPreviousRevision(latest.name) : null;
    if (!latest || !previous) {
      throw new RevtrackError(
        'At least two revisions are needed to diff the latest one',
        'NOT_ENOUGH_REVISIONS',
      );
    }
    return this.diff(previous.name, latest.name, options);
  }

  // --- Queries ---

  listRevisions(): RevisionInfo[] {
    return this.requireComponents().store.listRevisions();
  }

  checkFile(input: CheckFileInput): FileUpdateType {
    const { store } = this.requireComponents();
    if (!store.hasRevision(input.revision)) {
      throw new UnknownRevisionError(input.revision);
    }
    if (input.wadName !== undefined) {
      return store.checkWadFileUpdate(input.revision, input.name, input.wadName, input.crc, input.size);
    }
    return store.checkFileUpdate(input.revision, input.name, input.crc, input.size);
  }

  getStatus(): StatusOutput {
    if (!this.components) {
      return {
        initialized: false,
        db_path: resolveDbPath(this.cwd),
        total_revisions: 0,
        latest_revision: null,
        db_size_bytes: 0,
      };
    }

    const { db, store } = this.components;
    const latest = store.getLatestRevision();
    return {
      initialized: true,
      db_path: db.path,
      total_revisions: store.countRevisions(),
      latest_revision: latest ? { ...latest, ...store.countRevisionContents(latest.name) } : null,
      db_size_bytes: db.getFileSize(),
    };
  }

  // --- Maintenance ---

  async deleteRevision(name: string): Promise<DeleteRevisionResult> {
    const { store, ingestor } = this.requireComponents();
    if (!store.hasRevision(name)) {
      throw new UnknownRevisionError(name);
    }
    return ingestor.deleteRevision(name);
  }

  async prune(keep: number): Promise<string[]> {
    return this.requireComponents().ingestor.pruneRevisions(keep);
  }

  // --- Internals ---

  private open(config: RevtrackConfig): void {
    if (this.components) {
      this.components.db.close();
      this.components = null;
    }

    this.config = config;
    configureLogger({ level: config.log.level, file: config.log.file });

    const db = new DatabaseManager({
      dbPath: resolveDbPath(this.cwd),
      timeoutMs: config.store.timeout_ms,
    });
    db.initialize();

    const store = createMetadataStore(db);
    this.components = {
      db,
      store,
      ingestor: new RevisionIngestor(store, {
        timeoutMs: config.store.timeout_ms,
        retryAttempts: config.store.retry_attempts,
      }),
      diffEngine: new DiffEngine(store),
    };
  }

  private requireComponents(): Components {
    if (!this.components) {
      throw new ConfigNotFoundError(resolveConfigPath(this.cwd));
    }
    return this.components;
  }
}

export async function createRevtrackEngine(cwd: string): Promise<RevtrackEngine> {
  const engine = new RevtrackEngine(cwd);
  if (configExistsOnDisk(cwd)) {
    await engine.loadExisting();
  }
  return engine;
}
