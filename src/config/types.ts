/**
 * revtrack configuration types
 */

import type { LogLevel } from '../shared/logger.js';

export interface RevtrackConfig {
  /** Store access */
  store: {
    /** Busy timeout for SQLite and wait limit for revision locks */
    timeout_ms: number;
    /** Total attempts for a busy store, including the first */
    retry_attempts: number;
  };

  /** Revision retention */
  retention: {
    /** Number of newest revision names kept after each ingestion; null keeps all */
    keep_revisions: number | null;
  };

  /** Logging */
  log: {
    level: LogLevel;
    file: string | null;
  };
}
