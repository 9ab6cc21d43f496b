import type { RevtrackConfig } from './types.js';

export const DEFAULT_CONFIG: RevtrackConfig = {
  store: {
    timeout_ms: 5000,
    retry_attempts: 3,
  },
  retention: {
    keep_revisions: null,
  },
  log: {
    level: 'info',
    file: null,
  },
};
