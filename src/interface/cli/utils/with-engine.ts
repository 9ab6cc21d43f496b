/**
 * Open the project engine for one command and close it afterwards
 */

import { createRevtrackEngine, type RevtrackEngine } from '../../../core/engine.js';
import { applyVerbosity, type GlobalOptions } from './global-options.js';

export async function withEngine<T>(
  globals: GlobalOptions,
  fn: (engine: RevtrackEngine) => Promise<T> | T,
): Promise<T> {
  const engine = await createRevtrackEngine(globals.cwd);
  applyVerbosity(globals);
  try {
    return await fn(engine);
  } finally {
    await engine.close();
  }
}
