/**
 * revtrack prune - Keep only the newest revisions
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess } from '../output/formatter.js';
import { parsePositiveInt } from '../utils/parsers.js';

export function pruneCommand(): Command {
  return new Command('prune')
    .description('Delete all but the newest revisions')
    .requiredOption('--keep <n>', 'Number of revision names to keep', parsePositiveInt)
    .action(async (options: { keep: number }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const pruned = await withEngine(globals, (engine) => engine.prune(options.keep));

        if (globals.json) {
          printJson({ pruned, total: pruned.length });
        } else if (!globals.quiet) {
          const detail = pruned.length > 0 ? `: ${pruned.join(', ')}` : '';
          process.stderr.write(formatSuccess(`Pruned ${pruned.length} revision(s)${detail}`) + '\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
