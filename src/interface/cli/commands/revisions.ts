/**
 * revtrack revisions - List captured revisions
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim } from '../output/formatter.js';

export function revisionsCommand(): Command {
  return new Command('revisions')
    .description('List revisions, oldest first')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const revisions = await withEngine(globals, (engine) => engine.listRevisions());

        if (globals.json) {
          printJson({ revisions, total: revisions.length });
        } else if (!globals.quiet) {
          if (revisions.length === 0) {
            process.stdout.write('No revisions recorded.\n');
            return;
          }
          process.stdout.write(`${formatBold(`Revisions (${revisions.length}):`)}\n`);
          for (const r of revisions) {
            process.stdout.write(`  ${r.name}  ${formatDim(r.date)}\n`);
          }
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
