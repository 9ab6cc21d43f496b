/**
 * revtrack delete - Remove a revision and its file records
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess } from '../output/formatter.js';

export function deleteCommand(): Command {
  return new Command('delete')
    .description('Delete every capture of a revision together with its file records')
    .argument('<revision>', 'Revision name')
    .action(async (revision: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const result = await withEngine(globals, (engine) => engine.deleteRevision(revision));

        if (globals.json) {
          printJson({ revision, ...result });
        } else if (!globals.quiet) {
          process.stderr.write(
            formatSuccess(
              `Deleted ${revision}: ${result.revisions} capture(s), ${result.files} file(s), ${result.wadFiles} archive member(s)`,
            ) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
