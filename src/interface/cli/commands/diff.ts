/**
 * revtrack diff - Metadata difference between two revisions
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { getColors } from '../output/formatter.js';
import { renderDiff } from '../output/diff-formatter.js';
import { RevtrackError } from '../../../shared/errors.js';

interface DiffCommandOptions {
  members: boolean;
  exitCode: boolean;
}

export function diffCommand(): Command {
  return new Command('diff')
    .description('Show added, removed and modified files between two revisions')
    .argument('[from]', 'Older revision (default: the one before the latest)')
    .argument('[to]', 'Newer revision')
    .option('--members', 'List the members of added or removed archives', false)
    .option('--exit-code', 'Exit with code 1 if the revisions differ', false)
    .action(
      async (
        from: string | undefined,
        to: string | undefined,
        options: DiffCommandOptions,
        cmd: Command,
      ) => {
        const globals = resolveGlobalOptions(cmd);

        // Ctrl-C stops between archive scopes instead of killing mid-read
        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.once('SIGINT', onSigint);

        try {
          if (from !== undefined && to === undefined) {
            throw new RevtrackError('Pass both revisions, or none to diff the latest one', 'INVALID_ARGUMENT');
          }

          const diffOptions = { signal: controller.signal, includeArchiveMembers: options.members };
          const result = await withEngine(globals, (engine) =>
            from !== undefined && to !== undefined
              ? engine.diff(from, to, diffOptions)
              : engine.diffLatest(diffOptions),
          );

          if (globals.json) {
            printJson(result);
          } else if (!globals.quiet) {
            process.stdout.write(renderDiff(result, getColors(globals)).join('\n') + '\n');
          }

          if (options.exitCode && !result.isEmpty) {
            process.exit(1);
          }
        } catch (error) {
          handleCommandError(error, globals);
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      },
    );
}
