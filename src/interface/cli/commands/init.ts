/**
 * revtrack init - Create the project directory, config and database
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold } from '../output/formatter.js';

export function initCommand(): Command {
  return new Command('init')
    .description('Create .revtrack/ with a default config and an empty database')
    .option('--force', 'Delete existing revision data and start over', false)
    .action(async (options: { force: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const result = await withEngine(globals, (engine) =>
          engine.initialize({ force: options.force }),
        );

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write(
            formatSuccess(result.reinitialized ? 'Project reinitialized' : 'Project initialized') + '\n',
          );
          process.stderr.write(`  ${formatBold('Config:')}   ${result.config_path}\n`);
          process.stderr.write(`  ${formatBold('Database:')} ${result.db_path}\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
