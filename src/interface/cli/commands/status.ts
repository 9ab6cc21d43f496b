/**
 * revtrack status - Display project status
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import {
  formatBold,
  formatBytes,
  formatDim,
  formatSuccess,
  formatWarning,
} from '../output/formatter.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Display project status')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const status = await withEngine(globals, (engine) => engine.getStatus());

        if (globals.json) {
          printJson(status);
        } else if (!globals.quiet) {
          process.stderr.write('\n');
          process.stderr.write(
            `  ${formatBold('revtrack')} ${status.initialized ? formatSuccess('initialized') : formatWarning('not initialized')}\n`,
          );
          process.stderr.write(`  ${formatBold('Database:')}  ${status.db_path}\n`);
          process.stderr.write(`  ${formatBold('Revisions:')} ${status.total_revisions}\n`);
          const latest = status.latest_revision;
          if (latest) {
            process.stderr.write(
              `  ${formatBold('Latest:')}    ${latest.name} ${formatDim(`(${latest.date})`)}: ` +
                `${latest.files} files, ${latest.archives} archives, ${latest.wadFiles} archive members\n`,
            );
          }
          process.stderr.write(`  ${formatBold('DB size:')}   ${formatBytes(status.db_size_bytes)}\n`);
          process.stderr.write('\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
