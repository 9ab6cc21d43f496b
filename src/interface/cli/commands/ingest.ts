/**
 * revtrack ingest - Store one scanned revision
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold, formatDim } from '../output/formatter.js';

export function ingestCommand(): Command {
  return new Command('ingest')
    .description('Ingest a scan manifest (JSON) as one revision')
    .argument('<manifest>', 'Path to the manifest file')
    .action(async (manifest: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const result = await withEngine(globals, (engine) =>
          engine.ingestManifest(resolve(globals.cwd, manifest)),
        );

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess(`Ingested ${result.revision} (${result.date})`) + '\n');
          process.stderr.write(`  ${formatBold('Files:')}    ${result.files}\n`);
          process.stderr.write(
            `  ${formatBold('Archives:')} ${result.archives} ${formatDim(`(${result.wadFiles} members)`)}\n`,
          );
          if (result.pruned.length > 0) {
            process.stderr.write(`  ${formatBold('Pruned:')}   ${result.pruned.join(', ')}\n`);
          }
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
