/**
 * revtrack check - Compare one file's checksum and size with a stored revision
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { parseCrc, parseNonNegativeInt } from '../utils/parsers.js';

interface CheckCommandOptions {
  crc: number;
  size: number;
  wad?: string;
}

export function checkCommand(): Command {
  return new Command('check')
    .description('Report whether a file is new, changed or unchanged relative to a revision')
    .argument('<revision>', 'Revision to compare against')
    .argument('<name>', 'File name')
    .requiredOption('--crc <crc>', 'Checksum (decimal or 0x hex)', parseCrc)
    .requiredOption('--size <bytes>', 'Size in bytes', parseNonNegativeInt)
    .option('--wad <wadName>', 'Look the file up inside this archive')
    .action(async (revision: string, name: string, options: CheckCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const status = await withEngine(globals, (engine) =>
          engine.checkFile({
            revision,
            name,
            crc: options.crc,
            size: options.size,
            wadName: options.wad,
          }),
        );

        if (globals.json) {
          printJson({ revision, name, wad_name: options.wad ?? null, status });
        } else {
          process.stdout.write(`${status}\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
