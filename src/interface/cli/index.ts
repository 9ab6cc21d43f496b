/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { initCommand } from './commands/init.js';
import { ingestCommand } from './commands/ingest.js';
import { diffCommand } from './commands/diff.js';
import { revisionsCommand } from './commands/revisions.js';
import { statusCommand } from './commands/status.js';
import { checkCommand } from './commands/check.js';
import { deleteCommand } from './commands/delete.js';
import { pruneCommand } from './commands/prune.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('revtrack')
    .description('Track file and archive metadata across revisions and diff them')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(initCommand());
  program.addCommand(ingestCommand());
  program.addCommand(diffCommand());
  program.addCommand(revisionsCommand());
  program.addCommand(statusCommand());
  program.addCommand(checkCommand());
  program.addCommand(deleteCommand());
  program.addCommand(pruneCommand());
  program.addCommand(versionCommand());

  return program;
}
