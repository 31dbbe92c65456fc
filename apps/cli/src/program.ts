import { Command, Option } from 'commander';
import type { CliContext } from './context.js';
import { OUTPUT_FORMATS } from './helpers.js';

import { createInitCommand } from './commands/init.js';
import { createNewCommand } from './commands/new.js';
import { createListCommand, createReadyCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createUpdateCommand } from './commands/update.js';
import { createStartCommand, createDoneCommand, createCancelCommand } from './commands/status.js';
import { createDepCommand, createUndepCommand } from './commands/deps.js';
import { createRmCommand } from './commands/delete.js';
import { createGraphCommand } from './commands/graph.js';

export const VERSION = '0.1.0';

export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('wr')
    .description('Track units of work and the dependencies between them')
    .version(VERSION)
    .addOption(new Option('-f, --format <format>', 'Output format (default: table on a terminal, json otherwise)')
      .choices(OUTPUT_FORMATS));

  program.addCommand(createInitCommand(ctx));
  program.addCommand(createNewCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createShowCommand(ctx));
  program.addCommand(createUpdateCommand(ctx));
  program.addCommand(createStartCommand(ctx));
  program.addCommand(createDoneCommand(ctx));
  program.addCommand(createCancelCommand(ctx));
  program.addCommand(createDepCommand(ctx));
  program.addCommand(createUndepCommand(ctx));
  program.addCommand(createReadyCommand(ctx));
  program.addCommand(createRmCommand(ctx));
  program.addCommand(createGraphCommand(ctx));

  return program;
}
