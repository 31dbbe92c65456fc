import { Command } from 'commander';
import { createWire } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parsePriorityArg, $try } from '../helpers.js';

export function createNewCommand(ctx: CliContext): Command {
  return new Command('new')
    .description('Create a new wire')
    .argument('<title>', 'Short title of the work')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <n>', 'Priority, higher is more urgent (default 0)')
    .action((title: string, opts: { description?: string; priority?: string }, cmd: Command) => $try(ctx, cmd, format => {
      const priority = opts.priority === undefined ? undefined : parsePriorityArg(opts.priority);
      const wire = createWire(ctx.db(), { title, description: opts.description, priority });

      if (format === 'json') {
        out.printJson(out.wireToJson(wire));
      } else {
        out.success(`Created wire ${wire.id}: ${wire.title}`);
      }
    }));
}

