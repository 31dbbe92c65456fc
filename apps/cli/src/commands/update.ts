import { Command } from 'commander';
import { updateWire } from '@wires/core';
import type { UpdateWireInput } from '@wires/core';
import type { CliContext } from '../context.js';
import { printMutation } from './status.js';
import { parsePriorityArg, parseStatusArg, $try } from '../helpers.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  status?: string;
  priority?: string;
}

export function createUpdateCommand(ctx: CliContext): Command {
  return new Command('update')
    .description('Change fields of a wire; omitted fields are left alone')
    .argument('<id>', 'Wire id')
    .option('--title <title>', 'New title')
    .option('--description <text>', 'New description ("" clears it)')
    .option('--status <status>', 'New status (todo, in-progress, done, cancelled)')
    .option('--priority <n>', 'New priority')
    .action((id: string, opts: UpdateOptions, cmd: Command) => $try(ctx, cmd, format => {
      const input: UpdateWireInput = {};
      if (opts.title !== undefined) input.title = opts.title;
      if (opts.description !== undefined) input.description = opts.description;
      if (opts.status !== undefined) input.status = parseStatusArg(opts.status);
      if (opts.priority !== undefined) input.priority = parsePriorityArg(opts.priority);

      const result = updateWire(ctx.db(), id, input);
      printMutation(result, format, `Updated wire ${result.wire.id}`);
    }));
}
