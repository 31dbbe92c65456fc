import { Command } from 'commander';
import { getReadyWires, listWiresWithDeps } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseStatusArg, $try } from '../helpers.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List wires, newest first')
    .option('-s, --status <status>', 'Only wires in this status (todo, in-progress, done, cancelled)')
    .action((opts: { status?: string }, cmd: Command) => $try(ctx, cmd, format => {
      const status = opts.status === undefined ? undefined : parseStatusArg(opts.status);
      const wires = listWiresWithDeps(ctx.db(), { status });

      if (format === 'json') {
        out.printJson(wires.map(out.wireToJson));
      } else {
        out.printWireList(wires);
      }
    }));
}

export function createReadyCommand(ctx: CliContext): Command {
  return new Command('ready')
    .description('List wires that can be worked on now, in the order to attempt them')
    .action((_opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      const wires = getReadyWires(ctx.db());

      if (format === 'json') {
        out.printJson(wires.map(out.wireToJson));
      } else {
        out.printWireList(wires, 'No ready wires.');
      }
    }));
}
