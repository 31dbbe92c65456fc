import { Command } from 'commander';
import { deleteWire } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createRmCommand(ctx: CliContext): Command {
  return new Command('rm')
    .description('Delete a wire and every dependency touching it')
    .argument('<id>', 'Wire id')
    .action((id: string, _opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      const wire = deleteWire(ctx.db(), id);

      if (format === 'json') {
        out.printJson({ deleted: out.wireToJson(wire) });
      } else {
        out.success(`Deleted wire ${wire.id}: ${wire.title}`);
      }
    }));
}
