import { Command } from 'commander';
import { getWireWithDeps } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createShowCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Show a wire with its dependencies and dependents')
    .argument('<id>', 'Wire id')
    .action((id: string, _opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      const wire = getWireWithDeps(ctx.db(), id);

      if (format === 'json') {
        out.printJson(out.wireToJson(wire));
      } else {
        out.printWireDetail(wire);
      }
    }));
}
