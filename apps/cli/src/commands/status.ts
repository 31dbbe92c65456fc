import { Command } from 'commander';
import { cancelWire, completeWire, hasWarnings, startWire } from '@wires/core';
import type { MutationResult, WiresDb } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import type { OutputFormat } from '../helpers.js';
import { $try } from '../helpers.js';

/** A changed wire plus any warnings the change produced */
export function printMutation(result: MutationResult, format: OutputFormat, message: string): void {
  if (format === 'json') {
    out.printJson({ ...out.wireToJson(result.wire), warnings: result.warnings.map(out.warningToJson) });
    return;
  }
  out.success(message);
  if (hasWarnings(result)) out.printWarnings(result.warnings);
}

function createTransitionCommand(
  ctx: CliContext,
  name: string,
  description: string,
  transition: (db: WiresDb, id: string) => MutationResult,
  verb: string,
): Command {
  return new Command(name)
    .description(description)
    .argument('<id>', 'Wire id')
    .action((id: string, _opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      const result = transition(ctx.db(), id);
      printMutation(result, format, `${verb} ${result.wire.id}: ${result.wire.title}`);
    }));
}

export function createStartCommand(ctx: CliContext): Command {
  return createTransitionCommand(ctx, 'start', 'Mark a wire as in progress', startWire, 'Started');
}

export function createDoneCommand(ctx: CliContext): Command {
  return createTransitionCommand(
    ctx, 'done', 'Mark a wire as done (warns about unfinished dependencies)', completeWire, 'Completed',
  );
}

export function createCancelCommand(ctx: CliContext): Command {
  return createTransitionCommand(ctx, 'cancel', 'Mark a wire as cancelled', cancelWire, 'Cancelled');
}
