import { Command } from 'commander';
import { addDependency, removeDependency } from '@wires/core';
import type { DependencyChange } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import type { OutputFormat } from '../helpers.js';
import { $try } from '../helpers.js';

function printChange(change: DependencyChange, format: OutputFormat): void {
  if (format === 'json') {
    out.printJson(out.changeToJson(change));
    return;
  }
  const edge = `${change.wireId} → ${change.dependsOn}`;
  switch (change.type) {
    case 'added': out.success(`Added dependency: ${edge}`); break;
    case 'removed': out.success(`Removed dependency: ${edge}`); break;
    case 'unchanged': out.info(`Nothing to change: ${edge}`); break;
  }
}

export function createDepCommand(ctx: CliContext): Command {
  return new Command('dep')
    .description('Make a wire depend on another (rejected if it would create a cycle)')
    .argument('<id>', 'The wire that has to wait')
    .argument('<dependsOn>', 'The wire it waits on')
    .action((id: string, dependsOn: string, _opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      printChange(addDependency(ctx.db(), id, dependsOn), format);
    }));
}

export function createUndepCommand(ctx: CliContext): Command {
  return new Command('undep')
    .description('Remove a dependency between two wires')
    .argument('<id>', 'The waiting wire')
    .argument('<dependsOn>', 'The wire it waits on')
    .action((id: string, dependsOn: string, _opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      printChange(removeDependency(ctx.db(), id, dependsOn), format);
    }));
}
