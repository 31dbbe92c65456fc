import { resolve } from 'node:path';
import { Command } from 'commander';
import { closeRepository, initRepository } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createInitCommand(ctx: CliContext): Command {
  return new Command('init')
    .description('Create a wires repository (.wires/wires.db) in the current directory')
    .action((_opts: unknown, cmd: Command) => $try(ctx, cmd, format => {
      const dir = resolve(ctx.cwd, ctx.config.repositoryRoot ?? '.');
      const repo = initRepository(dir, ctx.config);
      closeRepository(repo);

      if (format === 'json') {
        out.printJson({ initialized: repo.dbPath });
      } else {
        out.success(`Initialized empty wires repository in ${repo.dbPath}`);
      }
    }));
}
