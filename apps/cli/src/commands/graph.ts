import { Command } from 'commander';
import chalk from 'chalk';
import { exportGraph, toDot } from '@wires/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createGraphCommand(ctx: CliContext): Command {
  return new Command('graph')
    .description('Export the dependency graph')
    .option('--dot', 'Graphviz DOT instead of JSON or a table')
    .action((opts: { dot?: boolean }, cmd: Command) => $try(ctx, cmd, format => {
      const graph = exportGraph(ctx.db());

      if (opts.dot) {
        console.log(toDot(graph));
      } else if (format === 'json') {
        out.printJson(out.graphToJson(graph));
      } else {
        if (graph.nodes.length === 0) {
          out.info('No wires found.');
          return;
        }
        for (const node of graph.nodes) {
          const ready = node.ready ? chalk.green(' (ready)') : '';
          console.log(`${out.formatStatus(node.status)} ${chalk.bold(node.id)} ${node.title}${ready}`);
        }
        for (const edge of graph.edges) {
          console.log(`${edge.from} → ${edge.to}`);
        }
      }
    }));
}
