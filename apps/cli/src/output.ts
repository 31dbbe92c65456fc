/**
 * chalk-based terminal output and the JSON shapes printed for pipes.
 */

import chalk from 'chalk';
import { Status, getBlockers, isWireError, statusLabel } from '@wires/core';
import type {
  DependencyChange, DependencyGraph, DependencyInfo, Warning, Wire, WireWithDeps,
} from '@wires/core';

// --- JSON shapes (stable snake_case field names) ---

export interface DependencyJson {
  id: string;
  title: string;
  status: string;
}

export interface WireJson {
  id: string;
  title: string;
  description: string | null;
  status: string;
  priority: number;
  created_at: number;
  updated_at: number;
  depends_on?: DependencyJson[];
  blocks?: DependencyJson[];
}

export interface WarningJson {
  type: Warning['type'];
  wire_id: string;
  title: string;
  status: string;
}

export function dependencyToJson(dep: DependencyInfo): DependencyJson {
  return { id: dep.id, title: dep.title, status: statusLabel(dep.status) };
}

export function wireToJson(wire: Wire | WireWithDeps): WireJson {
  const json: WireJson = {
    id: wire.id,
    title: wire.title,
    description: wire.description,
    status: statusLabel(wire.status),
    priority: wire.priority,
    created_at: wire.createdAt,
    updated_at: wire.updatedAt,
  };
  if ('dependsOn' in wire) {
    json.depends_on = wire.dependsOn.map(dependencyToJson);
    json.blocks = wire.blocks.map(dependencyToJson);
  }
  return json;
}

export function warningToJson(warning: Warning): WarningJson {
  return { type: warning.type, wire_id: warning.wireId, title: warning.title, status: statusLabel(warning.status) };
}

export function graphToJson(graph: DependencyGraph): unknown {
  return {
    nodes: graph.nodes.map(n => ({
      id: n.id, title: n.title, status: statusLabel(n.status), priority: n.priority, ready: n.ready,
    })),
    edges: graph.edges.map(e => ({ from: e.from, to: e.to })),
  };
}

export function changeToJson(change: DependencyChange): unknown {
  return { result: change.type, wire_id: change.wireId, depends_on: change.dependsOn };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Formatting functions ---

export function formatStatus(status: Status): string {
  switch (status) {
    case Status.Done: return chalk.green('[x]');
    case Status.InProgress: return chalk.yellow('[-]');
    case Status.Cancelled: return chalk.dim('[~]');
    case Status.Todo: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: number): string {
  if (priority === 0) return '';
  const label = `[pri:${priority}]`;
  return priority > 0 ? chalk.red(label) : chalk.blue(label);
}

export function formatTimestamp(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace('T', ' ').slice(0, 16);
}

/** One line per wire: status, id, title, priority, and what still holds it up */
export function formatWireLine(wire: Wire | WireWithDeps): string {
  const title = wire.status === Status.Done || wire.status === Status.Cancelled
    ? chalk.dim(wire.title)
    : wire.title;
  const parts = [formatStatus(wire.status), chalk.bold(wire.id), title];
  const priority = formatPriority(wire.priority);
  if (priority) parts.push(priority);

  let line = parts.join(' ');
  if ('dependsOn' in wire) {
    const blockers = getBlockers(wire);
    if (blockers.length > 0) line += chalk.red(`  ← blocked by ${blockers.map(b => b.id).join(', ')}`);
  }
  return line;
}

export function printWireList(wires: readonly (Wire | WireWithDeps)[], emptyMessage = 'No wires found.'): void {
  if (wires.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const wire of wires) console.log(formatWireLine(wire));
}

export function printWireDetail(wire: WireWithDeps): void {
  console.log(`${chalk.bold('ID:')}          ${wire.id}`);
  console.log(`${chalk.bold('Title:')}       ${wire.title}`);
  console.log(`${chalk.bold('Status:')}      ${formatStatus(wire.status)} ${statusLabel(wire.status)}`);
  console.log(`${chalk.bold('Priority:')}    ${wire.priority}`);
  console.log(`${chalk.bold('Created:')}     ${formatTimestamp(wire.createdAt)}`);
  console.log(`${chalk.bold('Updated:')}     ${formatTimestamp(wire.updatedAt)}`);

  const printSection = (label: string, deps: readonly DependencyInfo[]) => {
    if (deps.length === 0) return;
    console.log(chalk.bold(label));
    for (const dep of deps) {
      console.log(`  ${formatStatus(dep.status)} ${chalk.dim(dep.id)} ${truncate(dep.title, 50)}`);
    }
  };

  printSection('Depends on:', wire.dependsOn);
  printSection('Blocks:', wire.blocks);

  if (wire.description) {
    console.log(chalk.bold('Description:'));
    console.log(wire.description);
  }
}

export function printWarnings(warnings: readonly Warning[]): void {
  for (const w of warnings) {
    warning(`Warning: depends on ${w.wireId} (${truncate(w.title, 40)}) which is ${statusLabel(w.status)}`);
  }
}

// --- Errors ---

/** Failures go to stderr: red text for people, `{ error, code }` for programs */
export function printError(err: unknown, format: 'json' | 'table'): void {
  const message = err instanceof Error ? err.message : String(err);
  if (format === 'json') {
    const code = isWireError(err) ? err.code : 'INTERNAL_ERROR';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    error(message);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
