import type { WiresDb } from '../db.js';
import { readTransaction } from '../db.js';
import { Status, StatusLabel } from '../types/status.js';
import type { Wire, WireId } from '../types/wire.js';
import { listWires } from '../queries/wire-queries.js';
import { getAllEdges } from '../queries/dependency-queries.js';
import { resolveReady } from './readiness.js';

export interface GraphNode {
  readonly id: WireId;
  readonly title: string;
  readonly status: Status;
  readonly priority: number;
  readonly ready: boolean;
}

/** `from` depends on `to` */
export interface GraphEdge {
  readonly from: WireId;
  readonly to: WireId;
}

export interface DependencyGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
}

/** Snapshot of every wire and edge */
export function exportGraph(db: WiresDb): DependencyGraph {
  return readTransaction(db, () => {
    const allWires = listWires(db);
    const edges = getAllEdges(db);
    const ready = new Set(resolveReady(allWires, edges).map(w => w.id));

    return {
      nodes: allWires.map((w: Wire) => ({
        id: w.id, title: w.title, status: w.status, priority: w.priority, ready: ready.has(w.id),
      })),
      edges: edges.map(e => ({ from: e.wireId, to: e.dependsOn })),
    };
  });
}

const DOT_STYLE: Record<Status, string> = {
  [Status.Todo]: 'color=black',
  [Status.InProgress]: 'color=orange',
  [Status.Done]: 'color=darkgreen, fontcolor=darkgreen',
  [Status.Cancelled]: 'color=gray, fontcolor=gray, style=dashed',
};

function dotString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

/** Graphviz rendering; edges point from a wire to what it depends on */
export function toDot(graph: DependencyGraph): string {
  const lines = ['digraph wires {', '  rankdir=LR;', '  node [shape=box];'];
  for (const node of graph.nodes) {
    const label = dotString(`${node.id}\n${node.title}\n${StatusLabel[node.status]} p${node.priority}`);
    const ready = node.ready ? ', penwidth=2' : '';
    lines.push(`  ${dotString(node.id)} [label=${label}, ${DOT_STYLE[node.status]}${ready}];`);
  }
  for (const edge of graph.edges) {
    lines.push(`  ${dotString(edge.from)} -> ${dotString(edge.to)};`);
  }
  lines.push('}');
  return lines.join('\n');
}
