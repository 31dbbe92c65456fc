import type { Status } from './status.js';

/** 7 lowercase hex characters */
export type WireId = string;

export interface Wire {
  readonly id: WireId;
  readonly title: string;
  readonly description: string | null;
  readonly status: Status;
  /** Higher = more urgent; unbounded, may be negative */
  readonly priority: number;
  readonly createdAt: number; // seconds since epoch
  readonly updatedAt: number; // seconds since epoch
}

/** A neighbour in the dependency graph, annotated with its current status */
export interface DependencyInfo {
  readonly id: WireId;
  readonly title: string;
  readonly status: Status;
}

export interface WireWithDeps extends Wire {
  /** Wires this one waits on */
  readonly dependsOn: readonly DependencyInfo[];
  /** Wires waiting on this one */
  readonly blocks: readonly DependencyInfo[];
}

export interface DependencyEdge {
  readonly wireId: WireId;
  readonly dependsOn: WireId;
}
