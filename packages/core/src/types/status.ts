import { InvalidStatusError } from '../errors.js';

export const Status = {
  Todo: 0,
  InProgress: 1,
  Done: 2,
  Cancelled: 3,
} as const;

export type Status = (typeof Status)[keyof typeof Status];

/** Persisted (and JSON) form of each status */
export const StatusLabel = {
  [Status.Todo]: 'TODO',
  [Status.InProgress]: 'IN_PROGRESS',
  [Status.Done]: 'DONE',
  [Status.Cancelled]: 'CANCELLED',
} as const satisfies Record<Status, string>;

export type StatusLabel = (typeof StatusLabel)[Status];

const STATUS_BY_LABEL: ReadonlyMap<string, Status> = new Map(
  Object.values(Status).map(status => [StatusLabel[status], status]),
);

export const ALL_STATUSES: readonly Status[] = Object.values(Status);

/** Map a persisted label back to its status. Unknown labels are rejected here, at the boundary. */
export function statusFromLabel(label: string): Status {
  const status = STATUS_BY_LABEL.get(label);
  if (status === undefined) throw new InvalidStatusError(label);
  return status;
}

export function statusLabel(status: Status): StatusLabel {
  return StatusLabel[status];
}

/** Sort rank for the ready queue: InProgress(0), Todo(1), everything else after */
export function statusRank(status: Status): number {
  switch (status) {
    case Status.InProgress: return 0;
    case Status.Todo: return 1;
    case Status.Done: return 2;
    case Status.Cancelled: return 3;
  }
}

/** Statuses a worker can still pick up */
export function isActive(status: Status): boolean {
  return status === Status.Todo || status === Status.InProgress;
}

/** A dependency in this status still holds up the wires that depend on it (for display) */
export function isBlocking(status: Status): boolean {
  return status !== Status.Done && status !== Status.Cancelled;
}
