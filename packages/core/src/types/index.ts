export {
  Status, StatusLabel, ALL_STATUSES,
  statusFromLabel, statusLabel, statusRank, isActive, isBlocking,
} from './status.js';
export type { WireId, Wire, DependencyInfo, WireWithDeps, DependencyEdge } from './wire.js';
export type { IncompleteDependencyWarning, Warning, MutationResult, DependencyChange } from './results.js';
export { hasWarnings } from './results.js';
