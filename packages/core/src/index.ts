// Types
export {
  Status, StatusLabel, ALL_STATUSES,
  statusFromLabel, statusLabel, statusRank, isActive, isBlocking,
  hasWarnings,
} from './types/index.js';
export type {
  WireId, Wire, DependencyInfo, WireWithDeps, DependencyEdge,
  IncompleteDependencyWarning, Warning, MutationResult, DependencyChange,
} from './types/index.js';

// Errors
export {
  WireError, RepositoryNotFoundError, AlreadyInitializedError, WireNotFoundError,
  InvalidStatusError, CircularDependencyError, InvalidWireError, IdCollisionError,
  StoreError, InvalidConfigError, isWireError,
} from './errors.js';
export type { WireErrorCode } from './errors.js';

// Config and logging
export { resolveConfig, LOG_LEVELS } from './config.js';
export type { WiresConfig, LogLevel } from './config.js';
export { createRootLogger, getRootLogger, getLogger } from './logger.js';

// Database and repository
export { createDb, createTestDb, getRawDb, getDbPath, closeDb, CREATE_SCHEMA_SQL, SCHEMA_VERSION } from './db.js';
export type { WiresDb } from './db.js';
export * from './schema/index.js';
export {
  initRepository, findRepository, openRepository, closeRepository,
  repositoryDbPath, WIRES_DIR, DB_NAME,
} from './repository/repository.js';
export type { Repository } from './repository/repository.js';

// Queries
export * from './queries/index.js';

// Graph engine
export { findCycle, wouldCreateCycle, detectAnyCycle, storePrerequisiteLookup } from './graph/cycle-guard.js';
export type { PrerequisiteLookup } from './graph/cycle-guard.js';
export { getReadyWires, resolveReady, compareReadiness } from './graph/readiness.js';
export { exportGraph, toDot } from './graph/graph-export.js';
export type { DependencyGraph, GraphNode, GraphEdge } from './graph/graph-export.js';
