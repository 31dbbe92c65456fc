// Wire helpers
export {
  generateId,
  nowSeconds,
  nextUpdatedAt,
  buildWire,
  getBlockers,
  isBlocked,
  ID_LENGTH,
} from './wire-helpers.js';
export type { NewWireInput } from './wire-helpers.js';

// Wire queries
export {
  findWire,
  getWire,
  listWires,
  getWireWithDeps,
  listWiresWithDeps,
  createWire,
  updateWire,
  setStatus,
  startWire,
  completeWire,
  cancelWire,
  deleteWire,
  MAX_ID_ATTEMPTS,
} from './wire-queries.js';
export type { CreateWireOptions, ListWiresOptions, UpdateWireInput } from './wire-queries.js';

// Dependency queries
export {
  wireExists,
  edgeExists,
  getDependsOn,
  getBlocks,
  getNeighbours,
  getIncompleteDependencies,
  getAllEdges,
  addDependency,
  removeDependency,
} from './dependency-queries.js';
