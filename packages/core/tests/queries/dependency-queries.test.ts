import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type WiresDb } from '../../src/db.js';
import {
  addDependency,
  removeDependency,
  edgeExists,
  getAllEdges,
  getBlocks,
  getDependsOn,
  getIncompleteDependencies,
  getNeighbours,
} from '../../src/queries/dependency-queries.js';
import { completeWire, getWireWithDeps } from '../../src/queries/wire-queries.js';
import { CircularDependencyError, WireNotFoundError } from '../../src/errors.js';
import { Status } from '../../src/types/status.js';
import { addWire } from '../helpers.js';

let db: WiresDb;

beforeEach(() => {
  db = createTestDb();
  for (const id of ['aaaaaaa', 'bbbbbbb', 'ccccccc', 'ddddddd']) addWire(db, id, { title: id.slice(0, 1).toUpperCase() });
});

describe('addDependency', () => {
  it('adds an edge', () => {
    expect(addDependency(db, 'aaaaaaa', 'bbbbbbb')).toEqual({ type: 'added', wireId: 'aaaaaaa', dependsOn: 'bbbbbbb' });
    expect(edgeExists(db, 'aaaaaaa', 'bbbbbbb')).toBe(true);
    expect(edgeExists(db, 'bbbbbbb', 'aaaaaaa')).toBe(false);
  });

  it('is idempotent', () => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    expect(addDependency(db, 'aaaaaaa', 'bbbbbbb')).toEqual({ type: 'unchanged', wireId: 'aaaaaaa', dependsOn: 'bbbbbbb' });
    expect(getWireWithDeps(db, 'aaaaaaa').dependsOn).toHaveLength(1);
  });

  it('rejects a self dependency with path [a, a]', () => {
    expect(() => addDependency(db, 'aaaaaaa', 'aaaaaaa')).toThrow(CircularDependencyError);
    try {
      addDependency(db, 'aaaaaaa', 'aaaaaaa');
    } catch (err: unknown) {
      expect(err instanceof CircularDependencyError && err.path).toEqual(['aaaaaaa', 'aaaaaaa']);
    }
    expect(getAllEdges(db)).toEqual([]);
  });

  it('rejects a direct cycle', () => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    expect(() => addDependency(db, 'bbbbbbb', 'aaaaaaa')).toThrow(CircularDependencyError);
    expect(edgeExists(db, 'bbbbbbb', 'aaaaaaa')).toBe(false);
  });

  it('rejects an indirect cycle and reports the path through every wire', () => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    addDependency(db, 'bbbbbbb', 'ccccccc');

    let caught: unknown;
    try {
      addDependency(db, 'ccccccc', 'aaaaaaa');
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CircularDependencyError);
    const path = caught instanceof CircularDependencyError ? caught.path : [];
    expect(path).toEqual(['ccccccc', 'aaaaaaa', 'bbbbbbb', 'ccccccc']);
    expect(caught instanceof Error && caught.message).toBe(
      'Circular dependency detected: ccccccc -> aaaaaaa -> bbbbbbb -> ccccccc',
    );
    expect(getAllEdges(db)).toHaveLength(2);
  });

  it('accepts a diamond', () => {
    // d -> b, d -> c, b -> a, c -> a, then d -> a
    addDependency(db, 'ddddddd', 'bbbbbbb');
    addDependency(db, 'ddddddd', 'ccccccc');
    addDependency(db, 'bbbbbbb', 'aaaaaaa');
    addDependency(db, 'ccccccc', 'aaaaaaa');

    expect(addDependency(db, 'ddddddd', 'aaaaaaa').type).toBe('added');
    expect(getDependsOn(db, 'ddddddd').map(d => d.id)).toEqual(['aaaaaaa', 'bbbbbbb', 'ccccccc']);
  });

  it('fails when either endpoint is missing', () => {
    expect(() => addDependency(db, 'missing', 'aaaaaaa')).toThrow(WireNotFoundError);
    expect(() => addDependency(db, 'aaaaaaa', 'missing')).toThrow(new WireNotFoundError('missing').message);
    expect(getAllEdges(db)).toEqual([]);
  });
});

describe('removeDependency', () => {
  it('removes an existing edge', () => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    expect(removeDependency(db, 'aaaaaaa', 'bbbbbbb').type).toBe('removed');
    expect(getAllEdges(db)).toEqual([]);
  });

  it('reports unchanged for an edge that is not there', () => {
    expect(removeDependency(db, 'aaaaaaa', 'bbbbbbb').type).toBe('unchanged');
  });

  it('fails for unknown wires', () => {
    expect(() => removeDependency(db, 'aaaaaaa', 'missing')).toThrow(WireNotFoundError);
  });

  it('allows the reverse edge once removed', () => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    removeDependency(db, 'aaaaaaa', 'bbbbbbb');
    expect(addDependency(db, 'bbbbbbb', 'aaaaaaa').type).toBe('added');
  });
});

describe('neighbour queries', () => {
  beforeEach(() => {
    addDependency(db, 'aaaaaaa', 'bbbbbbb');
    addDependency(db, 'aaaaaaa', 'ccccccc');
    addDependency(db, 'ddddddd', 'aaaaaaa');
  });

  it('lists what a wire depends on and what it blocks', () => {
    expect(getDependsOn(db, 'aaaaaaa')).toEqual([
      { id: 'bbbbbbb', title: 'B', status: Status.Todo },
      { id: 'ccccccc', title: 'C', status: Status.Todo },
    ]);
    expect(getBlocks(db, 'aaaaaaa')).toEqual([{ id: 'ddddddd', title: 'D', status: Status.Todo }]);
    expect(getNeighbours(db, 'bbbbbbb')).toEqual({
      dependsOn: [],
      blocks: [{ id: 'aaaaaaa', title: 'A', status: Status.Todo }],
    });
  });

  it('lists incomplete dependencies', () => {
    completeWire(db, 'bbbbbbb');
    expect(getIncompleteDependencies(db, 'aaaaaaa')).toEqual([
      { type: 'incomplete_dependency', wireId: 'ccccccc', title: 'C', status: Status.Todo },
    ]);
  });

  it('returns every edge in a stable order', () => {
    expect(getAllEdges(db)).toEqual([
      { wireId: 'aaaaaaa', dependsOn: 'bbbbbbb' },
      { wireId: 'aaaaaaa', dependsOn: 'ccccccc' },
      { wireId: 'ddddddd', dependsOn: 'aaaaaaa' },
    ]);
  });
});
