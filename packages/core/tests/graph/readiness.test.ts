import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type WiresDb } from '../../src/db.js';
import { getReadyWires, resolveReady } from '../../src/graph/readiness.js';
import { addDependency, getAllEdges } from '../../src/queries/dependency-queries.js';
import { setStatus, startWire, completeWire, cancelWire, listWires } from '../../src/queries/wire-queries.js';
import { Status } from '../../src/types/status.js';
import { addWire, T0 } from '../helpers.js';

let db: WiresDb;

beforeEach(() => {
  db = createTestDb();
});

const readyIds = () => getReadyWires(db).map(w => w.id);

describe('getReadyWires', () => {
  it('returns nothing for an empty repository', () => {
    expect(getReadyWires(db)).toEqual([]);
  });

  it('holds back a wire until its dependency is done', () => {
    addWire(db, 'd000000');
    addWire(db, 'x000000');
    addDependency(db, 'x000000', 'd000000');

    expect(readyIds()).toEqual(['d000000']);

    completeWire(db, 'd000000');
    expect(readyIds()).toEqual(['x000000']);
  });

  it('does not treat a cancelled dependency as satisfied', () => {
    addWire(db, 'd000000');
    addWire(db, 'x000000');
    addDependency(db, 'x000000', 'd000000');
    cancelWire(db, 'd000000');

    expect(readyIds()).toEqual([]);
  });

  it('requires every direct dependency to be done', () => {
    addWire(db, 'a000000');
    addWire(db, 'b000000');
    addWire(db, 'x000000');
    addDependency(db, 'x000000', 'a000000');
    addDependency(db, 'x000000', 'b000000');
    completeWire(db, 'a000000');

    expect(readyIds()).toEqual(['b000000']);

    completeWire(db, 'b000000');
    expect(readyIds()).toEqual(['x000000']);
  });

  it('excludes done and cancelled wires', () => {
    addWire(db, 'a000000');
    addWire(db, 'b000000');
    addWire(db, 'c000000');
    completeWire(db, 'a000000');
    cancelWire(db, 'b000000');

    expect(readyIds()).toEqual(['c000000']);
  });

  it('puts in-progress wires before todo regardless of priority', () => {
    addWire(db, 'todo000', { priority: 10 });
    addWire(db, 'wip0000', { priority: 1 });
    startWire(db, 'wip0000');

    expect(readyIds()).toEqual(['wip0000', 'todo000']);
  });

  it('sorts by priority descending within a status, negatives last', () => {
    addWire(db, 'low0000', { priority: -1 });
    addWire(db, 'high000', { priority: 10 });
    addWire(db, 'mid0000', { priority: 2 });

    expect(getReadyWires(db).map(w => w.priority)).toEqual([10, 2, -1]);
  });

  it('breaks ties by creation time, then id', () => {
    addWire(db, 'c000000', { now: new Date(T0.getTime() + 2000) });
    addWire(db, 'b000000', { now: T0 });
    addWire(db, 'a000000', { now: new Date(T0.getTime() + 2000) });

    expect(readyIds()).toEqual(['b000000', 'a000000', 'c000000']);
    expect(readyIds()).toEqual(['b000000', 'a000000', 'c000000']);
  });

  it('does not mutate anything', () => {
    addWire(db, 'a000000');
    const before = listWires(db);
    getReadyWires(db);
    expect(listWires(db)).toEqual(before);
  });
});

describe('resolveReady', () => {
  it('agrees with the store query on a mixed graph', () => {
    const ids = ['a000000', 'b000000', 'c000000', 'd000000', 'e000000', 'f000000'];
    ids.forEach((id, i) => addWire(db, id, { priority: i % 3 }));
    addDependency(db, 'b000000', 'a000000');
    addDependency(db, 'c000000', 'b000000');
    addDependency(db, 'd000000', 'a000000');
    addDependency(db, 'e000000', 'f000000');
    completeWire(db, 'a000000');
    setStatus(db, 'f000000', Status.Cancelled);
    startWire(db, 'd000000');

    const inMemory = resolveReady(listWires(db), getAllEdges(db)).map(w => w.id);
    expect(inMemory).toEqual(readyIds());
    expect(inMemory).toEqual(['d000000', 'b000000']);
  });
});
