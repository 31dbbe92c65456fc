import { describe, it, expect } from 'vitest';
import {
  generateId, nextUpdatedAt, nowSeconds,
  normalizeDescription, getBlockers, isBlocked,
} from '../../src/queries/wire-helpers.js';
import { Status } from '../../src/types/status.js';

describe('generateId', () => {
  it('produces 7 lowercase hex characters', () => {
    const id = generateId('Test wire');
    expect(id).toMatch(/^[0-9a-f]{7}$/);
  });

  it('differs between calls with the same title', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId('Same title')));
    expect(ids.size).toBe(50);
  });
});

describe('timestamps', () => {
  it('truncates to whole seconds', () => {
    expect(nowSeconds(new Date('2026-01-01T00:00:01.999Z'))).toBe(1767225601);
  });

  it('never goes backwards', () => {
    expect(nextUpdatedAt(100, 90)).toBe(100);
    expect(nextUpdatedAt(100, 120)).toBe(120);
  });
});

describe('normalizeDescription', () => {
  it('maps empty and whitespace to null and keeps text as is', () => {
    expect(normalizeDescription('')).toBeNull();
    expect(normalizeDescription('  ')).toBeNull();
    expect(normalizeDescription(undefined)).toBeNull();
    expect(normalizeDescription(' keep ')).toBe(' keep ');
  });
});

describe('isBlocked', () => {
  const dep = (id: string, status: Status) => ({ id, title: id, status });

  it('is blocked while any dependency is todo or in progress', () => {
    const wire = { dependsOn: [dep('a', Status.Done), dep('b', Status.InProgress), dep('c', Status.Todo)] };
    expect(isBlocked(wire)).toBe(true);
    expect(getBlockers(wire).map(d => d.id)).toEqual(['b', 'c']);
  });

  it('is not blocked by done or cancelled dependencies', () => {
    expect(isBlocked({ dependsOn: [dep('a', Status.Done), dep('b', Status.Cancelled)] })).toBe(false);
    expect(isBlocked({ dependsOn: [] })).toBe(false);
  });
});
