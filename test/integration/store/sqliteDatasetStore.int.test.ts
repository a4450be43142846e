import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { SqliteDatasetStore } from '../../../src/store/sqlite/SqliteDatasetStore.js';
import { ConfigError } from '../../../src/errors.js';
import type { Instant } from '../../../src/types/ids.js';

function makeClock(start = 1_700_000_000_000): () => Instant {
  let current = start;
  return () => new Date(current++).toISOString();
}

describe('SqliteDatasetStore', () => {
  it('round-trips JSON values with their broadcast flag', () => {
    const store = new SqliteDatasetStore({ now: makeClock() });
    store.set('scan.axes', JSON.stringify([{ path: '*' }]), { broadcast: true });
    store.set('scan.completed', false, { broadcast: true });
    store.set('local', { nested: [1, 2] });
    expect(store.get('scan.axes')).toBe('[{"path":"*"}]');
    expect(store.get('scan.completed')).toBe(false);
    expect(store.get('local')).toEqual({ nested: [1, 2] });
    expect(store.isBroadcast('scan.completed')).toBe(true);
    expect(store.isBroadcast('local')).toBe(false);
    expect(store.entry('scan.axes')?.updatedAt).toBe('2023-11-14T22:13:20.000Z');
    store.close();
  });

  it('overwrites on set and grows on append', () => {
    const store = new SqliteDatasetStore();
    store.set('k', 1);
    store.set('k', 2, { broadcast: true });
    expect(store.get('k')).toBe(2);
    expect(store.isBroadcast('k')).toBe(true);
    store.append('xs', 0.5);
    store.append('xs', 1.5);
    expect(store.get('xs')).toEqual([0.5, 1.5]);
    expect(() => store.append('k', 3)).toThrow(ConfigError);
    expect(store.get('k')).toBe(2);
    store.close();
  });

  it('keeps one row per list element and appends after a set array', () => {
    const store = new SqliteDatasetStore();
    store.set('ys', [1, 2], { broadcast: true });
    store.append('ys', 3);
    expect(store.get('ys')).toEqual([1, 2, 3]);
    expect(store.itemCount('ys')).toBe(3);
    expect(store.isBroadcast('ys')).toBe(true);
    store.set('ys', ['a']);
    expect(store.get('ys')).toEqual(['a']);
    expect(store.itemCount('ys')).toBe(1);
    store.set('ys', 'scalar');
    expect(store.get('ys')).toBe('scalar');
    expect(store.itemCount('ys')).toBe(0);
    store.close();
  });

  it('reads back many appends in order', () => {
    const store = new SqliteDatasetStore();
    const expected: number[] = [];
    for (let i = 0; i < 500; i++) {
      store.append('trace', i * 0.5);
      expected.push(i * 0.5);
    }
    expect(store.itemCount('trace')).toBe(500);
    expect(store.get('trace')).toEqual(expected);
    store.close();
  });

  it('lists keys by prefix', () => {
    const store = new SqliteDatasetStore();
    store.set('scan.seed', 1);
    store.set('scan.rid', 2);
    store.set('misc', 3);
    expect(store.keys('scan.')).toEqual(['scan.rid', 'scan.seed']);
    expect(store.has('misc')).toBe(true);
    expect(store.has('nope')).toBe(false);
    store.close();
  });

  it('persists to a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'sweepkit-'));
    try {
      const path = join(dir, 'datasets.db');
      const first = new SqliteDatasetStore({ path });
      first.append('xs', 1);
      first.close();
      const second = new SqliteDatasetStore({ path });
      expect(second.get('xs')).toEqual([1]);
      second.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
