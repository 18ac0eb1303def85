/**
 * @toolgate/memory: Tests
 */

import type { MemoryStore } from '@toolgate/core';
import { GLOBAL_MEMORY_ID } from '@toolgate/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InMemoryMemoryStore } from '../src/in-memory-store.js';
import { SqliteMemoryStore } from '../src/sqlite-store.js';

const stores: Array<[string, () => MemoryStore & { close?(): void }]> = [
  ['InMemoryMemoryStore', () => new InMemoryMemoryStore()],
  ['SqliteMemoryStore', () => new SqliteMemoryStore(':memory:')],
];

describe.each(stores)('%s', (_name, createStore) => {
  let store: MemoryStore & { close?(): void };

  beforeEach(() => {
    store = createStore();
  });

  afterEach(() => {
    store.close?.();
  });

  it('adds records with increasing ids', async () => {
    const first = await store.add('assistant-1', 'Prefers short answers');
    const second = await store.add('assistant-1', 'Writes TypeScript');

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.scopeId).toBe('assistant-1');
    expect(first.createdAt).toBe(first.updatedAt);
  });

  it('lists records of one scope in insertion order', async () => {
    await store.add('assistant-1', 'one');
    await store.add(GLOBAL_MEMORY_ID, 'shared');
    await store.add('assistant-1', 'two');

    const scoped = await store.list('assistant-1');
    expect(scoped.map((m) => m.content)).toEqual(['one', 'two']);
    expect((await store.list(GLOBAL_MEMORY_ID)).map((m) => m.content)).toEqual(['shared']);
    expect(await store.list('assistant-2')).toEqual([]);
  });

  it('updates content in place', async () => {
    const record = await store.add('assistant-1', 'Lives in Lisbon');

    const updated = await store.updateContent(record.id, 'Lives in Porto');

    expect(updated?.id).toBe(record.id);
    expect(updated?.content).toBe('Lives in Porto');
    expect((await store.list('assistant-1')).map((m) => m.content)).toEqual(['Lives in Porto']);
  });

  it('returns null when updating an unknown id', async () => {
    expect(await store.updateContent(42, 'nothing')).toBeNull();
  });

  it('deletes records and reports whether one was removed', async () => {
    const record = await store.add('assistant-1', 'temporary');

    expect(await store.delete(record.id)).toBe(true);
    expect(await store.delete(record.id)).toBe(false);
    expect(await store.list('assistant-1')).toEqual([]);
  });
});
