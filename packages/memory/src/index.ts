/**
 * @toolgate/memory
 *
 * MemoryStore implementations backing the memory tools and memory prompt.
 */

export { InMemoryMemoryStore } from './in-memory-store.js';
export { SqliteMemoryStore } from './sqlite-store.js';
