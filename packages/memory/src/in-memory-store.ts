/**
 * @toolgate/memory: In-memory store
 *
 * Process-local MemoryStore for tests and ephemeral sessions.
 */

import type { AssistantMemory, MemoryStore } from '@toolgate/core';
import { now } from '@toolgate/core';

export class InMemoryMemoryStore implements MemoryStore {
  private records = new Map<number, AssistantMemory>();
  private nextId = 1;

  async list(scopeId: string): Promise<AssistantMemory[]> {
    return Array.from(this.records.values()).filter((r) => r.scopeId === scopeId);
  }

  async add(scopeId: string, content: string): Promise<AssistantMemory> {
    const timestamp = now();
    const record: AssistantMemory = {
      id: this.nextId++,
      scopeId,
      content,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.records.set(record.id, record);
    return record;
  }

  async updateContent(id: number, content: string): Promise<AssistantMemory | null> {
    const existing = this.records.get(id);
    if (!existing) return null;

    const updated = { ...existing, content, updatedAt: now() };
    this.records.set(id, updated);
    return updated;
  }

  async delete(id: number): Promise<boolean> {
    return this.records.delete(id);
  }
}
