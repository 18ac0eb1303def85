/**
 * Memory tools: create_memory, edit_memory, delete_memory
 *
 * Let the model maintain long-lived notes about the user in one memory scope
 * (an assistant id, or the global scope).
 */

import type { MemoryStore, TextPart, ToolDefinition } from '@toolgate/core';
import { defineTool, ToolgateError } from '@toolgate/core';
import { z } from 'zod';

const createInput = z.object({
  content: z.string().min(1).describe('The memory to store, one fact per record'),
});

const editInput = z.object({
  id: z.number().int().describe('Id of the memory record to replace'),
  content: z.string().min(1).describe('New content of the record'),
});

const deleteInput = z.object({
  id: z.number().int().describe('Id of the memory record to delete'),
});

function jsonOutput(value: unknown): TextPart[] {
  return [{ type: 'text', text: JSON.stringify(value) }];
}

class MemoryNotFoundError extends ToolgateError {
  constructor(public readonly memoryId: number) {
    super(`Memory ${memoryId} not found`, 'MEMORY_NOT_FOUND');
    this.name = 'MemoryNotFoundError';
  }
}

export function buildMemoryTools(
  store: MemoryStore,
  scopeId: string,
): ToolDefinition[] {
  const createMemory = defineTool({
    name: 'create_memory',
    description:
      'Store a new memory about the user. Use it for stable preferences and facts worth recalling in later conversations.',
    inputSchema: createInput,
    needsApproval: false,
    async execute(input) {
      return jsonOutput(await store.add(scopeId, input.content));
    },
  });

  const editMemory = defineTool({
    name: 'edit_memory',
    description: 'Replace the content of an existing memory record.',
    inputSchema: editInput,
    needsApproval: false,
    async execute(input) {
      const updated = await store.updateContent(input.id, input.content);
      if (!updated) throw new MemoryNotFoundError(input.id);
      return jsonOutput(updated);
    },
  });

  const deleteMemory = defineTool({
    name: 'delete_memory',
    description: 'Delete a memory record that is wrong or no longer relevant.',
    inputSchema: deleteInput,
    needsApproval: false,
    async execute(input) {
      if (!(await store.delete(input.id))) {
        throw new MemoryNotFoundError(input.id);
      }
      return jsonOutput({ id: input.id, deleted: true });
    },
  });

  return [createMemory, editMemory, deleteMemory];
}
