/**
 * @toolgate/core: Memory and conversation collaborators
 */

/** Scope shared by every assistant that enables global memory */
export const GLOBAL_MEMORY_ID = '__global__';

export interface AssistantMemory {
  id: number;
  /** Assistant id, or GLOBAL_MEMORY_ID */
  scopeId: string;
  content: string;
  createdAt: number;
  updatedAt: number;
}

export interface MemoryStore {
  list(scopeId: string): Promise<AssistantMemory[]>;
  add(scopeId: string, content: string): Promise<AssistantMemory>;
  /** Returns null when no record has the id */
  updateContent(id: number, content: string): Promise<AssistantMemory | null>;
  /** Returns whether a record was removed */
  delete(id: number): Promise<boolean>;
}

export interface ConversationSummary {
  id: string;
  title: string;
  updatedAt: number;
}

/** Read access to other conversations of an assistant, newest first. */
export interface RecentConversations {
  getRecent(assistantId: string, limit: number): Promise<ConversationSummary[]>;
}
