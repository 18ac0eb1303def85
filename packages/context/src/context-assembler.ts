/**
 * @toolgate/context: Context Assembler
 *
 * Builds the internal prompt for one generation round: a system message
 * followed by the truncated, size-limited history.
 *
 * System prompt order: assistant prompt (with skills) + memories + recent
 * chats + workflow phase block + each tool's own fragment.
 */

import type {
  Assistant,
  AssistantMemory,
  ConversationSummary,
  Message,
  ModelInfo,
  RecentConversations,
  ToolDefinition,
  WorkflowPhase,
} from '@toolgate/core';
import { systemMessage } from '@toolgate/core';
import type { SkillRegistry } from '@toolgate/skills';
import { mergeSkillPrompts } from '@toolgate/skills';
import { limitContext, truncate } from './message-history.js';
import { buildWorkflowPhasePrompt } from './phase-prompt.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ContextAssemblerConfig {
  skillRegistry?: SkillRegistry;
  recentConversations?: RecentConversations;
  /** Conversations listed in the recent chats section (default 10) */
  recentChatsLimit?: number;
}

export interface AssembleOptions {
  assistant: Assistant;
  model: ModelInfo;
  /** Conversation history, as stored */
  messages: Message[];
  memories: AssistantMemory[];
  tools: ToolDefinition[];
  workflowPhase: WorkflowPhase | null;
  /** Excluded from the recent chats section */
  conversationId: string;
  truncateIndex: number;
}

// ---------------------------------------------------------------------------
// Prompt sections
// ---------------------------------------------------------------------------

export function buildMemoryPrompt(memories: AssistantMemory[]): string {
  const records =
    memories.length === 0
      ? '(no memories yet)'
      : memories.map((m) => `- [id=${m.id}] ${m.content}`).join('\n');

  return `## Memories

Records remembered about the user from earlier conversations. Keep them current
with the create_memory, edit_memory and delete_memory tools; store only stable
facts and preferences.

<memories>
${records}
</memories>`;
}

export function buildRecentChatsPrompt(conversations: ConversationSummary[]): string {
  if (conversations.length === 0) return '';

  const lines = conversations.map(
    (c) => `- ${c.title || 'Untitled'} (${new Date(c.updatedAt).toISOString().slice(0, 10)})`,
  );
  return `## Recent Conversations

Titles of the user's most recent conversations with you, newest first:
${lines.join('\n')}`;
}

// ---------------------------------------------------------------------------
// Context Assembler
// ---------------------------------------------------------------------------

export class ContextAssembler {
  private readonly skillRegistry?: SkillRegistry;
  private readonly recentConversations?: RecentConversations;
  private readonly recentChatsLimit: number;

  constructor(config: ContextAssemblerConfig = {}) {
    this.skillRegistry = config.skillRegistry;
    this.recentConversations = config.recentConversations;
    this.recentChatsLimit = config.recentChatsLimit ?? 10;
  }

  /**
   * Assemble the prompt messages for one round. The system message is left
   * out when every section is blank.
   */
  async assemble(opts: AssembleOptions): Promise<Message[]> {
    const system = await this.buildSystemPrompt(opts);
    const history = limitContext(
      truncate(opts.messages, opts.truncateIndex),
      opts.assistant.contextMessageSize,
    );
    return system.trim() === '' ? history : [systemMessage(system), ...history];
  }

  async buildSystemPrompt(opts: AssembleOptions): Promise<string> {
    const { assistant } = opts;
    const sections: string[] = [];

    // 1. Assistant prompt with linked skills
    const skills = this.skillRegistry?.forAssistant(assistant.skillIds) ?? [];
    sections.push(mergeSkillPrompts(assistant.systemPrompt, skills));

    // 2. Memories
    if (assistant.enableMemory) {
      sections.push(buildMemoryPrompt(opts.memories));
    }

    // 3. Recent chats
    if (assistant.enableRecentChatsReference && this.recentConversations) {
      const recent = await this.recentConversations.getRecent(
        assistant.id,
        this.recentChatsLimit + 1,
      );
      sections.push(
        buildRecentChatsPrompt(
          recent
            .filter((c) => c.id !== opts.conversationId)
            .slice(0, this.recentChatsLimit),
        ),
      );
    }

    // 4. Workflow phase
    if (opts.workflowPhase !== null) {
      sections.push(buildWorkflowPhasePrompt(opts.workflowPhase));
    }

    // 5. Tool fragments
    for (const tool of opts.tools) {
      sections.push(
        tool.systemPrompt?.({ model: opts.model, messages: opts.messages }) ?? '',
      );
    }

    return sections.filter((s) => s.trim() !== '').join('\n\n');
  }
}
