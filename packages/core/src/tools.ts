/**
 * @toolgate/core: Tool types
 *
 * The contract every tool exposes to the orchestrator.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ModelInfo } from './assistant.js';
import type { Message, TextPart } from './messages.js';
import type { WorkflowPhase } from './workflow.js';

// ---------------------------------------------------------------------------
// Tool definition
// ---------------------------------------------------------------------------

export interface ToolPromptContext {
  model: ModelInfo;
  messages: Message[];
}

/**
 * Tool names must be unique within one generation call; when two tools share
 * a name the first one wins.
 */
export interface ToolDefinition<I = unknown> {
  /** Unique tool name, e.g. 'sandbox_file' */
  name: string;
  /** Human-readable description for model tool selection */
  description: string;
  /** Zod schema the parsed JSON arguments must satisfy */
  inputSchema: ZodType<I, ZodTypeDef, unknown>;
  /** Calls stop at 'pending' until a human approves or denies them */
  needsApproval: boolean;
  /** Fragment appended to the system prompt while this tool is available */
  systemPrompt?(ctx: ToolPromptContext): string;
  execute(input: I, ctx: ToolContext): Promise<TextPart[]>;
}

export function defineTool<I>(tool: ToolDefinition<I>): ToolDefinition<I> {
  return tool;
}

// ---------------------------------------------------------------------------
// Tool context
// ---------------------------------------------------------------------------

/** Context provided to every tool execution */
export interface ToolContext {
  /** Scopes side effects such as sandbox file access */
  conversationId: string;
  toolCallId: string;
  phase: WorkflowPhase | null;
  signal?: AbortSignal;
}
