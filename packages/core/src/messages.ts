/**
 * @toolgate/core: Message model
 *
 * Conversation state as immutable-by-replacement lists of messages.
 * Every operation here returns a new list; nothing is mutated in place.
 */

import type { GenerateResult, ProviderChunk } from './provider.js';
import { assertNever, generateId, now } from './utils.js';

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export type ApprovalState =
  | { type: 'auto' }
  | { type: 'pending' }
  | { type: 'approved' }
  | { type: 'denied'; reason: string };

interface ToolCallBase {
  type: 'tool-call';
  toolCallId: string;
  toolName: string;
  /** Raw JSON arguments as produced by the model */
  input: string;
  approval: ApprovalState;
}

/** A call the orchestrator has not acted on yet. Never carries output. */
export interface UnexecutedToolCall extends ToolCallBase {
  executed: false;
}

/** A finished call. Output is final. */
export interface ExecutedToolCall extends ToolCallBase {
  executed: true;
  output: TextPart[];
}

export type ToolCallPart = UnexecutedToolCall | ExecutedToolCall;

export type MessagePart = TextPart | ToolCallPart;

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface Message {
  id: string;
  role: MessageRole;
  parts: MessagePart[];
  usage?: TokenUsage;
  /** Unix timestamp in milliseconds */
  createdAt: number;
  /** Stamped when a generation round for this message completes */
  finishedAt?: number;
}

export function createMessage(role: MessageRole, parts: MessagePart[]): Message {
  return { id: generateId(), role, parts, createdAt: now() };
}

export function userMessage(text: string): Message {
  return createMessage('user', [{ type: 'text', text }]);
}

export function systemMessage(text: string): Message {
  return createMessage('system', [{ type: 'text', text }]);
}

export function assistantMessage(parts: MessagePart[]): Message {
  return createMessage('assistant', parts);
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function isToolCall(part: MessagePart): part is ToolCallPart {
  return part.type === 'tool-call';
}

export function getToolCalls(message: Message): ToolCallPart[] {
  return message.parts.filter(isToolCall);
}

export function getUnexecutedToolCalls(message: Message): UnexecutedToolCall[] {
  return message.parts.filter(
    (part): part is UnexecutedToolCall => isToolCall(part) && !part.executed,
  );
}

/** Concatenated text of all text parts. */
export function messageText(message: Message): string {
  return message.parts
    .filter((part): part is TextPart => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

export function mergeUsage(
  current: TokenUsage | undefined,
  next: TokenUsage,
): TokenUsage {
  if (!current) return { ...next };
  return {
    inputTokens: current.inputTokens + next.inputTokens,
    outputTokens: current.outputTokens + next.outputTokens,
    totalTokens: current.totalTokens + next.totalTokens,
  };
}

/** A single text part carrying a structured error payload for the model. */
export function errorOutput(message: string): TextPart[] {
  return [{ type: 'text', text: JSON.stringify({ error: message }) }];
}

// ---------------------------------------------------------------------------
// Copy-on-write updates
// ---------------------------------------------------------------------------

/** Replace the last message of the list with the result of `update`. */
export function updateLastMessage(
  messages: Message[],
  update: (message: Message) => Message,
): Message[] {
  const last = messages.at(-1);
  if (!last) return messages;
  return [...messages.slice(0, -1), update(last)];
}

/**
 * Replace tool-call parts of the last message by `toolCallId`, keeping
 * their positions. Executed parts are final and are left as they are.
 */
export function replaceToolCalls(
  messages: Message[],
  calls: ToolCallPart[],
): Message[] {
  if (calls.length === 0) return messages;
  const byId = new Map(calls.map((call) => [call.toolCallId, call]));

  return updateLastMessage(messages, (message) => {
    let changed = false;
    const parts = message.parts.map((part) => {
      if (!isToolCall(part) || part.executed) return part;
      const replacement = byId.get(part.toolCallId);
      if (!replacement || replacement === part) return part;
      changed = true;
      return replacement;
    });
    return changed ? { ...message, parts } : message;
  });
}

/**
 * Return a list whose last message is an assistant message, appending an
 * empty one when the conversation currently ends with another role.
 */
function withAssistantTail(messages: Message[]): Message[] {
  const last = messages.at(-1);
  if (last?.role === 'assistant') return messages;
  return [...messages, assistantMessage([])];
}

function appendText(parts: MessagePart[], text: string): MessagePart[] {
  const tail = parts.at(-1);
  if (tail?.type === 'text') {
    return [...parts.slice(0, -1), { type: 'text', text: tail.text + text }];
  }
  return [...parts, { type: 'text', text }];
}

/**
 * Key under which a provider call id is stored. Servers that reuse ids
 * across rounds (`call_0` every turn) would collide with calls executed in an
 * earlier step of the same message, so such ids get a `-N` suffix. The key
 * only depends on the executed calls, which do not change within a round.
 */
export function resolveToolCallId(parts: MessagePart[], toolCallId: string): string {
  const executedIds = new Set<string>();
  for (const part of parts) {
    if (isToolCall(part) && part.executed) executedIds.add(part.toolCallId);
  }
  if (!executedIds.has(toolCallId)) return toolCallId;

  let suffix = 1;
  while (executedIds.has(`${toolCallId}-${suffix}`)) suffix++;
  return `${toolCallId}-${suffix}`;
}

function appendToolCallDelta(
  parts: MessagePart[],
  toolCallId: string,
  toolName: string | undefined,
  inputDelta: string,
): MessagePart[] {
  const key = resolveToolCallId(parts, toolCallId);
  const index = parts.findIndex(
    (part) => isToolCall(part) && !part.executed && part.toolCallId === key,
  );
  const existing = parts[index];

  if (!existing || !isToolCall(existing) || existing.executed) {
    const call: UnexecutedToolCall = {
      type: 'tool-call',
      toolCallId: key,
      toolName: toolName ?? '',
      input: inputDelta,
      approval: { type: 'auto' },
      executed: false,
    };
    return [...parts, call];
  }

  const extended: UnexecutedToolCall = {
    ...existing,
    toolName: toolName ?? existing.toolName,
    input: existing.input + inputDelta,
  };
  return [...parts.slice(0, index), extended, ...parts.slice(index + 1)];
}

/**
 * Merge one streamed provider chunk into the conversation.
 */
export function applyProviderChunk(
  messages: Message[],
  chunk: ProviderChunk,
): Message[] {
  const base = withAssistantTail(messages);

  return updateLastMessage(base, (message) => {
    let parts = message.parts;
    switch (chunk.kind) {
      case 'text-delta':
        parts = chunk.text ? appendText(parts, chunk.text) : parts;
        break;
      case 'tool-call-delta':
        parts = appendToolCallDelta(
          parts,
          chunk.toolCallId,
          chunk.toolName,
          chunk.inputDelta,
        );
        break;
      case 'usage':
        break;
      default:
        assertNever(chunk);
    }

    const usage = chunk.usage ? mergeUsage(message.usage, chunk.usage) : message.usage;
    if (parts === message.parts && usage === message.usage) return message;
    return { ...message, parts, usage };
  });
}

/**
 * Merge a single-shot generation result into the conversation.
 */
export function applyGenerateResult(
  messages: Message[],
  result: GenerateResult,
): Message[] {
  let merged = applyProviderChunk(messages, {
    kind: 'text-delta',
    text: result.text,
    usage: result.usage,
  });
  for (const call of result.toolCalls) {
    merged = applyProviderChunk(merged, {
      kind: 'tool-call-delta',
      toolCallId: call.toolCallId,
      toolName: call.toolName,
      inputDelta: call.input,
    });
  }
  return merged;
}
