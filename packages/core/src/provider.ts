/**
 * @toolgate/core: Provider types
 *
 * The provider abstraction the orchestrator depends on. Nothing else in the
 * system knows which AI provider or wire format is in use.
 */

import type { ModelInfo } from './assistant.js';
import type { JsonValue } from './json.js';
import type { Message, TokenUsage } from './messages.js';
import type { ToolDefinition } from './tools.js';

// ---------------------------------------------------------------------------
// Provider settings
// ---------------------------------------------------------------------------

export interface ProviderSetting {
  /** Unique id, referenced by ModelInfo.providerId */
  id: string;
  /** Implementation key, resolved through the provider registry */
  type: string;
  name?: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface Settings {
  providers: ProviderSetting[];
  /** Template for translateText, with {source_text} and {target_lang} placeholders */
  translatePrompt?: string;
}

// ---------------------------------------------------------------------------
// Provider output
// ---------------------------------------------------------------------------

/** One incremental unit of a streamed generation. */
export type ProviderChunk =
  | { kind: 'text-delta'; text: string; usage?: TokenUsage }
  | {
      kind: 'tool-call-delta';
      toolCallId: string;
      /** Present on the first delta of a call */
      toolName?: string;
      inputDelta: string;
      usage?: TokenUsage;
    }
  | { kind: 'usage'; usage: TokenUsage };

export interface GeneratedToolCall {
  toolCallId: string;
  toolName: string;
  /** JSON-encoded arguments */
  input: string;
}

/** Result of a single-shot generation. */
export interface GenerateResult {
  text: string;
  toolCalls: GeneratedToolCall[];
  usage?: TokenUsage;
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export interface GenerationParams {
  model: ModelInfo;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  /** Reasoning token budget for models that support it */
  thinkingBudget?: number;
  tools: ToolDefinition[];
  customHeaders: Record<string, string>;
  customBody: Record<string, JsonValue>;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Provider interface
// ---------------------------------------------------------------------------

/**
 * Both operations may fail; a failure ends the whole generation call.
 */
export interface Provider<S extends ProviderSetting = ProviderSetting> {
  generate(
    setting: S,
    messages: Message[],
    params: GenerationParams,
  ): Promise<GenerateResult>;

  streamGenerate(
    setting: S,
    messages: Message[],
    params: GenerationParams,
  ): AsyncIterable<ProviderChunk>;
}
