/**
 * @toolgate/engine-adapter: AI SDK Provider
 *
 * Implements the toolgate Provider contract on top of the Vercel AI SDK.
 * Each call is a single model step: tools are declared without `execute`,
 * so the SDK never runs them and the generation loop stays in charge of
 * approval, policy and execution.
 *
 * Wire formats are the SDK's business. Callers supply a resolver that turns
 * a provider setting and model into an AI SDK LanguageModel.
 */

import {
  generateText,
  streamText,
  tool,
  type LanguageModel,
  type LanguageModelUsage,
  type ModelMessage,
  type TextPart as SdkTextPart,
  type ToolCallPart as SdkToolCallPart,
  type ToolResultPart as SdkToolResultPart,
  type ToolSet,
} from 'ai';
import type {
  GenerateResult,
  GenerationParams,
  JsonObject,
  JsonValue,
  Logger,
  Message,
  MessagePart,
  ModelInfo,
  Provider,
  ProviderChunk,
  ProviderSetting,
  TokenUsage,
  ToolDefinition,
} from '@toolgate/core';
import { assertNever, isJsonObject, logger as rootLogger, messageText } from '@toolgate/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LanguageModelResolver = (setting: ProviderSetting, model: ModelInfo) => LanguageModel;

export interface AiSdkProviderConfig {
  languageModel: LanguageModelResolver;
  logger?: Logger;
}

type ProviderOptions = NonNullable<Parameters<typeof streamText>[0]['providerOptions']>;
type ProviderOptionValue = ProviderOptions[string][string];

// ---------------------------------------------------------------------------
// AI SDK Provider
// ---------------------------------------------------------------------------

export class AiSdkProvider implements Provider {
  private readonly languageModel: LanguageModelResolver;
  private readonly log: Logger;

  constructor(config: AiSdkProviderConfig) {
    this.languageModel = config.languageModel;
    this.log = (config.logger ?? rootLogger).child({ component: 'ai-sdk-provider' });
  }

  async generate(
    setting: ProviderSetting,
    messages: Message[],
    params: GenerationParams,
  ): Promise<GenerateResult> {
    const result = await generateText(this.buildRequest(setting, messages, params));

    return {
      text: result.text,
      toolCalls: result.toolCalls.map((call) => ({
        toolCallId: call.toolCallId,
        toolName: call.toolName,
        input: JSON.stringify(call.input ?? {}),
      })),
      usage: toUsage(result.usage),
    };
  }

  /**
   * Map the SDK's fullStream to provider chunks. Tool input is forwarded as
   * it streams; a tool call whose input never streamed is sent whole.
   */
  async *streamGenerate(
    setting: ProviderSetting,
    messages: Message[],
    params: GenerationParams,
  ): AsyncIterable<ProviderChunk> {
    const result = streamText({
      ...this.buildRequest(setting, messages, params),
      onError: ({ error }) => {
        this.log.debug({ err: error, model: params.model.modelId }, 'Model stream error');
      },
    });
    const streamedInputs = new Set<string>();

    for await (const part of result.fullStream) {
      switch (part.type) {
        case 'text-delta':
          if (part.text) yield { kind: 'text-delta', text: part.text };
          break;

        case 'tool-input-start':
          streamedInputs.add(part.id);
          yield { kind: 'tool-call-delta', toolCallId: part.id, toolName: part.toolName, inputDelta: '' };
          break;

        case 'tool-input-delta':
          yield { kind: 'tool-call-delta', toolCallId: part.id, inputDelta: part.delta };
          break;

        case 'tool-call':
          if (!streamedInputs.has(part.toolCallId)) {
            yield {
              kind: 'tool-call-delta',
              toolCallId: part.toolCallId,
              toolName: part.toolName,
              inputDelta: JSON.stringify(part.input ?? {}),
            };
          }
          break;

        case 'finish':
          yield { kind: 'usage', usage: toUsage(part.totalUsage) };
          break;

        case 'error':
          throw part.error instanceof Error ? part.error : new Error(String(part.error));

        default:
          // Reasoning, sources, step boundaries and lifecycle markers
          break;
      }
    }
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private buildRequest(setting: ProviderSetting, messages: Message[], params: GenerationParams) {
    return {
      model: this.languageModel(setting, params.model),
      messages: toModelMessages(messages),
      tools: toToolSet(params.tools),
      temperature: params.temperature,
      topP: params.topP,
      maxOutputTokens: params.maxTokens,
      headers: params.customHeaders,
      providerOptions: toProviderOptions(setting.type, params.customBody, params.thinkingBudget),
      abortSignal: params.signal,
    };
  }
}

// ---------------------------------------------------------------------------
// Conversion: toolgate → AI SDK
// ---------------------------------------------------------------------------

/** Declare tools to the model without handing their execution to the SDK. */
export function toToolSet(tools: ToolDefinition[]): ToolSet {
  const set: ToolSet = {};
  for (const definition of tools) {
    set[definition.name] = tool({
      description: definition.description,
      inputSchema: definition.inputSchema,
    });
  }
  return set;
}

/**
 * Convert the conversation to AI SDK messages. An assistant message holding
 * several steps is split into assistant and tool turns at each step
 * boundary. Calls without output are left out.
 */
export function toModelMessages(messages: Message[]): ModelMessage[] {
  const result: ModelMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        result.push({ role: 'system', content: messageText(message) });
        break;
      case 'user':
        result.push({ role: 'user', content: messageText(message) });
        break;
      case 'assistant':
        result.push(...assistantTurns(message.parts));
        break;
      case 'tool':
        // Tool results live on the assistant message's calls
        break;
      default:
        assertNever(message.role);
    }
  }

  return result;
}

function assistantTurns(parts: MessagePart[]): ModelMessage[] {
  const turns: ModelMessage[] = [];
  let content: Array<SdkTextPart | SdkToolCallPart> = [];
  let results: SdkToolResultPart[] = [];

  const flush = () => {
    if (content.length > 0) turns.push({ role: 'assistant', content });
    if (results.length > 0) turns.push({ role: 'tool', content: results });
    content = [];
    results = [];
  };

  for (const part of parts) {
    if (part.type === 'text') {
      if (results.length > 0) flush();
      if (part.text !== '') content.push({ type: 'text', text: part.text });
      continue;
    }
    if (!part.executed) continue;

    content.push({
      type: 'tool-call',
      toolCallId: part.toolCallId,
      toolName: part.toolName,
      input: parseToolInput(part.input),
    });
    results.push({
      type: 'tool-result',
      toolCallId: part.toolCallId,
      toolName: part.toolName,
      output: { type: 'text', value: part.output.map((p) => p.text).join('') },
    });
  }

  flush();
  return turns;
}

function parseToolInput(input: string): unknown {
  if (input.trim() === '') return {};
  try {
    return JSON.parse(input);
  } catch {
    return input;
  }
}

/**
 * customBody is sent as provider options keyed by the setting type, over the
 * reasoning options derived from the thinking budget.
 */
export function toProviderOptions(
  type: string,
  body: Record<string, JsonValue>,
  thinkingBudget?: number,
): ProviderOptions | undefined {
  const options = { ...thinkingOptions(type, thinkingBudget), ...toOptionObject(body) };
  if (Object.keys(options).length === 0) return undefined;
  return { [type]: options };
}

/** Reasoning budget in the option shape of providers that accept one. */
function thinkingOptions(
  type: string,
  budget: number | undefined,
): Record<string, ProviderOptionValue> {
  if (budget === undefined) return {};
  switch (type) {
    case 'anthropic':
      return {
        thinking: budget > 0 ? { type: 'enabled', budgetTokens: budget } : { type: 'disabled' },
      };
    case 'google':
      return { thinkingConfig: { thinkingBudget: budget } };
    default:
      return {};
  }
}

function toOptionObject(value: JsonObject): Record<string, ProviderOptionValue> {
  const out: Record<string, ProviderOptionValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) out[key] = toOptionValue(entry);
  }
  return out;
}

function toOptionValue(value: JsonValue): ProviderOptionValue {
  if (Array.isArray(value)) return value.map(toOptionValue);
  if (isJsonObject(value)) return toOptionObject(value);
  return value;
}

// ---------------------------------------------------------------------------
// Conversion: AI SDK → toolgate
// ---------------------------------------------------------------------------

function toUsage(usage: LanguageModelUsage): TokenUsage {
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: usage.totalTokens ?? inputTokens + outputTokens,
  };
}
