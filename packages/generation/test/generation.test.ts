/**
 * @toolgate/generation: Tests
 */

import { InMemorySpanExporter, BasicTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { SpanStatusCode } from '@opentelemetry/api';
import type {
  AssistantInput,
  AssistantMemory,
  GenerateResult,
  GenerationChunk,
  GenerationParams,
  Message,
  ModelInfo,
  OutputTransformer,
  Provider,
  ProviderChunk,
  ProviderSetting,
  Settings,
  ToolCallPart,
} from '@toolgate/core';
import {
  assistantMessage,
  ApprovalError,
  defineTool,
  GLOBAL_MEMORY_ID,
  isToolCall,
  messageText,
  ProviderNotFoundError,
  parseAssistant,
  userMessage,
} from '@toolgate/core';
import { InMemoryMemoryStore } from '@toolgate/memory';
import { PhaseGuard } from '@toolgate/tool-kernel';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import {
  canTransition,
  deniedOutput,
  getPendingApprovals,
  getResolvedToolCalls,
  requestApprovals,
  resolveApproval,
} from '../src/approval-gate.js';
import type { GenerateTextOptions, GenerationHandlerConfig } from '../src/generation-handler.js';
import { GenerationHandler } from '../src/generation-handler.js';
import { ProviderRegistry } from '../src/provider-registry.js';
import { stripThinkTags, ThinkStripper, ThinkTagTransformer } from '../src/think-tag.js';
import { applyPlaceholders, isQwenMtModel, languageDisplayName } from '../src/translation.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

interface Round {
  chunks?: ProviderChunk[];
  result?: GenerateResult;
  error?: Error;
}

/** Plays back one scripted round per provider call and records the requests. */
class ScriptedProvider implements Provider {
  readonly prompts: Message[][] = [];
  readonly params: GenerationParams[] = [];
  closedStreams = 0;

  constructor(private readonly rounds: Round[]) {}

  async generate(
    _setting: ProviderSetting,
    messages: Message[],
    params: GenerationParams,
  ): Promise<GenerateResult> {
    const round = this.next(messages, params);
    if (round.error) throw round.error;
    return round.result ?? { text: '', toolCalls: [] };
  }

  async *streamGenerate(
    _setting: ProviderSetting,
    messages: Message[],
    params: GenerationParams,
  ): AsyncIterable<ProviderChunk> {
    const round = this.next(messages, params);
    try {
      for (const chunk of round.chunks ?? []) yield chunk;
      if (round.error) throw round.error;
    } finally {
      this.closedStreams++;
    }
  }

  private next(messages: Message[], params: GenerationParams): Round {
    this.prompts.push(messages);
    this.params.push(params);
    const round = this.rounds.shift();
    if (!round) throw new Error('No scripted round left');
    return round;
  }
}

const SETTINGS: Settings = { providers: [{ id: 'p1', type: 'scripted' }] };
const MODEL: ModelInfo = { id: 'm1', modelId: 'test-model', providerId: 'p1' };

function assistant(overrides: Partial<AssistantInput> = {}) {
  return parseAssistant({ id: 'assistant-1', ...overrides });
}

function textChunk(text: string): ProviderChunk {
  return { kind: 'text-delta', text };
}

function toolCallResult(
  calls: Array<{ id: string; name: string; input: string }>,
  text = '',
): GenerateResult {
  return {
    text,
    toolCalls: calls.map((c) => ({ toolCallId: c.id, toolName: c.name, input: c.input })),
  };
}

function createTools() {
  const executions: string[] = [];
  const echo = defineTool({
    name: 'echo',
    description: 'Echo text back',
    inputSchema: z.object({ text: z.string() }),
    needsApproval: false,
    execute: async ({ text }) => {
      executions.push(`echo:${text}`);
      return [{ type: 'text', text: `echo: ${text}` }];
    },
  });
  const danger = defineTool({
    name: 'danger',
    description: 'Needs a human to approve',
    inputSchema: z.object({}),
    needsApproval: true,
    execute: async () => {
      executions.push('danger');
      return [{ type: 'text', text: 'danger done' }];
    },
  });
  const broken = defineTool({
    name: 'broken',
    description: 'Always fails',
    inputSchema: z.object({}),
    needsApproval: false,
    execute: async () => {
      throw new Error('boom');
    },
  });
  const sandboxShell = defineTool({
    name: 'sandbox_shell',
    description: 'Run shell operations',
    inputSchema: z.object({ operation: z.string() }),
    needsApproval: false,
    execute: async ({ operation }) => {
      executions.push(`shell:${operation}`);
      return [{ type: 'text', text: 'ran' }];
    },
  });
  return { executions, tools: [echo, danger, broken, sandboxShell] };
}

function createHandler(
  provider: Provider,
  config: Partial<GenerationHandlerConfig> = {},
): GenerationHandler {
  return new GenerationHandler({
    providers: new ProviderRegistry({ scripted: provider }),
    phaseGuard: new PhaseGuard(),
    ...config,
  });
}

async function collect(
  handler: GenerationHandler,
  opts: Partial<GenerateTextOptions> = {},
): Promise<GenerationChunk[]> {
  const chunks: GenerationChunk[] = [];
  for await (const chunk of handler.generateText({
    settings: SETTINGS,
    model: MODEL,
    messages: [userMessage('hi')],
    assistant: assistant(),
    ...opts,
  })) {
    chunks.push(chunk);
  }
  return chunks;
}

function lastMessage(chunk: GenerationChunk | undefined): Message {
  const message = chunk?.messages.at(-1);
  if (!message) throw new Error('Chunk has no messages');
  return message;
}

function callsOf(message: Message): ToolCallPart[] {
  return message.parts.filter(isToolCall);
}

function outputText(part: ToolCallPart | undefined): string {
  if (!part?.executed) throw new Error('Tool call was not executed');
  return part.output.map((p) => p.text).join('');
}

// =========================================================================
// Generation loop: plain text
// =========================================================================

describe('GenerationHandler: text rounds', () => {
  it('emits each streamed chunk and a final snapshot', async () => {
    const provider = new ScriptedProvider([
      {
        chunks: [
          textChunk('Hel'),
          { kind: 'text-delta', text: 'lo', usage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 } },
        ],
      },
    ]);
    const chunks = await collect(createHandler(provider));

    expect(chunks).toHaveLength(3);
    expect(messageText(lastMessage(chunks[0]))).toBe('Hel');
    expect(lastMessage(chunks[0]).finishedAt).toBeUndefined();
    expect(messageText(lastMessage(chunks[1]))).toBe('Hello');
    expect(lastMessage(chunks[1]).finishedAt).toBeUndefined();

    const final = lastMessage(chunks[2]);
    expect(final.role).toBe('assistant');
    expect(messageText(final)).toBe('Hello');
    expect(final.usage).toEqual({ inputTokens: 1, outputTokens: 2, totalTokens: 3 });
    expect(typeof final.finishedAt).toBe('number');
    expect(chunks[2]?.messages).toHaveLength(2);

    expect(provider.prompts).toHaveLength(1);
    expect(provider.prompts[0]?.map((m) => m.role)).toEqual(['user']);
  });

  it('emits a single snapshot for a non-streaming round', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'Hello', toolCalls: [] } }]);
    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
    });

    expect(chunks).toHaveLength(1);
    expect(messageText(lastMessage(chunks[0]))).toBe('Hello');
    expect(typeof lastMessage(chunks[0]).finishedAt).toBe('number');
  });

  it('does nothing until iterated', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'Hello', toolCalls: [] } }]);
    const handler = createHandler(provider);

    const generator = handler.generateText({
      settings: SETTINGS,
      model: MODEL,
      messages: [userMessage('hi')],
      assistant: assistant({ streamOutput: false }),
    });
    expect(provider.prompts).toHaveLength(0);

    await generator.next();
    expect(provider.prompts).toHaveLength(1);
  });

  it('sends the system prompt and merged request parameters', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);
    const { tools } = createTools();
    await collect(createHandler(provider), {
      assistant: assistant({
        streamOutput: false,
        systemPrompt: 'You are terse.',
        temperature: 0.5,
        thinkingBudget: 1024,
        customHeaders: { 'x-a': '1', 'x-b': '1' },
        customBody: { seed: 1 },
      }),
      model: { ...MODEL, customHeaders: { 'x-b': '2' }, customBody: { user: 'u1' } },
      tools,
    });

    const prompt = provider.prompts[0] ?? [];
    expect(prompt.map((m) => m.role)).toEqual(['system', 'user']);
    expect(prompt[0] && messageText(prompt[0])).toBe('You are terse.');

    const params = provider.params[0];
    expect(params?.temperature).toBe(0.5);
    expect(params?.thinkingBudget).toBe(1024);
    expect(params?.model.modelId).toBe('test-model');
    expect(params?.customHeaders).toEqual({ 'x-a': '1', 'x-b': '2' });
    expect(params?.customBody).toEqual({ seed: 1, user: 'u1' });
    expect(params?.tools.map((t) => t.name)).toEqual(['echo', 'danger', 'broken', 'sandbox_shell']);
  });

  it('truncates history before the given index', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);
    await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      messages: [userMessage('old'), assistantMessage([{ type: 'text', text: 'old reply' }]), userMessage('new')],
      truncateIndex: 2,
    });

    expect(provider.prompts[0]?.map(messageText)).toEqual(['new']);
  });
});

// =========================================================================
// Generation loop: tools
// =========================================================================

describe('GenerationHandler: tool execution', () => {
  it('executes a streamed tool call and continues with the next round', async () => {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      {
        chunks: [
          { kind: 'tool-call-delta', toolCallId: 'c1', toolName: 'echo', inputDelta: '{"text":' },
          { kind: 'tool-call-delta', toolCallId: 'c1', inputDelta: '"hi"}' },
        ],
      },
      { chunks: [textChunk('done')] },
    ]);

    const chunks = await collect(createHandler(provider), { tools });

    // 2 streamed + final, tool outputs, 1 streamed + final
    expect(chunks).toHaveLength(6);
    expect(executions).toEqual(['echo:hi']);

    const afterTools = callsOf(lastMessage(chunks[3]));
    expect(afterTools).toHaveLength(1);
    expect(outputText(afterTools[0])).toBe('echo: hi');

    const final = lastMessage(chunks[5]);
    expect(chunks[5]?.messages).toHaveLength(2);
    expect(final.parts).toHaveLength(2);
    expect(final.parts[0]).toMatchObject({ type: 'tool-call', toolCallId: 'c1', executed: true });
    expect(final.parts[1]).toEqual({ type: 'text', text: 'done' });

    const secondPrompt = provider.prompts[1] ?? [];
    expect(secondPrompt.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(callsOf(secondPrompt[1] ?? assistantMessage([]))[0]?.executed).toBe(true);
  });

  it('turns unknown tools and tool failures into error outputs', async () => {
    const { tools } = createTools();
    const provider = new ScriptedProvider([
      {
        result: toolCallResult([
          { id: 'c1', name: 'missing', input: '{}' },
          { id: 'c2', name: 'broken', input: '{}' },
        ]),
      },
      { result: { text: 'sorry', toolCalls: [] } },
    ]);

    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
    });

    expect(chunks).toHaveLength(3);
    const [missing, broken] = callsOf(lastMessage(chunks[1]));
    expect(outputText(missing)).toBe(
      JSON.stringify({ error: '[ToolNotFoundError] Tool missing not found' }),
    );
    expect(outputText(broken)).toBe(JSON.stringify({ error: '[Error] boom' }));
    expect(messageText(lastMessage(chunks[2]))).toBe('sorry');
  });

  it('blocks mutating sandbox operations in the plan phase', async () => {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'sandbox_shell', input: '{"operation":"write"}' }]) },
      { result: { text: 'understood', toolCalls: [] } },
    ]);

    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
      workflowPhase: 'plan',
    });

    expect(executions).toEqual([]);
    const payload = z
      .object({ error: z.string() })
      .parse(JSON.parse(outputText(callsOf(lastMessage(chunks[1]))[0])));
    expect(payload.error).toContain(
      '[PolicyViolationError] Operation blocked: the conversation is in the PLAN phase.',
    );
    expect(payload.error).toContain("The operation 'write' is not allowed in this phase.");

    const system = provider.prompts[0]?.[0];
    expect(system?.role).toBe('system');
    expect(system && messageText(system)).toContain('[Current workflow phase: PLAN]');
  });

  it('stops after maxSteps rounds', async () => {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'echo', input: '{"text":"one"}' }]) },
      { result: toolCallResult([{ id: 'c2', name: 'echo', input: '{"text":"two"}' }]) },
      { result: toolCallResult([{ id: 'c3', name: 'echo', input: '{"text":"three"}' }]) },
    ]);

    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
      maxSteps: 2,
    });

    expect(provider.prompts).toHaveLength(2);
    expect(chunks).toHaveLength(4);
    expect(executions).toEqual(['echo:one', 'echo:two']);
    expect(callsOf(lastMessage(chunks[3])).map((c) => c.executed)).toEqual([true, true]);
  });

  it('runs a call whose id repeats one executed in an earlier step', async () => {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'call_0', name: 'echo', input: '{"text":"one"}' }]) },
      { result: toolCallResult([{ id: 'call_0', name: 'echo', input: '{"text":"two"}' }]) },
      { result: { text: 'done', toolCalls: [] } },
    ]);

    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
    });

    expect(executions).toEqual(['echo:one', 'echo:two']);
    expect(provider.prompts).toHaveLength(3);
    expect(chunks).toHaveLength(5);

    const calls = callsOf(lastMessage(chunks[4]));
    expect(calls.map((c) => c.toolCallId)).toEqual(['call_0', 'call_0-1']);
    expect(calls.map(outputText)).toEqual(['echo: one', 'echo: two']);
    expect(lastMessage(chunks[4]).parts.at(-1)).toEqual({ type: 'text', text: 'done' });
  });

  it('emits nothing when maxSteps is zero', async () => {
    const provider = new ScriptedProvider([]);
    const chunks = await collect(createHandler(provider), { maxSteps: 0 });

    expect(chunks).toEqual([]);
    expect(provider.prompts).toHaveLength(0);
  });
});

// =========================================================================
// Generation loop: approvals
// =========================================================================

describe('GenerationHandler: approvals', () => {
  async function requestDanger() {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'danger', input: '{}' }]) },
    ]);
    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
    });
    return { chunks, executions, tools, provider };
  }

  it('halts with the call pending when the tool needs approval', async () => {
    const { chunks, executions, provider } = await requestDanger();

    expect(chunks).toHaveLength(2);
    expect(callsOf(lastMessage(chunks[0]))[0]?.approval).toEqual({ type: 'auto' });
    expect(callsOf(lastMessage(chunks[1]))[0]?.approval).toEqual({ type: 'pending' });
    expect(executions).toEqual([]);
    expect(provider.prompts).toHaveLength(1);
  });

  it('does not generate while a call is still pending', async () => {
    const { chunks, tools } = await requestDanger();
    const provider = new ScriptedProvider([]);

    const resumed = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      messages: chunks[1]?.messages ?? [],
      tools,
    });

    expect(resumed).toEqual([]);
    expect(provider.prompts).toHaveLength(0);
  });

  it('executes an approved call and continues', async () => {
    const { chunks, executions, tools } = await requestDanger();
    const approved = resolveApproval(chunks[1]?.messages ?? [], 'c1', { decision: 'approve' });
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);

    const resumed = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      messages: approved,
      tools,
    });

    expect(resumed).toHaveLength(2);
    expect(executions).toEqual(['danger']);
    const [call] = callsOf(lastMessage(resumed[0]));
    expect(call?.approval).toEqual({ type: 'approved' });
    expect(outputText(call)).toBe('danger done');
    expect(lastMessage(resumed[1]).parts.at(-1)).toEqual({ type: 'text', text: 'ok' });
  });

  it('records a denial without running the tool', async () => {
    const { chunks, executions, tools } = await requestDanger();
    const denied = resolveApproval(chunks[1]?.messages ?? [], 'c1', {
      decision: 'deny',
      reason: 'too risky',
    });
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);

    const resumed = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      messages: denied,
      tools,
    });

    expect(executions).toEqual([]);
    expect(outputText(callsOf(lastMessage(resumed[0]))[0])).toBe(
      JSON.stringify({ error: 'Tool execution denied by user. Reason: too risky' }),
    );
    expect(resumed).toHaveLength(2);
  });

  it('holds back auto calls that share a message with a pending one', async () => {
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      {
        result: toolCallResult([
          { id: 'c1', name: 'danger', input: '{}' },
          { id: 'c2', name: 'echo', input: '{"text":"x"}' },
        ]),
      },
      { result: { text: 'ok', toolCalls: [] } },
    ]);
    const handler = createHandler(provider);
    const base = { assistant: assistant({ streamOutput: false }), tools };

    const first = await collect(handler, base);
    expect(executions).toEqual([]);

    const approved = resolveApproval(first[1]?.messages ?? [], 'c1', { decision: 'approve' });
    const resumed = await collect(handler, { ...base, messages: approved });

    expect(executions).toEqual(['danger', 'echo:x']);
    expect(resumed).toHaveLength(2);
  });
});

// =========================================================================
// Generation loop: memory, transformers, failures
// =========================================================================

describe('GenerationHandler: memory', () => {
  it('offers memory tools and shows stored memories on the next round', async () => {
    const memoryStore = new InMemoryMemoryStore();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'create_memory', input: '{"content":"likes tea"}' }]) },
      { result: { text: 'noted', toolCalls: [] } },
    ]);

    await collect(createHandler(provider, { memoryStore }), {
      assistant: assistant({ streamOutput: false, enableMemory: true }),
    });

    const stored = await memoryStore.list('assistant-1');
    expect(stored.map((m) => m.content)).toEqual(['likes tea']);
    expect(provider.params[0]?.tools.map((t) => t.name)).toEqual([
      'create_memory',
      'edit_memory',
      'delete_memory',
    ]);

    const first = provider.prompts[0]?.[0];
    const second = provider.prompts[1]?.[0];
    expect(first && messageText(first)).toContain('(no memories yet)');
    expect(second && messageText(second)).toContain('- [id=1] likes tea');
  });

  it('writes to the global scope when the assistant shares memory', async () => {
    const memoryStore = new InMemoryMemoryStore();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'create_memory', input: '{"content":"shared"}' }]) },
      { result: { text: 'noted', toolCalls: [] } },
    ]);

    await collect(createHandler(provider, { memoryStore }), {
      assistant: assistant({ streamOutput: false, enableMemory: true, useGlobalMemory: true }),
    });

    expect((await memoryStore.list(GLOBAL_MEMORY_ID)).map((m) => m.content)).toEqual(['shared']);
    expect(await memoryStore.list('assistant-1')).toEqual([]);
  });

  it('prefers memories passed by the caller', async () => {
    const memories: AssistantMemory[] = [
      { id: 7, scopeId: 'assistant-1', content: 'from caller', createdAt: 0, updatedAt: 0 },
    ];
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);

    await collect(createHandler(provider, { memoryStore: new InMemoryMemoryStore() }), {
      assistant: assistant({ streamOutput: false, enableMemory: true }),
      memories,
    });

    const system = provider.prompts[0]?.[0];
    expect(system && messageText(system)).toContain('- [id=7] from caller');
  });

  it('leaves memory tools out when memory is disabled', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);
    await collect(createHandler(provider, { memoryStore: new InMemoryMemoryStore() }), {
      assistant: assistant({ streamOutput: false }),
    });

    expect(provider.params[0]?.tools).toEqual([]);
    expect(provider.prompts[0]?.map((m) => m.role)).toEqual(['user']);
  });
});

describe('GenerationHandler: transformers', () => {
  it('sends input transforms to the provider without storing them', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'ok', toolCalls: [] } }]);
    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      inputTransformers: [
        { transform: async (_ctx, messages) => [...messages, userMessage('injected')] },
      ],
    });

    expect(provider.prompts[0]?.map(messageText)).toEqual(['hi', 'injected']);
    expect(chunks[0]?.messages.map(messageText)).toEqual(['hi', 'ok']);
  });

  it('stores output transforms applied while streaming', async () => {
    const upper: OutputTransformer = {
      transform: async (_ctx, messages) =>
        messages.map((m) =>
          m.role === 'assistant'
            ? { ...m, parts: m.parts.map((p) => (p.type === 'text' ? { ...p, text: p.text.toUpperCase() } : p)) }
            : m,
        ),
    };
    const provider = new ScriptedProvider([{ chunks: [textChunk('ab'), textChunk('c')] }]);

    const chunks = await collect(createHandler(provider), { outputTransformers: [upper] });

    expect(chunks.map((c) => messageText(lastMessage(c)))).toEqual(['AB', 'ABC', 'ABC']);
  });

  it('strips think blocks from every snapshot', async () => {
    const provider = new ScriptedProvider([
      { chunks: [textChunk('<think>hmm</think>'), textChunk('Answer')] },
    ]);

    const chunks = await collect(createHandler(provider), {
      outputTransformers: [new ThinkTagTransformer()],
    });

    expect(chunks).toHaveLength(3);
    expect(lastMessage(chunks[0]).parts).toEqual([]);
    expect(messageText(lastMessage(chunks[1]))).toBe('Answer');
    expect(messageText(lastMessage(chunks[2]))).toBe('Answer');
  });

  it('runs the finish hook once per generation round', async () => {
    const { tools } = createTools();
    const onGenerationFinish = vi.fn(async (_ctx: unknown, messages: Message[]) => messages);
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'echo', input: '{"text":"a"}' }]) },
      { result: { text: 'ok', toolCalls: [] } },
    ]);

    const chunks = await collect(createHandler(provider), {
      assistant: assistant({ streamOutput: false }),
      tools,
      outputTransformers: [{ onGenerationFinish }],
    });

    // post-generation, post-execution, second round
    expect(chunks).toHaveLength(3);
    expect(onGenerationFinish).toHaveBeenCalledTimes(2);
  });
});

describe('GenerationHandler: failures', () => {
  it('propagates provider errors', async () => {
    const provider = new ScriptedProvider([{ error: new Error('provider down') }]);

    await expect(
      collect(createHandler(provider), { assistant: assistant({ streamOutput: false }) }),
    ).rejects.toThrow('provider down');
  });

  it('keeps chunks emitted before a stream fails', async () => {
    const provider = new ScriptedProvider([
      { chunks: [textChunk('partial')], error: new Error('stream broke') },
    ]);
    const chunks: GenerationChunk[] = [];
    const generator = createHandler(provider).generateText({
      settings: SETTINGS,
      model: MODEL,
      messages: [userMessage('hi')],
      assistant: assistant(),
    });

    const drain = async () => {
      for await (const chunk of generator) chunks.push(chunk);
    };
    await expect(drain()).rejects.toThrow('stream broke');
    expect(chunks).toHaveLength(1);
    expect(messageText(lastMessage(chunks[0]))).toBe('partial');
  });

  it('fails on the first chunk when the provider is unknown', async () => {
    const provider = new ScriptedProvider([]);
    const generator = createHandler(provider).generateText({
      settings: { providers: [] },
      model: MODEL,
      messages: [userMessage('hi')],
      assistant: assistant(),
    });

    await expect(generator.next()).rejects.toBeInstanceOf(ProviderNotFoundError);
  });
});

// =========================================================================
// Tracing
// =========================================================================

describe('GenerationHandler: tracing', () => {
  function tracing() {
    const exporter = new InMemorySpanExporter();
    const provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    return { exporter, tracer: provider.getTracer('test') };
  }

  it('records generation, step and tool spans', async () => {
    const { exporter, tracer } = tracing();
    const { tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'echo', input: '{"text":"a"}' }]) },
      { result: { text: 'ok', toolCalls: [] } },
    ]);

    await collect(createHandler(provider, { tracer }), {
      assistant: assistant({ streamOutput: false }),
      tools,
    });

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual([
      'toolgate.tool',
      'toolgate.step',
      'toolgate.step',
      'toolgate.generation',
    ]);
    expect(spans[1]?.attributes['toolgate.outcome']).toBe('tools-executed');
    expect(spans[2]?.attributes['toolgate.outcome']).toBe('completed');
    expect(spans[3]?.attributes['toolgate.steps']).toBe(2);
    expect(spans[0]?.parentSpanId).toBe(spans[1]?.spanContext().spanId);
    expect(spans[1]?.parentSpanId).toBe(spans[3]?.spanContext().spanId);
  });

  it('marks spans as failed when the provider throws', async () => {
    const { exporter, tracer } = tracing();
    const provider = new ScriptedProvider([{ error: new Error('provider down') }]);

    await expect(
      collect(createHandler(provider, { tracer }), { assistant: assistant({ streamOutput: false }) }),
    ).rejects.toThrow('provider down');

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual(['toolgate.step', 'toolgate.generation']);
    expect(spans.map((s) => s.status)).toEqual([
      { code: SpanStatusCode.ERROR, message: 'provider down' },
      { code: SpanStatusCode.ERROR, message: 'provider down' },
    ]);
  });
});

describe('GenerationHandler: stopping early', () => {
  function tracing() {
    const exporter = new InMemorySpanExporter();
    const provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    return { exporter, tracer: provider.getTracer('test') };
  }

  async function takeUntil(
    generator: AsyncGenerator<GenerationChunk, void, undefined>,
    count: number,
  ): Promise<GenerationChunk[]> {
    const chunks: GenerationChunk[] = [];
    for await (const chunk of generator) {
      chunks.push(chunk);
      if (chunks.length === count) break;
    }
    return chunks;
  }

  it('closes the provider stream and spans after the first streamed chunk', async () => {
    const { exporter, tracer } = tracing();
    const provider = new ScriptedProvider([
      { chunks: [textChunk('Hel'), textChunk('lo')] },
      { chunks: [textChunk('never')] },
    ]);
    const handler = createHandler(provider, { tracer });

    const chunks = await takeUntil(
      handler.generateText({
        settings: SETTINGS,
        model: MODEL,
        messages: [userMessage('hi')],
        assistant: assistant(),
      }),
      1,
    );

    expect(chunks).toHaveLength(1);
    expect(messageText(lastMessage(chunks[0]))).toBe('Hel');
    expect(provider.prompts).toHaveLength(1);
    expect(provider.closedStreams).toBe(1);

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual(['toolgate.step', 'toolgate.generation']);
    expect(spans[1]?.attributes['toolgate.steps']).toBe(1);
    expect(spans.map((s) => s.status.code)).toEqual([SpanStatusCode.OK, SpanStatusCode.OK]);
  });

  it('runs no tools when stopped after the round that requested them', async () => {
    const { exporter, tracer } = tracing();
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      { result: toolCallResult([{ id: 'c1', name: 'echo', input: '{"text":"a"}' }]) },
      { result: { text: 'never', toolCalls: [] } },
    ]);
    const handler = createHandler(provider, { tracer });

    const chunks = await takeUntil(
      handler.generateText({
        settings: SETTINGS,
        model: MODEL,
        messages: [userMessage('hi')],
        assistant: assistant({ streamOutput: false }),
        tools,
      }),
      1,
    );

    expect(callsOf(lastMessage(chunks[0]))[0]?.executed).toBe(false);
    expect(executions).toEqual([]);
    expect(provider.prompts).toHaveLength(1);
    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual([
      'toolgate.step',
      'toolgate.generation',
    ]);
  });

  it('ends every span when stopped at the pending-approval snapshot', async () => {
    const { exporter, tracer } = tracing();
    const { executions, tools } = createTools();
    const provider = new ScriptedProvider([
      {
        result: toolCallResult([
          { id: 'c1', name: 'danger', input: '{}' },
          { id: 'c2', name: 'echo', input: '{"text":"x"}' },
        ]),
      },
    ]);
    const handler = createHandler(provider, { tracer });

    const chunks = await takeUntil(
      handler.generateText({
        settings: SETTINGS,
        model: MODEL,
        messages: [userMessage('hi')],
        assistant: assistant({ streamOutput: false }),
        tools,
      }),
      2,
    );

    expect(callsOf(lastMessage(chunks[1])).map((c) => c.approval.type)).toEqual([
      'pending',
      'auto',
    ]);
    expect(executions).toEqual([]);
    expect(provider.prompts).toHaveLength(1);
    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual([
      'toolgate.step',
      'toolgate.generation',
    ]);
  });
});

// =========================================================================
// Translation
// =========================================================================

describe('GenerationHandler: translateText', () => {
  async function translations(
    handler: GenerationHandler,
    settings: Settings,
    model: ModelInfo,
    targetLanguage: string,
  ): Promise<string[]> {
    const out: string[] = [];
    for await (const text of handler.translateText(settings, model, 'Hallo Welt', targetLanguage)) {
      out.push(text);
    }
    return out;
  }

  it('streams the accumulated translation of the filled prompt', async () => {
    const provider = new ScriptedProvider([
      { chunks: [textChunk(' '), textChunk('Hello'), textChunk(' world')] },
    ]);
    const settings: Settings = {
      ...SETTINGS,
      translatePrompt: 'Into {target_lang}: {source_text} {unknown}',
    };

    const out = await translations(createHandler(provider), settings, MODEL, 'en');

    expect(out).toEqual([' Hello', ' Hello world']);
    expect(provider.prompts[0]?.map(messageText)).toEqual(['Into en: Hallo Welt {unknown}']);
    expect(provider.params[0]?.temperature).toBe(0.3);
    expect(provider.params[0]?.tools).toEqual([]);
  });

  it('uses the default prompt when none is configured', async () => {
    const provider = new ScriptedProvider([{ chunks: [textChunk('Hello world')] }]);

    await translations(createHandler(provider), SETTINGS, MODEL, 'English');

    const prompt = messageText(provider.prompts[0]?.[0] ?? userMessage(''));
    expect(prompt).toContain('Translate the text below into English.');
    expect(prompt).toContain('<source_text>\nHallo Welt\n</source_text>');
  });

  it('sends translation options to Qwen-MT models', async () => {
    const provider = new ScriptedProvider([{ result: { text: 'Hello world', toolCalls: [] } }]);
    const model: ModelInfo = { ...MODEL, modelId: 'qwen-mt-turbo', customBody: { user: 'u1' } };

    const out = await translations(createHandler(provider), SETTINGS, model, 'en');

    expect(out).toEqual(['Hello world']);
    expect(provider.prompts[0]?.map(messageText)).toEqual(['Hallo Welt']);
    expect(provider.params[0]?.topP).toBe(0.95);
    expect(provider.params[0]?.customBody).toEqual({
      user: 'u1',
      translation_options: { source_lang: 'auto', target_lang: 'English' },
    });
  });

  it('emits nothing for a blank translation', async () => {
    const provider = new ScriptedProvider([{ result: { text: '  ', toolCalls: [] } }]);
    const model: ModelInfo = { ...MODEL, modelId: 'qwen-mt-plus' };

    expect(await translations(createHandler(provider), SETTINGS, model, 'de')).toEqual([]);
  });

  it('fails when the model has no provider', async () => {
    const provider = new ScriptedProvider([]);
    const model: ModelInfo = { ...MODEL, providerId: 'missing' };

    await expect(translations(createHandler(provider), SETTINGS, model, 'en')).rejects.toThrow(
      ProviderNotFoundError,
    );
  });
});

describe('translation helpers', () => {
  it('fills known placeholders only', () => {
    expect(applyPlaceholders('{a} and {b}', { a: 'x' })).toBe('x and {b}');
  });

  it('detects Qwen-MT models by id', () => {
    expect(isQwenMtModel('qwen-mt-turbo')).toBe(true);
    expect(isQwenMtModel('Qwen-MT-Plus')).toBe(true);
    expect(isQwenMtModel('qwen-max')).toBe(false);
  });

  it('names languages in English', () => {
    expect(languageDisplayName('de')).toBe('German');
    expect(languageDisplayName('not a tag!')).toBe('not a tag!');
  });
});

// =========================================================================
// Approval gate
// =========================================================================

describe('approval gate', () => {
  function pendingConversation(): Message[] {
    return [
      userMessage('hi'),
      assistantMessage([
        { type: 'text', text: 'let me check' },
        {
          type: 'tool-call',
          toolCallId: 'c1',
          toolName: 'danger',
          input: '{}',
          approval: { type: 'pending' },
          executed: false,
        },
        {
          type: 'tool-call',
          toolCallId: 'c2',
          toolName: 'echo',
          input: '{}',
          approval: { type: 'auto' },
          executed: true,
          output: [{ type: 'text', text: 'done' }],
        },
      ]),
    ];
  }

  it('only allows forward transitions', () => {
    expect(canTransition('auto', 'pending')).toBe(true);
    expect(canTransition('pending', 'approved')).toBe(true);
    expect(canTransition('pending', 'denied')).toBe(true);
    expect(canTransition('auto', 'approved')).toBe(false);
    expect(canTransition('approved', 'denied')).toBe(false);
    expect(canTransition('denied', 'pending')).toBe(false);
  });

  it('moves only auto calls of gated tools to pending', () => {
    const messages = pendingConversation();
    const [pending] = getPendingApprovals(messages);
    if (!pending) throw new Error('expected a pending call');
    const auto = { ...pending, toolCallId: 'c3', toolName: 'danger', approval: { type: 'auto' as const } };
    const safe = { ...auto, toolCallId: 'c4', toolName: 'echo' };

    const { calls, changed } = requestApprovals([pending, auto, safe], (name) => name === 'danger');

    expect(changed).toBe(true);
    expect(calls.map((c) => c.approval.type)).toEqual(['pending', 'pending', 'auto']);
    expect(calls[0]).toBe(pending);
    expect(calls[2]).toBe(safe);
    expect(requestApprovals([safe], () => false).changed).toBe(false);
  });

  it('records decisions without touching the input list', () => {
    const messages = pendingConversation();
    expect(getResolvedToolCalls(messages)).toEqual([]);

    const approved = resolveApproval(messages, 'c1', { decision: 'approve' });
    expect(getResolvedToolCalls(approved).map((c) => c.toolCallId)).toEqual(['c1']);
    expect(getPendingApprovals(approved)).toEqual([]);
    expect(getPendingApprovals(messages)).toHaveLength(1);

    const denied = resolveApproval(messages, 'c1', { decision: 'deny' });
    expect(getResolvedToolCalls(denied)[0]?.approval).toEqual({ type: 'denied', reason: '' });
  });

  it('rejects decisions it cannot apply', () => {
    const messages = pendingConversation();

    expect(() => resolveApproval(messages, 'nope', { decision: 'approve' })).toThrow(
      'No tool call with id: nope',
    );
    expect(() => resolveApproval(messages, 'c2', { decision: 'approve' })).toThrow(
      'Tool call already executed: c2',
    );

    const approved = resolveApproval(messages, 'c1', { decision: 'approve' });
    expect(() => resolveApproval(approved, 'c1', { decision: 'deny' })).toThrow(ApprovalError);
  });

  it('explains denials to the model', () => {
    expect(deniedOutput('not now')).toEqual([
      { type: 'text', text: JSON.stringify({ error: 'Tool execution denied by user. Reason: not now' }) },
    ]);
    expect(deniedOutput('  ')[0]?.text).toBe(
      JSON.stringify({ error: 'Tool execution denied by user. Reason: No reason provided' }),
    );
  });
});

// =========================================================================
// Provider registry
// =========================================================================

describe('ProviderRegistry', () => {
  it('resolves the setting and implementation for a model', () => {
    const provider = new ScriptedProvider([]);
    const registry = new ProviderRegistry({ scripted: provider });

    const resolved = registry.resolve(MODEL, SETTINGS.providers);
    expect(resolved.provider).toBe(provider);
    expect(resolved.setting).toEqual({ id: 'p1', type: 'scripted' });
  });

  it('reports a missing setting or implementation', () => {
    const registry = new ProviderRegistry();

    expect(() => registry.resolve(MODEL, [])).toThrow('Provider not found: p1');
    expect(() => registry.resolve(MODEL, SETTINGS.providers)).toThrow(
      'Provider not found: p1 (type scripted)',
    );
  });
});

// =========================================================================
// Think tags
// =========================================================================

describe('think tags', () => {
  it('removes complete and unterminated blocks', () => {
    expect(stripThinkTags('a<think>x</think>b')).toBe('ab');
    expect(stripThinkTags('<think>x</think>\n\nAnswer')).toBe('Answer');
    expect(stripThinkTags('<think>still going')).toBe('');
    expect(stripThinkTags('no tags here')).toBe('no tags here');
  });

  it('handles tags split across chunks', () => {
    const stripper = new ThinkStripper();
    const visible = stripper.feed('Hi <thi') + stripper.feed('nk>secret</think>!') + stripper.flush();

    expect(visible).toBe('Hi !');
  });
});
