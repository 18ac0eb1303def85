/**
 * @toolgate/generation: Generation Handler
 *
 * The multi-step tool-calling loop. Each step runs one generation round (or
 * resumes with human-resolved tool calls), gates new calls for approval,
 * executes the executable ones sequentially, and folds their outputs back
 * into the last assistant message. The loop ends when the model requests no
 * tools, a call is waiting for approval, nothing was executed, or the step
 * budget runs out.
 *
 * Every observable milestone is emitted as a full conversation snapshot.
 * Provider failures end the call; tool failures become error outputs.
 */

import type { Tracer } from '@opentelemetry/api';
import { ContextAssembler } from '@toolgate/context';
import type {
  Assistant,
  AssistantMemory,
  ExecutedToolCall,
  GenerationChunk,
  GenerationParams,
  InputTransformer,
  Logger,
  MemoryStore,
  Message,
  ModelInfo,
  OutputTransformer,
  Provider,
  ProviderSetting,
  RecentConversations,
  Settings,
  TextPart,
  ToolDefinition,
  TransformerContext,
  UnexecutedToolCall,
  WorkflowPhase,
} from '@toolgate/core';
import {
  applyGenerateResult,
  applyProviderChunk,
  assertNever,
  env,
  GLOBAL_MEMORY_ID,
  logger as rootLogger,
  messagesChunk,
  messageText,
  now,
  replaceToolCalls,
  updateLastMessage,
  userMessage,
} from '@toolgate/core';
import { GenerationTracer } from '@toolgate/observability';
import type { SkillRegistry } from '@toolgate/skills';
import { buildMemoryTools, PhaseGuard, ToolKernel } from '@toolgate/tool-kernel';
import {
  deniedOutput,
  getPendingApprovals,
  getResolvedToolCalls,
  lastUnexecutedToolCalls,
  requestApprovals,
} from './approval-gate.js';
import type { ProviderRegistry } from './provider-registry.js';
import {
  applyFinishTransforms,
  applyInputTransforms,
  applyOutputTransforms,
  applyVisualTransforms,
} from './transformers.js';
import {
  applyPlaceholders,
  DEFAULT_TRANSLATION_PROMPT,
  isQwenMtModel,
  qwenTranslationOptions,
} from './translation.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerationHandlerConfig {
  providers: ProviderRegistry;
  /** Backs the memory tools and the memory prompt */
  memoryStore?: MemoryStore;
  recentConversations?: RecentConversations;
  skillRegistry?: SkillRegistry;
  /** Defaults to an assembler over the skills and recent conversations above */
  contextAssembler?: ContextAssembler;
  /** Defaults to the policy file named by TOOLGATE_PHASE_POLICY */
  phaseGuard?: PhaseGuard;
  logger?: Logger;
  tracer?: Tracer;
}

export interface GenerateTextOptions {
  settings: Settings;
  model: ModelInfo;
  messages: Message[];
  assistant: Assistant;
  /** Memories shown in the prompt; read from the memory store when omitted */
  memories?: AssistantMemory[];
  tools?: ToolDefinition[];
  inputTransformers?: InputTransformer[];
  outputTransformers?: OutputTransformer[];
  /** Drop history before this index; -1 keeps everything */
  truncateIndex?: number;
  maxSteps?: number;
  /** null disables phase gating */
  workflowPhase?: WorkflowPhase | null;
  /** Lets tools and transformers scope side effects per conversation */
  conversationId?: string;
  signal?: AbortSignal;
}

type StepOutcome = 'completed' | 'awaiting-approval' | 'tools-executed';

interface StepResult {
  messages: Message[];
  outcome: StepOutcome;
}

/** Per-call state shared by the steps of one generateText invocation */
interface GenerationRun {
  assistant: Assistant;
  model: ModelInfo;
  setting: ProviderSetting;
  provider: Provider;
  tools: ToolDefinition[];
  memories?: AssistantMemory[];
  inputTransformers: InputTransformer[];
  outputTransformers: OutputTransformer[];
  truncateIndex: number;
  phase: WorkflowPhase | null;
  conversationId: string;
  signal?: AbortSignal;
  ctx: TransformerContext;
  tracer: GenerationTracer;
  log: Logger;
}

// ---------------------------------------------------------------------------
// Generation Handler
// ---------------------------------------------------------------------------

export class GenerationHandler {
  private readonly providers: ProviderRegistry;
  private readonly memoryStore?: MemoryStore;
  private readonly assembler: ContextAssembler;
  private readonly phaseGuard: PhaseGuard;
  private readonly tracer?: Tracer;
  private readonly log: Logger;

  constructor(config: GenerationHandlerConfig) {
    this.providers = config.providers;
    this.memoryStore = config.memoryStore;
    this.assembler =
      config.contextAssembler ??
      new ContextAssembler({
        skillRegistry: config.skillRegistry,
        recentConversations: config.recentConversations,
      });
    this.phaseGuard = config.phaseGuard ?? PhaseGuard.fromFile(env.TOOLGATE_PHASE_POLICY);
    this.tracer = config.tracer;
    this.log = (config.logger ?? rootLogger).child({ component: 'generation' });
  }

  /**
   * Run the tool-calling loop over `messages`. Lazy: nothing happens until
   * the first chunk is requested, and stopping iteration cancels the rest.
   * The last chunk is the conversation state to persist.
   */
  async *generateText(
    opts: GenerateTextOptions,
  ): AsyncGenerator<GenerationChunk, void, undefined> {
    const conversationId = opts.conversationId ?? '';
    const maxSteps = opts.maxSteps ?? env.TOOLGATE_MAX_STEPS;
    const tracer = new GenerationTracer(this.tracer);
    const log = this.log.child({ conversationId, model: opts.model.modelId });

    let steps = 0;
    let failure: unknown;
    tracer.startGeneration({ conversationId, modelId: opts.model.modelId, maxSteps });

    try {
      const { setting, provider } = this.providers.resolve(
        opts.model,
        opts.settings.providers,
      );
      const run: GenerationRun = {
        assistant: opts.assistant,
        model: opts.model,
        setting,
        provider,
        tools: opts.tools ?? [],
        memories: opts.memories,
        inputTransformers: opts.inputTransformers ?? [],
        outputTransformers: opts.outputTransformers ?? [],
        truncateIndex: opts.truncateIndex ?? -1,
        phase: opts.workflowPhase ?? null,
        conversationId,
        signal: opts.signal,
        ctx: { model: opts.model, assistant: opts.assistant, conversationId },
        tracer,
        log,
      };

      log.debug({ provider: setting.id, maxSteps }, 'Generation started');
      let messages = opts.messages;
      for (let step = 0; step < maxSteps; step++) {
        steps = step + 1;
        tracer.startStep(step);

        const result: StepResult = yield* this.runStep(run, messages, step);
        messages = result.messages;
        tracer.endStep(step, { attributes: { 'toolgate.outcome': result.outcome } });

        if (result.outcome !== 'tools-executed') return;
      }

      log.info({ maxSteps }, 'Step budget exhausted');
    } catch (err) {
      failure = err;
      log.error({ err, step: steps - 1 }, 'Generation failed');
      throw err;
    } finally {
      tracer.endAll(
        failure === undefined
          ? { attributes: { 'toolgate.steps': steps } }
          : { error: failure, attributes: { 'toolgate.steps': steps } },
      );
    }
  }

  /**
   * Translate `sourceText` into `targetLanguage` (a language tag or name),
   * emitting the translation accumulated so far. Qwen-MT models get a single
   * request carrying translation options instead of a prompt.
   */
  async *translateText(
    settings: Settings,
    model: ModelInfo,
    sourceText: string,
    targetLanguage: string,
    signal?: AbortSignal,
  ): AsyncGenerator<string, void, undefined> {
    const { setting, provider } = this.providers.resolve(model, settings.providers);
    const log = this.log.child({ model: model.modelId, targetLanguage });
    const base = {
      model,
      temperature: 0.3,
      tools: [],
      customHeaders: { ...model.customHeaders },
      signal,
    };

    if (isQwenMtModel(model.modelId)) {
      log.debug('Translating with model translation options');
      const result = await provider.generate(setting, [userMessage(sourceText)], {
        ...base,
        topP: 0.95,
        customBody: { ...model.customBody, ...qwenTranslationOptions(targetLanguage) },
      });
      if (result.text.trim() !== '') yield result.text;
      return;
    }

    const prompt = applyPlaceholders(settings.translatePrompt ?? DEFAULT_TRANSLATION_PROMPT, {
      source_text: sourceText,
      target_lang: targetLanguage,
    });
    let messages: Message[] = [userMessage(prompt)];
    log.debug('Translating with prompt');

    for await (const chunk of provider.streamGenerate(setting, messages, {
      ...base,
      customBody: { ...model.customBody },
    })) {
      messages = applyProviderChunk(messages, chunk);
      const last = messages.at(-1);
      const translated = last?.role === 'assistant' ? messageText(last) : '';
      if (translated.trim() !== '') yield translated;
    }
  }

  // -------------------------------------------------------------------------
  // Step
  // -------------------------------------------------------------------------

  private async *runStep(
    run: GenerationRun,
    input: Message[],
    step: number,
  ): AsyncGenerator<GenerationChunk, StepResult, undefined> {
    const log = run.log.child({ step });
    const kernel = new ToolKernel(this.buildTools(run), {
      phaseGuard: this.phaseGuard,
      logger: log,
    });
    let messages = input;
    let calls: UnexecutedToolCall[];
    log.debug('Step started');

    if (getResolvedToolCalls(messages).length > 0) {
      // Resuming after a human decision: act on the existing calls
      calls = lastUnexecutedToolCalls(messages);
      log.info({ calls: calls.length }, 'Resuming with resolved tool calls');
    } else {
      if (getPendingApprovals(messages).length > 0) {
        log.info('Tool calls still awaiting approval');
        return { messages, outcome: 'awaiting-approval' };
      }

      messages = yield* this.generateRound(run, messages, kernel.getTools());

      const unexecuted = lastUnexecutedToolCalls(messages);
      if (unexecuted.length === 0) return { messages, outcome: 'completed' };

      const gated = requestApprovals(unexecuted, (name) => kernel.needsApproval(name));
      if (gated.changed) {
        messages = replaceToolCalls(messages, gated.calls);
        yield messagesChunk(messages);
      }

      const pending = gated.calls.filter((call) => call.approval.type === 'pending');
      if (pending.length > 0) {
        log.info(
          { toolCallIds: pending.map((call) => call.toolCallId) },
          'Waiting for tool approval',
        );
        return { messages, outcome: 'awaiting-approval' };
      }
      calls = gated.calls;
    }

    const executed = await this.executeCalls(run, kernel, calls, log);
    if (executed.length === 0) return { messages, outcome: 'completed' };

    messages = replaceToolCalls(messages, executed);
    yield messagesChunk(
      await applyOutputTransforms(run.outputTransformers, run.ctx, messages),
    );
    return { messages, outcome: 'tools-executed' };
  }

  // -------------------------------------------------------------------------
  // Generation round
  // -------------------------------------------------------------------------

  private async *generateRound(
    run: GenerationRun,
    input: Message[],
    tools: ToolDefinition[],
  ): AsyncGenerator<GenerationChunk, Message[], undefined> {
    const { assistant, model, ctx, outputTransformers } = run;

    const assembled = await this.assembler.assemble({
      assistant,
      model,
      messages: input,
      memories: await this.loadMemories(run),
      tools,
      workflowPhase: run.phase,
      conversationId: run.conversationId,
      truncateIndex: run.truncateIndex,
    });
    const prompt = await applyInputTransforms(run.inputTransformers, ctx, assembled);

    const params: GenerationParams = {
      model,
      temperature: assistant.temperature,
      topP: assistant.topP,
      maxTokens: assistant.maxTokens,
      thinkingBudget: assistant.thinkingBudget,
      tools,
      customHeaders: { ...assistant.customHeaders, ...model.customHeaders },
      customBody: { ...assistant.customBody, ...model.customBody },
      signal: run.signal,
    };

    let messages = input;
    if (assistant.streamOutput) {
      for await (const chunk of run.provider.streamGenerate(run.setting, prompt, params)) {
        messages = await applyOutputTransforms(
          outputTransformers,
          ctx,
          applyProviderChunk(messages, chunk),
        );
        yield messagesChunk(await applyVisualTransforms(outputTransformers, ctx, messages));
      }
    } else {
      const result = await run.provider.generate(run.setting, prompt, params);
      messages = await applyOutputTransforms(
        outputTransformers,
        ctx,
        applyGenerateResult(messages, result),
      );
    }

    messages = await applyVisualTransforms(outputTransformers, ctx, messages);
    messages = await applyFinishTransforms(outputTransformers, ctx, messages);
    messages = updateLastMessage(messages, (message) =>
      message.role === 'assistant' ? { ...message, finishedAt: now() } : message,
    );
    yield messagesChunk(messages);
    return messages;
  }

  // -------------------------------------------------------------------------
  // Tool execution
  // -------------------------------------------------------------------------

  /**
   * Execute calls sequentially in part order. Pending calls are skipped;
   * denied calls get a synthesized output without running.
   */
  private async executeCalls(
    run: GenerationRun,
    kernel: ToolKernel,
    calls: UnexecutedToolCall[],
    log: Logger,
  ): Promise<ExecutedToolCall[]> {
    const executed: ExecutedToolCall[] = [];

    for (const call of calls) {
      switch (call.approval.type) {
        case 'pending':
          break;
        case 'denied':
          log.info({ tool: call.toolName, toolCallId: call.toolCallId }, 'Tool call denied');
          executed.push(withOutput(call, deniedOutput(call.approval.reason)));
          break;
        case 'auto':
        case 'approved': {
          run.tracer.startTool(call);
          const output = await kernel.execute(call, {
            conversationId: run.conversationId,
            toolCallId: call.toolCallId,
            phase: run.phase,
            signal: run.signal,
          });
          run.tracer.endTool(call.toolCallId, {
            attributes: { 'toolgate.approval': call.approval.type },
          });
          executed.push(withOutput(call, output));
          break;
        }
        default:
          assertNever(call.approval);
      }
    }

    return executed;
  }

  /**
   * Memory tools first, then caller tools; the kernel keeps the first tool
   * registered under a name.
   */
  private buildTools(run: GenerationRun): ToolDefinition[] {
    const memoryTools =
      run.assistant.enableMemory && this.memoryStore
        ? buildMemoryTools(this.memoryStore, memoryScope(run.assistant))
        : [];
    return [...memoryTools, ...run.tools];
  }

  private async loadMemories(run: GenerationRun): Promise<AssistantMemory[]> {
    if (!run.assistant.enableMemory) return [];
    if (run.memories) return run.memories;
    return this.memoryStore ? this.memoryStore.list(memoryScope(run.assistant)) : [];
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function memoryScope(assistant: Assistant): string {
  return assistant.useGlobalMemory ? GLOBAL_MEMORY_ID : assistant.id;
}

function withOutput(call: UnexecutedToolCall, output: TextPart[]): ExecutedToolCall {
  return { ...call, executed: true, output };
}
