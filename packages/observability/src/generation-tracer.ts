/**
 * @toolgate/observability: Generation Tracer
 *
 * OTel span bookkeeping for one generation call. Spans nest as
 * toolgate.generation > toolgate.step > toolgate.tool.
 */

import {
  context,
  type Span,
  SpanKind,
  SpanStatusCode,
  trace,
  type Tracer,
} from '@opentelemetry/api';

export type SpanAttributes = Record<string, string | number | boolean>;

export interface EndSpanOptions {
  error?: unknown;
  attributes?: SpanAttributes;
}

const GENERATION_KEY = 'generation';
const stepKey = (step: number) => `step:${step}`;
const toolKey = (toolCallId: string) => `tool:${toolCallId}`;

// ---------------------------------------------------------------------------
// Generation Tracer
// ---------------------------------------------------------------------------

export class GenerationTracer {
  private tracer: Tracer;
  private activeSpans = new Map<string, Span>();
  private currentStep: number | null = null;

  constructor(tracer?: Tracer) {
    this.tracer = tracer ?? trace.getTracer('toolgate');
  }

  startGeneration(attributes: {
    conversationId: string;
    modelId: string;
    maxSteps: number;
  }): void {
    this.startSpan(GENERATION_KEY, 'toolgate.generation', undefined, {
      'toolgate.conversation_id': attributes.conversationId,
      'toolgate.model_id': attributes.modelId,
      'toolgate.max_steps': attributes.maxSteps,
    });
  }

  startStep(step: number): void {
    this.currentStep = step;
    this.startSpan(stepKey(step), 'toolgate.step', this.activeSpans.get(GENERATION_KEY), {
      'toolgate.step': step,
    });
  }

  startTool(call: { toolCallId: string; toolName: string }): void {
    const parent =
      this.currentStep === null ? undefined : this.activeSpans.get(stepKey(this.currentStep));
    this.startSpan(toolKey(call.toolCallId), 'toolgate.tool', parent, {
      'toolgate.tool_name': call.toolName,
      'toolgate.tool_call_id': call.toolCallId,
    });
  }

  endGeneration(opts?: EndSpanOptions): void {
    this.endSpan(GENERATION_KEY, opts);
  }

  endStep(step: number, opts?: EndSpanOptions): void {
    this.endSpan(stepKey(step), opts);
    if (this.currentStep === step) this.currentStep = null;
  }

  endTool(toolCallId: string, opts?: EndSpanOptions): void {
    this.endSpan(toolKey(toolCallId), opts);
  }

  /**
   * End every span still open, innermost first.
   */
  endAll(opts?: EndSpanOptions): void {
    for (const key of Array.from(this.activeSpans.keys()).reverse()) {
      this.endSpan(key, opts);
    }
    this.currentStep = null;
  }

  /**
   * Get the count of active spans (for testing).
   */
  get activeSpanCount(): number {
    return this.activeSpans.size;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private startSpan(
    key: string,
    name: string,
    parent: Span | undefined,
    attributes: SpanAttributes,
  ): void {
    const ctx = parent ? trace.setSpan(context.active(), parent) : context.active();
    const span = this.tracer.startSpan(name, { kind: SpanKind.INTERNAL, attributes }, ctx);
    this.activeSpans.set(key, span);
  }

  private endSpan(key: string, opts: EndSpanOptions = {}): void {
    const span = this.activeSpans.get(key);
    if (!span) return;

    if (opts.attributes) {
      span.setAttributes(opts.attributes);
    }

    if (opts.error !== undefined) {
      const error = opts.error instanceof Error ? opts.error : new Error(String(opts.error));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }

    span.end();
    this.activeSpans.delete(key);
  }
}
