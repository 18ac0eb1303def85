/**
 * @toolgate/generation: Transformer pipelines
 *
 * Transformers run sequentially in list order; each sees the previous
 * one's output.
 */

import type {
  InputTransformer,
  Message,
  OutputTransformer,
  TransformerContext,
} from '@toolgate/core';

type Stage = 'transform' | 'visualTransform' | 'onGenerationFinish';

async function runOutputStage(
  stage: Stage,
  transformers: OutputTransformer[],
  ctx: TransformerContext,
  messages: Message[],
): Promise<Message[]> {
  let result = messages;
  for (const transformer of transformers) {
    const fn = transformer[stage];
    if (fn) result = await fn.call(transformer, ctx, result);
  }
  return result;
}

export async function applyInputTransforms(
  transformers: InputTransformer[],
  ctx: TransformerContext,
  messages: Message[],
): Promise<Message[]> {
  let result = messages;
  for (const transformer of transformers) {
    result = await transformer.transform(ctx, result);
  }
  return result;
}

/** Stored transforms, applied to the conversation itself */
export function applyOutputTransforms(
  transformers: OutputTransformer[],
  ctx: TransformerContext,
  messages: Message[],
): Promise<Message[]> {
  return runOutputStage('transform', transformers, ctx, messages);
}

/** Display-only transforms, applied to emitted snapshots */
export function applyVisualTransforms(
  transformers: OutputTransformer[],
  ctx: TransformerContext,
  messages: Message[],
): Promise<Message[]> {
  return runOutputStage('visualTransform', transformers, ctx, messages);
}

/** Transforms run once when a generation round completes */
export function applyFinishTransforms(
  transformers: OutputTransformer[],
  ctx: TransformerContext,
  messages: Message[],
): Promise<Message[]> {
  return runOutputStage('onGenerationFinish', transformers, ctx, messages);
}
