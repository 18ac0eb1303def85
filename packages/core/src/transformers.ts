/**
 * @toolgate/core: Message transformers
 *
 * Input transformers rewrite the prompt right before it is sent to the
 * provider. Output transformers rewrite generated messages at three points:
 * while the round is streaming (`transform`, stored), on every emitted
 * snapshot (`visualTransform`), and once when the round finishes
 * (`onGenerationFinish`).
 */

import type { Assistant, ModelInfo } from './assistant.js';
import type { Message } from './messages.js';

export interface TransformerContext {
  model: ModelInfo;
  assistant: Assistant;
  conversationId: string;
}

export interface InputTransformer {
  transform(ctx: TransformerContext, messages: Message[]): Promise<Message[]>;
}

export interface OutputTransformer {
  transform?(ctx: TransformerContext, messages: Message[]): Promise<Message[]>;
  visualTransform?(ctx: TransformerContext, messages: Message[]): Promise<Message[]>;
  onGenerationFinish?(ctx: TransformerContext, messages: Message[]): Promise<Message[]>;
}
