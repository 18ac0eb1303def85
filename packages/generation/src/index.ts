/**
 * @toolgate/generation
 *
 * The tool-calling generation loop, its approval gate and the provider
 * registry it resolves providers through.
 */

export type { ApprovalDecision, ApprovalStateType } from './approval-gate.js';
export {
  canTransition,
  deniedOutput,
  getPendingApprovals,
  getResolvedToolCalls,
  lastUnexecutedToolCalls,
  requestApprovals,
  resolveApproval,
  VALID_APPROVAL_TRANSITIONS,
} from './approval-gate.js';
export type { GenerateTextOptions, GenerationHandlerConfig } from './generation-handler.js';
export { GenerationHandler } from './generation-handler.js';
export type { ResolvedProvider } from './provider-registry.js';
export { ProviderRegistry } from './provider-registry.js';
export { stripThinkTags, ThinkStripper, ThinkTagTransformer } from './think-tag.js';
export {
  applyFinishTransforms,
  applyInputTransforms,
  applyOutputTransforms,
  applyVisualTransforms,
} from './transformers.js';
export {
  applyPlaceholders,
  DEFAULT_TRANSLATION_PROMPT,
  isQwenMtModel,
  languageDisplayName,
  qwenTranslationOptions,
} from './translation.js';
