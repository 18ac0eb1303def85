/**
 * @toolgate/context
 */

export type { AssembleOptions, ContextAssemblerConfig } from './context-assembler.js';
export {
  buildMemoryPrompt,
  buildRecentChatsPrompt,
  ContextAssembler,
} from './context-assembler.js';
export { limitContext, truncate } from './message-history.js';
export { buildWorkflowPhasePrompt } from './phase-prompt.js';
export type { WorkspaceContextOptions } from './workspace-context.js';
export {
  CONTEXT_FILE_NAME,
  CONTEXT_HEADER,
  injectAfterSystemPrompt,
  WorkspaceContextTransformer,
} from './workspace-context.js';
