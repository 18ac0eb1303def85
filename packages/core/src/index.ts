/**
 * @toolgate/core
 *
 * Shared types, contracts and utilities for toolgate.
 * This package has no runtime dependencies on any other toolgate package.
 */

// Messages: conversation model and copy-on-write operations
export type {
  MessageRole,
  TextPart,
  ApprovalState,
  UnexecutedToolCall,
  ExecutedToolCall,
  ToolCallPart,
  MessagePart,
  TokenUsage,
  Message,
} from './messages.js';
export {
  createMessage,
  userMessage,
  systemMessage,
  assistantMessage,
  isToolCall,
  getToolCalls,
  getUnexecutedToolCalls,
  messageText,
  mergeUsage,
  errorOutput,
  updateLastMessage,
  replaceToolCalls,
  applyProviderChunk,
  applyGenerateResult,
  resolveToolCallId,
} from './messages.js';

// Generation output
export type { GenerationChunk } from './generation.js';
export { messagesChunk } from './generation.js';

// Provider: the interface the orchestrator depends on
export type {
  ProviderSetting,
  Settings,
  ProviderChunk,
  GeneratedToolCall,
  GenerateResult,
  GenerationParams,
  Provider,
} from './provider.js';

// Tools
export type { ToolDefinition, ToolContext, ToolPromptContext } from './tools.js';
export { defineTool } from './tools.js';

// Workflow phases
export type { WorkflowPhase, PhasePolicy } from './workflow.js';

// Assistant and model configuration
export type { Assistant, AssistantInput, ModelInfo } from './assistant.js';
export { assistantSchema, jsonValueSchema, parseAssistant } from './assistant.js';

// Memory and conversation collaborators
export type {
  AssistantMemory,
  MemoryStore,
  ConversationSummary,
  RecentConversations,
} from './memory.js';
export { GLOBAL_MEMORY_ID } from './memory.js';

// Transformers
export type {
  TransformerContext,
  InputTransformer,
  OutputTransformer,
} from './transformers.js';

// Errors
export {
  ToolgateError,
  ProviderNotFoundError,
  ToolNotFoundError,
  ToolInputError,
  PolicyViolationError,
  ApprovalError,
} from './errors.js';

// JSON
export type { JsonValue, JsonObject } from './json.js';
export { isJsonObject } from './json.js';

// Configuration and logging
export type { LogLevel } from './env.js';
export { env, LOG_LEVELS } from './env.js';
export type { Logger, LoggerConfig } from './logger.js';
export { createLogger, logger } from './logger.js';

// Utilities
export { generateId, now, assertNever } from './utils.js';
