/**
 * @toolgate/core: Errors
 *
 * Tool-level errors are folded into the conversation by the tool kernel as
 * `[<name>] <message>`, so `name` doubles as the classification tag the model
 * sees. Provider errors are not caught and end the generation call.
 */

import type { WorkflowPhase } from './workflow.js';

export class ToolgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolgateError';
  }
}

export class ProviderNotFoundError extends ToolgateError {
  constructor(public readonly providerId: string) {
    super(`Provider not found: ${providerId}`, 'PROVIDER_NOT_FOUND');
    this.name = 'ProviderNotFoundError';
  }
}

export class ToolNotFoundError extends ToolgateError {
  constructor(public readonly toolName: string) {
    super(`Tool ${toolName} not found`, 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}

export class ToolInputError extends ToolgateError {
  constructor(
    public readonly toolName: string,
    cause: unknown,
    kind: 'json' | 'schema' = 'json',
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const what = kind === 'json' ? 'Invalid JSON arguments' : 'Invalid arguments';
    super(`${what} for ${toolName}: ${detail}`, 'TOOL_INPUT', { cause });
    this.name = 'ToolInputError';
  }
}

export class PolicyViolationError extends ToolgateError {
  constructor(
    message: string,
    public readonly phase: WorkflowPhase,
    public readonly toolName: string,
    public readonly operation: string | null,
  ) {
    super(message, 'POLICY_VIOLATION');
    this.name = 'PolicyViolationError';
  }
}

export class ApprovalError extends ToolgateError {
  constructor(
    message: string,
    public readonly toolCallId: string,
  ) {
    super(message, 'APPROVAL');
    this.name = 'ApprovalError';
  }
}
