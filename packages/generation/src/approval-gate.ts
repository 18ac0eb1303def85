/**
 * @toolgate/generation: Approval Gate
 *
 * Approval state machine for tool calls. State lives in the conversation
 * itself: a call waiting for a human is an unexecuted part in `pending`,
 * and the generation loop resumes when it is re-invoked with the call
 * approved or denied.
 *
 *   auto ──► pending ──► approved
 *                   └──► denied(reason)
 */

import type {
  ApprovalState,
  Message,
  TextPart,
  ToolCallPart,
  UnexecutedToolCall,
} from '@toolgate/core';
import {
  ApprovalError,
  errorOutput,
  getUnexecutedToolCalls,
  isToolCall,
  replaceToolCalls,
} from '@toolgate/core';

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export type ApprovalStateType = ApprovalState['type'];

/** Valid state transitions */
export const VALID_APPROVAL_TRANSITIONS: Record<ApprovalStateType, ApprovalStateType[]> = {
  auto: ['pending'],
  pending: ['approved', 'denied'],
  approved: [],
  denied: [],
};

export function canTransition(from: ApprovalStateType, to: ApprovalStateType): boolean {
  return VALID_APPROVAL_TRANSITIONS[from].includes(to);
}

// ---------------------------------------------------------------------------
// Queries on the last message
// ---------------------------------------------------------------------------

/** Unexecuted tool calls of the last message, in part order. */
export function lastUnexecutedToolCalls(messages: Message[]): UnexecutedToolCall[] {
  const last = messages.at(-1);
  return last ? getUnexecutedToolCalls(last) : [];
}

/**
 * Unexecuted calls a human has already decided on. A non-empty result means
 * the loop resumes by executing them instead of generating.
 */
export function getResolvedToolCalls(messages: Message[]): UnexecutedToolCall[] {
  return lastUnexecutedToolCalls(messages).filter(
    (call) => call.approval.type === 'approved' || call.approval.type === 'denied',
  );
}

/** Calls waiting for a human decision. */
export function getPendingApprovals(messages: Message[]): UnexecutedToolCall[] {
  return lastUnexecutedToolCalls(messages).filter((call) => call.approval.type === 'pending');
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

/**
 * Move `auto` calls of tools that need approval to `pending`. Other states
 * are left as they are. `changed` reports whether any call moved.
 */
export function requestApprovals(
  calls: UnexecutedToolCall[],
  needsApproval: (toolName: string) => boolean,
): { calls: UnexecutedToolCall[]; changed: boolean } {
  let changed = false;
  const gated = calls.map((call): UnexecutedToolCall => {
    if (call.approval.type !== 'auto' || !needsApproval(call.toolName)) return call;
    changed = true;
    return { ...call, approval: { type: 'pending' } };
  });
  return { calls: gated, changed };
}

export type ApprovalDecision =
  | { decision: 'approve' }
  | { decision: 'deny'; reason?: string };

/**
 * Record a human decision for a pending call in the last message.
 * Returns a new message list; the input is not modified.
 */
export function resolveApproval(
  messages: Message[],
  toolCallId: string,
  decision: ApprovalDecision,
): Message[] {
  const call = messages
    .at(-1)
    ?.parts.filter(isToolCall)
    .find((part: ToolCallPart) => part.toolCallId === toolCallId);

  if (!call) {
    throw new ApprovalError(`No tool call with id: ${toolCallId}`, toolCallId);
  }
  if (call.executed) {
    throw new ApprovalError(`Tool call already executed: ${toolCallId}`, toolCallId);
  }

  const target: ApprovalState =
    decision.decision === 'approve'
      ? { type: 'approved' }
      : { type: 'denied', reason: decision.reason ?? '' };

  if (!canTransition(call.approval.type, target.type)) {
    throw new ApprovalError(
      `Invalid approval transition: ${call.approval.type} → ${target.type} (call ${toolCallId})`,
      toolCallId,
    );
  }

  return replaceToolCalls(messages, [{ ...call, approval: target }]);
}

/** Output recorded for a call the user denied. */
export function deniedOutput(reason: string): TextPart[] {
  const shown = reason.trim() === '' ? 'No reason provided' : reason;
  return errorOutput(`Tool execution denied by user. Reason: ${shown}`);
}
