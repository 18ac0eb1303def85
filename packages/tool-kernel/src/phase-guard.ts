/**
 * @toolgate/tool-kernel: Phase guard
 *
 * Decides whether a tool call may run in the current workflow phase.
 * Coarse allow/deny only: plan and review are read-only, execute allows all.
 * Decisions are pure and synchronous.
 *
 * The built-in lists can be overridden by a YAML file:
 *
 * ```yaml
 * sandboxTools: [sandbox_file, sandbox_shell]
 * safeTools: [search_web]
 * readOnlyOperations: [read, list, git_status]
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import type { PhasePolicy, WorkflowPhase } from '@toolgate/core';
import { assertNever, isJsonObject, ToolgateError } from '@toolgate/core';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Default policy (when no policy file exists)
// ---------------------------------------------------------------------------

export const DEFAULT_PHASE_POLICY: PhasePolicy = {
  sandboxTools: [
    'sandbox_file',
    'sandbox_python',
    'sandbox_shell',
    'sandbox_data',
    'sandbox_dev',
  ],
  safeTools: ['eval_javascript', 'search_web'],
  readOnlyOperations: [
    'read',
    'list',
    'stat',
    'exists',
    'git_status',
    'git_log',
    'git_branch',
    'git_diff',
  ],
};

const phasePolicyFileSchema = z
  .object({
    sandboxTools: z.array(z.string()),
    safeTools: z.array(z.string()),
    readOnlyOperations: z.array(z.string()),
  })
  .partial();

// ---------------------------------------------------------------------------
// Operation extraction
// ---------------------------------------------------------------------------

/**
 * Read the `operation` field from a tool call's JSON arguments.
 * Returns null when the input is not a JSON object or the field is missing,
 * null, or not a primitive.
 */
export function extractOperation(input: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch {
    return null;
  }
  if (!isJsonObject(parsed)) return null;

  const operation = parsed.operation;
  if (
    typeof operation === 'string' ||
    typeof operation === 'number' ||
    typeof operation === 'boolean'
  ) {
    return String(operation);
  }
  return null;
}

// ---------------------------------------------------------------------------
// Phase Guard
// ---------------------------------------------------------------------------

export class PhaseGuard {
  private readonly policy: PhasePolicy;
  private readonly sandboxTools: ReadonlySet<string>;
  private readonly safeTools: ReadonlySet<string>;
  private readonly readOnlyOperations: ReadonlySet<string>;

  constructor(policy: Partial<PhasePolicy> = {}) {
    this.policy = { ...DEFAULT_PHASE_POLICY, ...policy };
    this.sandboxTools = new Set(this.policy.sandboxTools);
    this.safeTools = new Set(this.policy.safeTools);
    this.readOnlyOperations = new Set(this.policy.readOnlyOperations);
  }

  /**
   * Build a guard from a YAML policy file. A missing path or file yields the
   * built-in policy; a malformed file is an error.
   */
  static fromFile(policyPath?: string): PhaseGuard {
    if (!policyPath || !existsSync(policyPath)) return new PhaseGuard();

    const raw = readFileSync(policyPath, 'utf-8');
    const result = phasePolicyFileSchema.safeParse(parseYaml(raw) ?? {});
    if (!result.success) {
      throw new ToolgateError(
        `Invalid phase policy file ${policyPath}: ${result.error.message}`,
        'CONFIG',
        { cause: result.error },
      );
    }
    return new PhaseGuard(result.data);
  }

  /**
   * Whether `toolName` (and `operation`, for sandbox tools) may run in `phase`.
   */
  isAllowed(
    phase: WorkflowPhase,
    toolName: string,
    operation: string | null = null,
  ): boolean {
    switch (phase) {
      case 'execute':
        return true;
      case 'plan':
      case 'review':
        if (!this.sandboxTools.has(toolName)) {
          return this.safeTools.has(toolName);
        }
        // No operation information: fail closed
        if (operation === null) return false;
        return this.readOnlyOperations.has(operation);
      default:
        return assertNever(phase);
    }
  }

  /**
   * Explanation surfaced to the model when a call is blocked.
   */
  getBlockedReason(
    phase: WorkflowPhase,
    toolName: string,
    operation: string | null = null,
  ): string {
    const attempted = operation ?? toolName;
    switch (phase) {
      case 'plan':
        return [
          'Operation blocked: the conversation is in the PLAN phase.',
          '',
          `The operation '${attempted}' is not allowed in this phase.`,
          '',
          'The PLAN phase only permits read-only operations:',
          '- reading file contents (read)',
          '- listing directories (list)',
          '- inspecting git status and history (git_status, git_log)',
          '- analysing existing code and data',
          '',
          'Tell the user: "Switching to the EXECUTE phase is required to write files or run code."',
          'Finish the analysis and the plan in the current phase first.',
        ].join('\n');
      case 'review':
        return [
          'Operation blocked: the conversation is in the REVIEW phase.',
          '',
          `The operation '${attempted}' is not allowed in this phase.`,
          '',
          'The REVIEW phase only permits read-only operations:',
          '- reading source files (read)',
          '- comparing changes (git_diff)',
          '- checking code quality and security',
          '',
          'Tell the user: "Issues that need changes were found; switch to the EXECUTE phase to fix them."',
          'Only review in this phase, do not modify anything.',
        ].join('\n');
      case 'execute':
        return 'Internal error: operations are never blocked in the EXECUTE phase.';
      default:
        return assertNever(phase);
    }
  }

  /**
   * Get the resolved policy (for debugging).
   */
  getPolicy(): PhasePolicy {
    return this.policy;
  }
}

// ---------------------------------------------------------------------------
// Default-policy shorthands
// ---------------------------------------------------------------------------

export const defaultPhaseGuard = new PhaseGuard();

export function isAllowed(
  phase: WorkflowPhase,
  toolName: string,
  operation: string | null = null,
): boolean {
  return defaultPhaseGuard.isAllowed(phase, toolName, operation);
}

export function getBlockedReason(
  phase: WorkflowPhase,
  toolName: string,
  operation: string | null = null,
): string {
  return defaultPhaseGuard.getBlockedReason(phase, toolName, operation);
}
