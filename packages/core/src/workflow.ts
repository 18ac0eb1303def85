/**
 * @toolgate/core: Workflow phases
 *
 * plan and review are read-only analysis phases; execute is the only phase
 * allowed to mutate state or run arbitrary code. A null phase disables
 * gating entirely.
 */

export type WorkflowPhase = 'plan' | 'execute' | 'review';

// ---------------------------------------------------------------------------
// Phase policy (optionally loaded from a YAML file)
// ---------------------------------------------------------------------------

export interface PhasePolicy {
  /** Tools whose operations act on the sandbox and are checked per operation */
  sandboxTools: string[];
  /** Non-sandbox tools that stay available in read-only phases */
  safeTools: string[];
  /** Sandbox operations allowed in read-only phases */
  readOnlyOperations: string[];
}
