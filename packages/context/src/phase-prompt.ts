/**
 * @toolgate/context: Workflow phase prompt blocks
 *
 * Instructional text telling the model what the active phase permits. The
 * phase guard enforces the same boundary at execution time.
 */

import type { WorkflowPhase } from '@toolgate/core';
import { assertNever } from '@toolgate/core';

export function buildWorkflowPhasePrompt(phase: WorkflowPhase): string {
  switch (phase) {
    case 'plan':
      return [
        '[Current workflow phase: PLAN]',
        'Only read-only operations are available for analysis and planning:',
        '- allowed: reading files, listing directories, checking file status',
        '- allowed: git status and git log',
        '- allowed: reading data to understand the requirements',
        '- not allowed: writing, modifying or deleting files or directories',
        '- not allowed: running Python or shell code',
        '- not allowed: installing packages',
        '- not allowed: git add, commit, push or other write operations',
        '',
        'If a forbidden operation is needed, tell the user: "Switching to the EXECUTE phase is required for this operation."',
        'Produce a complete plan listing the files to change and the steps to take.',
      ].join('\n');
    case 'execute':
      return [
        '[Current workflow phase: EXECUTE]',
        'All operations are available to complete the task:',
        '- writing, modifying and deleting files',
        '- running Python code and shell commands',
        '- installing packages',
        '- git add, commit and push',
        '- creating directories, copying and moving files',
        '',
        'All file operations are confined to the conversation sandbox.',
      ].join('\n');
    case 'review':
      return [
        '[Current workflow phase: REVIEW]',
        'Only read-only operations are available for reviewing the work:',
        '- allowed: reading files and comparing changes',
        '- allowed: checking style, security and performance issues',
        '- allowed: listing directories to inspect the project layout',
        '- allowed: git log and git diff',
        '- not allowed: modifying any file or code',
        '- not allowed: running any code or script',
        '',
        'If something needs fixing, tell the user: "Issues were found that need the EXECUTE phase to fix."',
        'List every finding grouped by severity with a concrete fix.',
      ].join('\n');
    default:
      return assertNever(phase);
  }
}
