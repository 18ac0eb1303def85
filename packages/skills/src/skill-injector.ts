/**
 * @toolgate/skills: Skill Injector
 *
 * Formats skills into system prompt sections.
 * Each skill's content is wrapped in a clear section header.
 */

import type { Skill } from './skill-loader.js';

// ---------------------------------------------------------------------------
// Injection
// ---------------------------------------------------------------------------

/**
 * Format a single skill for injection.
 */
export function formatSkill(skill: Skill): string {
  return `<skill name="${skill.name}">\n${skill.content}\n</skill>`;
}

/**
 * Format a list of skills into a system prompt section.
 *
 * Output format:
 * ```
 * ## Active Skills
 *
 * <skill name="code-review">
 * ...content...
 * </skill>
 * ```
 */
export function injectSkills(skills: Skill[]): string {
  if (skills.length === 0) return '';
  return `## Active Skills\n\n${skills.map(formatSkill).join('\n\n')}`;
}

/**
 * Append the skills section to an assistant's own system prompt.
 */
export function mergeSkillPrompts(systemPrompt: string, skills: Skill[]): string {
  const section = injectSkills(skills);
  if (!section) return systemPrompt;
  if (systemPrompt.trim() === '') return section;
  return `${systemPrompt}\n\n${section}`;
}
