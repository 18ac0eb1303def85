/**
 * @toolgate/skills: Skill Registry
 *
 * Indexes loaded skills by name and resolves the skills linked to an
 * assistant.
 */

import type { Skill, SkillLoadOptions } from './skill-loader.js';
import { loadSkills } from './skill-loader.js';

// ---------------------------------------------------------------------------
// Skill Registry
// ---------------------------------------------------------------------------

export class SkillRegistry {
  private skills: Map<string, Skill> = new Map();

  constructor(opts?: SkillLoadOptions) {
    if (opts) {
      this.loadFromPaths(opts);
    }
  }

  /**
   * Load skills from filesystem paths.
   */
  loadFromPaths(opts: SkillLoadOptions): void {
    for (const skill of loadSkills(opts)) {
      this.skills.set(skill.name, skill);
    }
  }

  /**
   * Register a skill manually (e.g., from inline definition).
   */
  register(skill: Skill): void {
    this.skills.set(skill.name, skill);
  }

  getAll(): Skill[] {
    return Array.from(this.skills.values());
  }

  get(name: string): Skill | undefined {
    return this.skills.get(name);
  }

  get size(): number {
    return this.skills.size;
  }

  /**
   * Enabled skills among `skillIds`, in the order given. Unknown ids are
   * skipped.
   */
  forAssistant(skillIds: readonly string[]): Skill[] {
    return skillIds
      .map((id) => this.skills.get(id))
      .filter((s): s is Skill => s !== undefined && s.enabled);
  }
}
