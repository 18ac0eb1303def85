/**
 * @toolgate/skills
 */

export { formatSkill, injectSkills, mergeSkillPrompts } from './skill-injector.js';
export type { Skill, SkillFrontmatter, SkillLoadOptions } from './skill-loader.js';
export { loadSkills, parseFrontmatter, parseSkillFile } from './skill-loader.js';
export { SkillRegistry } from './skill-registry.js';
