/**
 * @toolgate/skills: Skill Loader
 *
 * Discovers and loads SKILL.md files from multiple paths.
 *
 * Discovery paths (searched in order):
 *   1. Workspace-local: {workspace}/.toolgate/skills/<name>/SKILL.md
 *   2. Installed: {workspace}/.skills/<name>/SKILL.md
 *   3. Global: ~/.toolgate/skills/<name>/SKILL.md
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { Logger } from '@toolgate/core';
import { logger as rootLogger, ToolgateError } from '@toolgate/core';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Skill {
  /** Unique skill name (from frontmatter or directory name) */
  name: string;
  description: string;
  version?: string;
  license?: string;
  tags: string[];
  /** Disabled skills stay registered but are never injected */
  enabled: boolean;
  /** Markdown content without frontmatter */
  content: string;
  /** Path to the SKILL.md file */
  path: string;
  source: 'workspace' | 'installed' | 'global';
  /** Reference files listed in the skill */
  references: string[];
}

export interface SkillLoadOptions {
  workspace: string;
  /** Additional custom skill paths to scan */
  additionalPaths?: string[];
  /** Home directory override (for testing) */
  homeDir?: string;
  logger?: Logger;
}

const frontmatterSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().default(''),
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  license: z.string().optional(),
  tags: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
});

export type SkillFrontmatter = z.output<typeof frontmatterSchema>;

// ---------------------------------------------------------------------------
// Skill Loader
// ---------------------------------------------------------------------------

/**
 * Load all skills from standard discovery paths. Files that fail to parse
 * are skipped with a warning.
 */
export function loadSkills(opts: SkillLoadOptions): Skill[] {
  const log = (opts.logger ?? rootLogger).child({ component: 'skills' });
  const skills: Skill[] = [];
  const homeDir = opts.homeDir ?? homedir();

  // Discovery paths in priority order
  const paths: Array<{ dir: string; source: Skill['source'] }> = [
    { dir: join(opts.workspace, '.toolgate', 'skills'), source: 'workspace' },
    { dir: join(opts.workspace, '.skills'), source: 'installed' },
    { dir: join(homeDir, '.toolgate', 'skills'), source: 'global' },
    ...(opts.additionalPaths ?? []).map((p) => ({
      dir: resolve(p),
      source: 'workspace' as const,
    })),
  ];

  for (const { dir, source } of paths) {
    if (!existsSync(dir)) continue;

    const entries = readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const skillMdPath = join(dir, entry.name, 'SKILL.md');
      if (!existsSync(skillMdPath)) continue;

      try {
        const skill = parseSkillFile(skillMdPath, entry.name, source);
        // First found wins
        if (skills.some((s) => s.name === skill.name)) continue;
        skills.push(skill);
      } catch (err) {
        log.warn({ err, path: skillMdPath }, 'Skipping unreadable skill');
      }
    }
  }

  log.debug({ count: skills.length }, 'Skills loaded');
  return skills;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a SKILL.md file into a Skill object.
 */
export function parseSkillFile(
  filePath: string,
  fallbackName: string,
  source: Skill['source'],
): Skill {
  const raw = readFileSync(filePath, 'utf-8');
  const { frontmatter, content } = parseFrontmatter(raw);

  // Extract references (lines like `- ./references/foo.md -- description`)
  const references: string[] = [];
  const refPattern = /^\s*-\s+(\.\/[^\s]+)/gm;
  for (const match of content.matchAll(refPattern)) {
    if (match[1]) references.push(match[1]);
  }

  return {
    name: frontmatter.name ?? fallbackName,
    description: frontmatter.description,
    version: frontmatter.version,
    license: frontmatter.license,
    tags: frontmatter.tags,
    enabled: frontmatter.enabled,
    content,
    path: filePath,
    source,
    references,
  };
}

/**
 * Split YAML frontmatter (--- delimited) from the markdown body.
 * A file without frontmatter yields defaults and the whole text as content.
 */
export function parseFrontmatter(raw: string): {
  frontmatter: SkillFrontmatter;
  content: string;
} {
  const lines = raw.split('\n');
  const endIndex =
    lines[0]?.trim() === '---'
      ? lines.findIndex((line, i) => i > 0 && line.trim() === '---')
      : -1;

  if (endIndex === -1) {
    return { frontmatter: frontmatterSchema.parse({}), content: raw.trim() };
  }

  const parsed = frontmatterSchema.safeParse(
    parseYaml(lines.slice(1, endIndex).join('\n')) ?? {},
  );
  if (!parsed.success) {
    throw new ToolgateError(
      `Invalid skill frontmatter: ${parsed.error.message}`,
      'SKILL_FRONTMATTER',
      { cause: parsed.error },
    );
  }

  const content = lines
    .slice(endIndex + 1)
    .join('\n')
    .trim();

  return { frontmatter: parsed.data, content };
}
