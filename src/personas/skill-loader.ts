/**
 * Skill loader - discovers SKILL.md manifests under a skills root and
 * assembles them into one budgeted instruction block
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Workspace } from '../core/workspace.js';
import { logger } from '../utils/logger.js';
import { assembleContext } from './context-assembler.js';
import { AssembledContext, DEFAULT_MAX_CONTEXT_CHARS, SkillMetadata } from './types.js';

const SKILL_FILE_NAME = 'skill.md';
const FRONTMATTER_DELIMITER = '---';
const FRONTMATTER_SCAN_LINES = 2000;

export const UNNAMED_SKILL = '(unnamed)';

const SKILLS_INTRODUCTION =
  "You have access to the following agent skills. Use them when relevant. " +
  "Follow each skill's instructions exactly, including required tools/workflows.\n" +
  'Skills are provided below delimited by SKILL START/END markers.';

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value.charAt(start))) start++;
  while (end > start && chars.includes(value.charAt(end - 1))) end--;
  return value.slice(start, end);
}

/**
 * Read `name:` from a leading frontmatter block.
 *
 * The first line must be exactly `---` and the block must close with another
 * `---` line within the scan window; otherwise, or when the block has no
 * `name:` key, the result is an empty string.
 */
export function extractFrontmatterName(markdown: string): string {
  const lines = markdown.split(/\r\n|\r|\n/);
  if (lines.length === 0 || lines[0].trim() !== FRONTMATTER_DELIMITER) {
    return '';
  }

  let end = -1;
  const limit = Math.min(lines.length, FRONTMATTER_SCAN_LINES);
  for (let i = 1; i < limit; i++) {
    if (lines[i].trim() === FRONTMATTER_DELIMITER) {
      end = i;
      break;
    }
  }
  if (end === -1) {
    return '';
  }

  for (let i = 1; i < end; i++) {
    const line = lines[i].trim();
    if (line.toLowerCase().startsWith('name:')) {
      const value = line.slice(line.indexOf(':') + 1).trim();
      return stripChars(stripChars(value, '"'), "'");
    }
  }
  return '';
}

/**
 * Recursively collect SKILL.md files (any case) under a directory, sorted.
 * Symlinked directories are not followed.
 */
export async function findSkillFiles(skillsRoot: string): Promise<string[]> {
  const hits: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      logger.debug(`Skipping unreadable directory ${dir}`);
      return;
    }

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile() && entry.name.toLowerCase() === SKILL_FILE_NAME) {
        hits.push(entryPath);
      }
    }
  }

  await walk(skillsRoot);
  return hits.sort();
}

/**
 * Build the skills bundle for a workspace.
 *
 * Metadata lists every readable SKILL.md, including those the budget left out
 * of the text.
 */
export async function buildSkillsContext(
  workspace: Workspace,
  skillsDir: string,
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): Promise<AssembledContext<SkillMetadata>> {
  let skillsRoot: string;
  try {
    skillsRoot = workspace.resolvePath(skillsDir);
  } catch {
    logger.warn(`Skills directory ${skillsDir} is outside the workspace; no skills loaded`);
    return { text: '', chunks: [], metadata: [] };
  }

  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(skillsRoot)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    logger.debug(`No skills directory at ${skillsRoot}`);
    return { text: '', chunks: [], metadata: [] };
  }

  const skillPaths = (await findSkillFiles(skillsRoot)).map(p => workspace.toRelative(p));
  logger.debug(`Discovered ${skillPaths.length} skill file(s) under ${skillsDir}`);

  return assembleContext<SkillMetadata>(workspace, skillPaths, {
    label: 'SKILL',
    introduction: SKILLS_INTRODUCTION,
    maxChars,
    displayName: source => extractFrontmatterName(source.content) || UNNAMED_SKILL,
    markerTitle: (source, displayName) => `${displayName} | ${source.path}`,
    describe: source => ({ path: source.path, name: extractFrontmatterName(source.content) }),
    describeAfterCutoff: true,
  });
}
