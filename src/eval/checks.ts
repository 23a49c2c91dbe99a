/**
 * Trace and outcome checks used to score a run
 */

import { Workspace } from '../core/workspace.js';
import type { ToolCallRecord } from '../tools/types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const SKILL_FILE = 'skill.md';
const SKILL_SCRIPTS = 'scripts/';

/**
 * Heuristic: the agent read a skill file or ran something under a skill's
 * scripts directory.
 */
export function skillWasUsed(toolCalls: readonly ToolCallRecord[]): boolean {
  return toolCalls.some(call => {
    if (call.type === 'read') {
      return call.path.toLowerCase().includes(SKILL_FILE);
    }
    if (call.type === 'shell') {
      return call.command.includes(SKILL_SCRIPTS);
    }
    return false;
  });
}

/**
 * Literal substring match against executed shell commands.
 */
export function traceContainsCommand(toolCalls: readonly ToolCallRecord[], pattern: string): boolean {
  return toolCalls.some(call => call.type === 'shell' && call.command.includes(pattern));
}

/**
 * Existence check on a path relative to the run's workspace. A path that
 * escapes the workspace counts as missing.
 */
export async function fileExists(workspaceDir: string, relPath: string): Promise<boolean> {
  const workspace = new Workspace(workspaceDir);
  try {
    workspace.resolvePath(relPath);
  } catch (error) {
    logger.debug(`Outcome path ${relPath} rejected: ${errorMessage(error)}`);
    return false;
  }
  return workspace.exists(relPath);
}
