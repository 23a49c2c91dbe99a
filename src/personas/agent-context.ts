/**
 * The single place the interactive and evaluation entry points build an
 * agent's system preamble from.
 */

import type { Workspace } from '../core/workspace.js';
import { logger } from '../utils/logger.js';
import { buildContext, buildPersonaContext } from './persona-loader.js';
import { buildSkillsContext } from './skill-loader.js';
import { ContextFileMetadata, DEFAULT_MAX_CONTEXT_CHARS, SkillMetadata } from './types.js';

export interface AgentContextOptions {
  skillsDir: string;
  contextFiles?: readonly string[];
  personaFiles?: readonly string[];
  /** Budget applied to each bundle separately */
  maxChars?: number;
}

export interface AgentContext {
  /** Non-empty bundles in preamble order: persona, context, skills */
  preamble: string[];
  skills: SkillMetadata[];
  contextFiles: ContextFileMetadata[];
  personaFiles: ContextFileMetadata[];
}

export async function loadAgentContext(
  workspace: Workspace,
  options: AgentContextOptions
): Promise<AgentContext> {
  const maxChars = options.maxChars ?? DEFAULT_MAX_CONTEXT_CHARS;

  const persona = await buildPersonaContext(workspace, options.personaFiles ?? [], maxChars);
  const context = await buildContext(workspace, options.contextFiles ?? [], maxChars);
  const skills = await buildSkillsContext(workspace, options.skillsDir, maxChars);

  const preamble = [persona.text, context.text, skills.text].filter(text => text.trim().length > 0);

  logger.debug(
    `Agent context: ${persona.chunks.length} persona, ${context.chunks.length} context, ` +
    `${skills.chunks.length}/${skills.metadata.length} skill chunk(s)`
  );

  return {
    preamble,
    skills: skills.metadata,
    contextFiles: context.metadata,
    personaFiles: persona.metadata,
  };
}
