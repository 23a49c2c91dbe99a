/**
 * One complete agent run: fresh workspace copy, assembled context, a single
 * user turn. This is what `skillbench run` executes on the far side of the
 * harness's process boundary.
 */

import { SkillAgent } from '../core/agent.js';
import { Workspace } from '../core/workspace.js';
import type { IModel } from '../models/base.js';
import { loadAgentContext } from '../personas/agent-context.js';
import { ToolExecutor } from '../tools/executor.js';
import { logger } from '../utils/logger.js';
import type { RunResult } from './types.js';

export interface RunRequest {
  /** Template directory; the run works on a copy */
  workdir: string;
  /** Skills directory relative to the workspace root */
  skillsDir: string;
  prompt: string;
}

export interface AgentRunSettings {
  model: IModel;
  maxSteps?: number;
  maxContextChars?: number;
  contextFiles?: readonly string[];
  personaFiles?: readonly string[];
  env?: NodeJS.ProcessEnv;
  /** Where the workspace copy is created; the OS temp dir when omitted */
  parentDir?: string;
}

export type AgentRunOptions = RunRequest & AgentRunSettings;

export async function runAgent(options: AgentRunOptions): Promise<RunResult> {
  const workspace = await Workspace.create(options.workdir, {
    ...(options.env ? { env: options.env } : {}),
    ...(options.parentDir ? { parentDir: options.parentDir } : {}),
  });

  const context = await loadAgentContext(workspace, {
    skillsDir: options.skillsDir,
    contextFiles: options.contextFiles,
    personaFiles: options.personaFiles,
    maxChars: options.maxContextChars,
  });

  const agent = new SkillAgent({
    model: options.model,
    executor: ToolExecutor.forWorkspace(workspace),
    preamble: context.preamble,
    maxSteps: options.maxSteps,
  });

  logger.debug(`Agent run in ${workspace.root}`);
  const response = await agent.chat(options.prompt);

  return {
    workspace_dir: workspace.root,
    final_text: response.content,
    tool_calls: response.toolCalls,
  };
}
