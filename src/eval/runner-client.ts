/**
 * Agent runners used by the eval harness
 *
 * ProcessAgentRunner starts a separate process per case and reads one JSON
 * document from its stdout, so a crash or hang in the agent stays outside
 * the harness. InProcessAgentRunner runs the agent directly.
 */

import { dirname, extname, join } from 'path';
import { fileURLToPath } from 'url';
import { RunnerError, errorMessage } from '../utils/errors.js';
import { execCommand } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import { AgentRunSettings, RunRequest, runAgent } from './agent-run.js';
import { RunResult, RunResultSchema } from './types.js';

export interface AgentRunner {
  run(request: RunRequest): Promise<RunResult>;
}

const here = fileURLToPath(import.meta.url);

/** CLI entry beside this module: the .ts source under tsx, the .js build otherwise */
export const DEFAULT_CLI_ENTRY = join(dirname(here), '..', 'interfaces', 'cli', `index${extname(here)}`);

export interface ProcessAgentRunnerOptions {
  /** Executable to start; the current Node binary by default */
  command?: string;
  /** Arguments placed before the run flags; the CLI's `run` command by default */
  args?: string[];
  /** Arguments placed after the run flags */
  extraArgs?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export class ProcessAgentRunner implements AgentRunner {
  private command: string;
  private args: string[];
  private extraArgs: string[];
  private env?: NodeJS.ProcessEnv;
  private cwd?: string;

  constructor(options: ProcessAgentRunnerOptions = {}) {
    this.command = options.command ?? process.execPath;
    this.args = options.args ?? [...process.execArgv, DEFAULT_CLI_ENTRY, 'run'];
    this.extraArgs = options.extraArgs ?? [];
    this.env = options.env;
    this.cwd = options.cwd;
  }

  async run(request: RunRequest): Promise<RunResult> {
    const args = [
      ...this.args,
      '--workdir', request.workdir,
      '--skills-dir', request.skillsDir,
      '--prompt', request.prompt,
      ...this.extraArgs,
    ];

    logger.debug(`Starting agent run: ${this.command} ${args.join(' ')}`);
    const { stdout, stderr, code } = await execCommand(this.command, args, {
      ...(this.env ? { env: this.env } : {}),
      ...(this.cwd ? { cwd: this.cwd } : {}),
    });

    if (code !== 0) {
      throw new RunnerError(`Agent run exited with code ${code}`, code, stderr, stdout);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout.trim());
    } catch (error) {
      throw new RunnerError(`Agent run printed invalid JSON: ${errorMessage(error)}`, code, stderr, stdout);
    }

    const parsed = RunResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RunnerError(
        `Agent run printed an unexpected result: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        code,
        stderr,
        stdout
      );
    }
    return parsed.data;
  }
}

export class InProcessAgentRunner implements AgentRunner {
  private settings: AgentRunSettings;

  constructor(settings: AgentRunSettings) {
    this.settings = settings;
  }

  run(request: RunRequest): Promise<RunResult> {
    return runAgent({ ...this.settings, ...request });
  }
}
