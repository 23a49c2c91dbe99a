#!/usr/bin/env node

/**
 * skillbench CLI Entry Point
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { config as loadEnv } from 'dotenv';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { SkillAgent } from '../../core/agent.js';
import { AgentSettings, CONFIG_KEYS, ConfigManager } from '../../core/config.js';
import { Workspace } from '../../core/workspace.js';
import { loadCases } from '../../eval/cases.js';
import { runAgent } from '../../eval/agent-run.js';
import { runEvals } from '../../eval/harness.js';
import { AgentRunner, InProcessAgentRunner, ProcessAgentRunner } from '../../eval/runner-client.js';
import { createOpenAIModel } from '../../models/openai-responses.js';
import { loadAgentContext } from '../../personas/agent-context.js';
import { parseFileList } from '../../personas/persona-loader.js';
import { ToolExecutor } from '../../tools/executor.js';
import { logger, LogLevel } from '../../utils/logger.js';
import { startREPL } from './repl.js';

loadEnv();

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8')));

interface AgentFlags {
  skillsDir?: string;
  maxSkillChars?: number;
  contextFiles?: string;
  personaFiles?: string;
  maxSteps?: number;
  model?: string;
  apiBase?: string;
  debug?: boolean;
}

interface ChatFlags extends AgentFlags {
  workdir: string;
}

interface RunFlags extends AgentFlags {
  workdir: string;
  prompt: string;
}

interface EvalFlags extends AgentFlags {
  cases: string;
  skillRoot: string;
  concurrency: number;
  inProcess?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function withAgentOptions(command: Command): Command {
  return command
    .option('-s, --skills-dir <path>', 'Skills directory relative to the workspace root')
    .option('--max-skill-chars <number>', 'Character budget for each injected bundle', parsePositiveInt)
    .option('--context-files <list>', 'Comma-separated context files to load (e.g. AGENTS.md,SOUL.md)')
    .option('--persona-files <list>', 'Comma-separated persona files to load')
    .option('--max-steps <number>', 'Model requests allowed per turn', parsePositiveInt)
    .option('-m, --model <name>', 'Model name')
    .option('--api-base <url>', 'Base URL of an OpenAI-compatible API')
    .option('--debug', 'Enable debug logging');
}

/**
 * Resolve settings for a command and apply the log level.
 */
function prepare(flags: AgentFlags): AgentSettings {
  const settings = ConfigManager.getInstance().resolveSettings({
    model: flags.model,
    apiBase: flags.apiBase,
    maxSteps: flags.maxSteps,
    maxContextChars: flags.maxSkillChars,
    skillsDir: flags.skillsDir,
    debug: flags.debug,
  });

  if (settings.debug) {
    logger.setLogLevel(LogLevel.DEBUG);
  }
  return settings;
}

/**
 * Flags handed on to each `run` process started by `eval`.
 */
function forwardedFlags(flags: AgentFlags): string[] {
  const args: string[] = [];
  if (flags.maxSkillChars !== undefined) args.push('--max-skill-chars', String(flags.maxSkillChars));
  if (flags.contextFiles) args.push('--context-files', flags.contextFiles);
  if (flags.personaFiles) args.push('--persona-files', flags.personaFiles);
  if (flags.maxSteps !== undefined) args.push('--max-steps', String(flags.maxSteps));
  if (flags.model) args.push('--model', flags.model);
  if (flags.apiBase) args.push('--api-base', flags.apiBase);
  if (flags.debug) args.push('--debug');
  return args;
}

const program = new Command();

program
  .name('skillbench')
  .description('Tool-using LLM agent with file-based skills, and an eval harness for it')
  .version(packageJson.version);

withAgentOptions(
  program
    .command('chat')
    .description('Start an interactive session in a fresh copy of a directory')
    .requiredOption('-w, --workdir <path>', 'Directory to copy into an isolated workspace')
).action(async (options: ChatFlags) => {
  try {
    const settings = prepare(options);
    const model = createOpenAIModel(settings);

    const workspace = await Workspace.create(options.workdir, { prefix: 'skillbench-chat-' });
    const context = await loadAgentContext(workspace, {
      skillsDir: settings.skillsDir,
      contextFiles: parseFileList(options.contextFiles),
      personaFiles: parseFileList(options.personaFiles),
      maxChars: settings.maxContextChars,
    });

    const agent = new SkillAgent({
      model,
      executor: ToolExecutor.forWorkspace(workspace),
      preamble: context.preamble,
      maxSteps: settings.maxSteps,
    });

    await startREPL({
      agent,
      workspaceDir: workspace.root,
      skills: context.skills,
      contextFiles: context.contextFiles,
      personaFiles: context.personaFiles,
    });
  } catch (error) {
    logger.error('Chat session failed', error);
    process.exit(1);
  }
});

withAgentOptions(
  program
    .command('run')
    .description('Run one prompt in a fresh copy of a directory and print the trace as JSON')
    .requiredOption('-w, --workdir <path>', 'Directory to copy into an isolated workspace')
    .requiredOption('-p, --prompt <text>', 'Prompt to execute')
).action(async (options: RunFlags) => {
  try {
    const settings = prepare(options);
    const result = await runAgent({
      workdir: options.workdir,
      skillsDir: settings.skillsDir,
      prompt: options.prompt,
      model: createOpenAIModel(settings),
      maxSteps: settings.maxSteps,
      maxContextChars: settings.maxContextChars,
      contextFiles: parseFileList(options.contextFiles),
      personaFiles: parseFileList(options.personaFiles),
    });
    process.stdout.write(`${JSON.stringify(result)}\n`);
  } catch (error) {
    logger.error('Run failed', error);
    process.exit(1);
  }
});

withAgentOptions(
  program
    .command('eval')
    .description('Run eval cases and print a JSON report; exits non-zero unless every case passes')
    .option('-c, --cases <file>', 'JSON Lines file of eval cases', 'evals/cases.jsonl')
    .option('--skill-root <path>', 'Directory each case copies into its workspace', process.cwd())
    .option('--concurrency <number>', 'Cases run at the same time', parsePositiveInt, 1)
    .option('--in-process', 'Run the agent inside this process instead of one process per case')
).action(async (options: EvalFlags) => {
  try {
    const settings = prepare(options);
    const cases = await loadCases(options.cases);
    logger.info(`Loaded ${cases.length} case(s) from ${options.cases}`);

    const runner: AgentRunner = options.inProcess
      ? new InProcessAgentRunner({
          model: createOpenAIModel(settings),
          maxSteps: settings.maxSteps,
          maxContextChars: settings.maxContextChars,
          contextFiles: parseFileList(options.contextFiles),
          personaFiles: parseFileList(options.personaFiles),
        })
      : new ProcessAgentRunner({ extraArgs: forwardedFlags(options) });

    const report = await runEvals(cases, runner, {
      workdir: options.skillRoot,
      skillsDir: settings.skillsDir,
      concurrency: options.concurrency,
    });

    console.log(JSON.stringify(report, null, 2));
    if (report.passed === report.total) {
      logger.success(`${report.passed}/${report.total} case(s) passed`);
    } else {
      logger.warn(`${report.passed}/${report.total} case(s) passed`);
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Eval failed', error);
    process.exit(1);
  }
});

const configCommand = program.command('config').description('Manage stored defaults');

configCommand
  .command('show')
  .description('Print the stored configuration')
  .action(() => {
    try {
      const manager = ConfigManager.getInstance();
      const stored = manager.getConfig();
      const shown = { ...stored, ...(stored.apiKey ? { apiKey: '********' } : {}) };
      console.log(chalk.gray(`# ${manager.getConfigPath()}`));
      console.log(JSON.stringify(shown, null, 2));
    } catch (error) {
      logger.error('Failed to read configuration', error);
      process.exit(1);
    }
  });

configCommand
  .command('set')
  .description(`Store a default (${CONFIG_KEYS.join(', ')})`)
  .argument('<key>', 'Config key')
  .argument('<value>', 'Value')
  .action((key: string, value: string) => {
    try {
      ConfigManager.getInstance().setFromString(key, value);
      console.log(chalk.green(`✓ ${key} saved`));
    } catch (error) {
      logger.error('Failed to update configuration', error);
      process.exit(1);
    }
  });

configCommand
  .command('unset')
  .description('Remove a stored default')
  .argument('<key>', 'Config key')
  .action((key: string) => {
    try {
      ConfigManager.getInstance().unset(key);
      console.log(chalk.green(`✓ ${key} removed`));
    } catch (error) {
      logger.error('Failed to update configuration', error);
      process.exit(1);
    }
  });

configCommand
  .command('path')
  .description('Print the configuration file location')
  .action(() => {
    console.log(ConfigManager.getInstance().getConfigPath());
  });

configCommand
  .command('reset')
  .description('Remove every stored default')
  .action(() => {
    ConfigManager.getInstance().reset();
    console.log(chalk.yellow('✓ Configuration reset'));
  });

await program.parseAsync();
