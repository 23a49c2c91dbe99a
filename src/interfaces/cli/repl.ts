/**
 * REPL (Read-Eval-Print Loop) for interactive chat with a skill agent
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import ora from 'ora';
import type { SkillAgent } from '../../core/agent.js';
import type { ContextFileMetadata, SkillMetadata } from '../../personas/types.js';
import { errorMessage } from '../../utils/errors.js';
import { formatAnswer } from '../../utils/markdown.js';
import { describeToolCall } from './tool-output.js';

export interface REPLOptions {
  agent: SkillAgent;
  workspaceDir: string;
  skills: SkillMetadata[];
  contextFiles: ContextFileMetadata[];
  personaFiles: ContextFileMetadata[];
}

const EXIT_COMMANDS = new Set(['exit', 'quit', 'q']);

export async function startREPL(options: REPLOptions): Promise<void> {
  const { agent } = options;

  console.log(chalk.bold.cyan('\nInteractive session started.'));
  console.log(chalk.gray(`Workspace: ${options.workspaceDir}`));

  if (options.personaFiles.length > 0) {
    console.log(chalk.gray(`Loaded persona file(s): ${options.personaFiles.map(file => file.path).join(', ')}`));
  }
  if (options.contextFiles.length > 0) {
    console.log(chalk.gray(`Loaded context file(s): ${options.contextFiles.map(file => file.path).join(', ')}`));
  }
  console.log(
    chalk.gray(
      `Loaded ${options.skills.length} skill(s): ${options.skills.map(skill => skill.name || skill.path).join(', ')}`
    )
  );
  console.log(chalk.gray("Type 'exit' or 'quit' to end the session, 'clear' to clear conversation history.\n"));

  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: 'input',
        name: 'message',
        message: chalk.bold.blue('You:'),
        prefix: '',
      },
    ]);

    const trimmedMessage = message.trim();
    if (!trimmedMessage) {
      continue;
    }

    const command = trimmedMessage.toLowerCase();

    if (EXIT_COMMANDS.has(command)) {
      console.log(chalk.gray('\nGoodbye!\n'));
      break;
    }

    if (command === 'clear') {
      agent.resetConversation();
      console.log(chalk.yellow('\n✓ Conversation cleared\n'));
      continue;
    }

    const spinner = ora('Thinking...').start();

    try {
      const response = await agent.chat(trimmedMessage, {
        onToolCall: (record, result) => {
          spinner.stop();
          console.log(chalk.gray(`\n${describeToolCall(record, result.output).join('\n')}`));
          spinner.start();
        },
      });
      spinner.stop();

      console.log(chalk.bold.green('\nAssistant:'));
      console.log(formatAnswer(response.content));

      if (response.stepLimitReached) {
        console.log(chalk.yellow(`\n[Step limit of ${agent.getMaxSteps()} reached]`));
      }
      console.log(chalk.gray(`[Steps: ${response.steps}, tool calls: ${response.toolCalls.length}]\n`));
    } catch (error) {
      spinner.stop();
      console.log(chalk.red('\n✗ Error:'), errorMessage(error));
      console.log('');
    }
  }
}
