/**
 * Skill Agent - tool-calling loop
 *
 * One user turn alternates between asking the model and running the tool
 * calls it requested, until the model answers without tool calls or the step
 * limit is hit.
 */

import { Conversation } from './conversation.js';
import {
  IModel,
  ModelResponse,
  Tool,
  ToolCall,
  ToolResult,
  assistantMessage,
  userMessage,
} from '../models/base.js';
import { normalizeOutput, toConversationItems } from '../models/normalize.js';
import { getTools } from '../tools/definitions.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { ToolCallRecord } from '../tools/types.js';
import { ModelError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_MAX_STEPS = 20;

export type ToolCallListener = (record: ToolCallRecord, result: ToolResult) => void;

export interface AgentConfig {
  model: IModel;
  executor: ToolExecutor;
  /** System messages every conversation starts with */
  preamble?: readonly string[];
  /** Model requests allowed per user turn */
  maxSteps?: number;
  tools?: Tool[];
  onToolCall?: ToolCallListener;
}

export interface ChatOptions {
  /** Listener for this turn only; replaces the configured one */
  onToolCall?: ToolCallListener;
}

export interface AgentResponse {
  /** Last text the model produced during the turn, possibly empty */
  content: string;
  /** Model requests made */
  steps: number;
  toolCalls: ToolCallRecord[];
  stepLimitReached: boolean;
}

export class SkillAgent {
  private model: IModel;
  private executor: ToolExecutor;
  private conversation: Conversation;
  private maxSteps: number;
  private tools: Tool[];
  private onToolCall?: ToolCallListener;

  constructor(config: AgentConfig) {
    this.model = config.model;
    this.executor = config.executor;
    this.conversation = new Conversation(config.preamble ?? []);
    this.maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
    this.tools = config.tools ?? getTools();
    this.onToolCall = config.onToolCall;
  }

  /**
   * Process a user message and return the agent's answer for the turn.
   */
  async chat(message: string, options: ChatOptions = {}): Promise<AgentResponse> {
    this.conversation.append(userMessage(message));
    const onToolCall = options.onToolCall ?? this.onToolCall;

    const toolCalls: ToolCallRecord[] = [];
    let finalText = '';
    let steps = 0;
    let done = false;

    while (steps < this.maxSteps) {
      steps++;
      logger.debug(`Agent step ${steps}/${this.maxSteps}`);

      const response = await this.request();
      const items = normalizeOutput(response.output, `call_${steps}`);

      for (const item of items) {
        if (item.kind === 'text') {
          finalText = item.text;
        }
      }

      const pending: ToolCall[] = items.flatMap(item => (item.kind === 'tool_call' ? [item.call] : []));
      if (pending.length === 0) {
        done = true;
        break;
      }

      logger.debug(`Model requested ${pending.length} tool call(s)`);
      this.conversation.append(...toConversationItems(items));

      // One at a time, in the order the model listed them.
      for (const call of pending) {
        const { result, record } = await this.executor.execute(call);
        toolCalls.push(record);
        this.conversation.append({
          type: 'function_call_output',
          call_id: result.callId,
          output: result.output,
        });
        onToolCall?.(record, result);
      }
    }

    if (!done) {
      logger.warn(`Step limit of ${this.maxSteps} reached; returning partial answer`);
    }

    if (finalText) {
      this.conversation.append(assistantMessage(finalText));
    }

    return {
      content: finalText,
      steps,
      toolCalls,
      stepLimitReached: !done,
    };
  }

  private async request(): Promise<ModelResponse> {
    try {
      return await this.model.respond({
        input: this.conversation.getItems(),
        tools: this.tools,
      });
    } catch (error) {
      logger.error('Model call failed', error);
      if (error instanceof ModelError) {
        throw error;
      }
      throw new ModelError(`Failed to get response from model: ${errorMessage(error)}`, this.model.name);
    }
  }

  /**
   * Drop the turn history, keeping only the system preamble.
   */
  resetConversation() {
    this.conversation.reset();
    logger.debug('Conversation history reset');
  }

  getConversationHistory() {
    return this.conversation.getItems();
  }

  getMaxSteps(): number {
    return this.maxSteps;
  }
}
