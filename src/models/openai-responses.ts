/**
 * OpenAI Responses API client
 *
 * Sends the whole conversation on every request (`store: false`), so no
 * server-side state is relied on between steps.
 */

import OpenAI from 'openai';
import type {
  FunctionTool,
  ResponseCreateParamsNonStreaming,
  ResponseInputItem,
} from 'openai/resources/responses/responses.js';
import type { ConversationItem, IModel, ModelRequest, ModelResponse, Tool } from './base.js';
import { ConfigurationError, ModelError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * The slice of the SDK this client uses; tests pass a stand-in.
 */
export interface ResponsesApi {
  create(params: ResponseCreateParamsNonStreaming): Promise<{
    output: unknown[];
    usage?: { input_tokens: number; output_tokens: number; total_tokens: number } | null;
  }>;
}

export interface OpenAIResponsesConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  /** Retries after the first attempt for 429 and 5xx responses */
  maxRetries?: number;
  /** Base of the exponential backoff between retries */
  retryDelayMs?: number;
  responses?: ResponsesApi;
}

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isRetryable(status: number | undefined): boolean {
  return status === 429 || (status !== undefined && status >= 500);
}

export function toResponseInput(item: ConversationItem): ResponseInputItem {
  switch (item.type) {
    case 'message':
      return { type: 'message', role: item.role, content: item.content };
    case 'function_call':
      return { type: 'function_call', call_id: item.call_id, name: item.name, arguments: item.arguments };
    case 'function_call_output':
      return { type: 'function_call_output', call_id: item.call_id, output: item.output };
  }
}

export function toFunctionTool(tool: Tool): FunctionTool {
  return {
    type: 'function',
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
    strict: true,
  };
}

/**
 * SDK client with its own retries turned off; `respond` does the retrying.
 */
export function createResponsesClient(apiKey?: string, baseUrl?: string): OpenAI {
  return new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
}

export class OpenAIResponsesModel implements IModel {
  readonly name: string;
  private responses: ResponsesApi;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: OpenAIResponsesConfig) {
    this.name = config.model;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.responses = config.responses ?? createResponsesClient(config.apiKey, config.baseUrl).responses;
  }

  async respond(request: ModelRequest): Promise<ModelResponse> {
    const params: ResponseCreateParamsNonStreaming = {
      model: this.name,
      input: request.input.map(toResponseInput),
      tools: request.tools.map(toFunctionTool),
      store: false,
    };

    let lastError: ModelError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const waitTime = Math.pow(2, attempt) * this.retryDelayMs;
        logger.warn(`Retrying after ${waitTime}ms (attempt ${attempt + 1}/${this.maxRetries + 1})...`);
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }

      try {
        logger.debug(`Model request: ${params.input.length} input item(s)`);
        const response = await this.responses.create(params);

        return {
          output: response.output,
          usage: response.usage
            ? {
                inputTokens: response.usage.input_tokens,
                outputTokens: response.usage.output_tokens,
                totalTokens: response.usage.total_tokens,
              }
            : undefined,
        };
      } catch (error) {
        const status = statusOf(error);
        lastError = new ModelError(
          `Model request failed${status !== undefined ? ` (${status})` : ''}: ${errorMessage(error)}`,
          this.name,
          status
        );

        if (!isRetryable(status) || attempt === this.maxRetries) {
          throw lastError;
        }
        logger.warn(`Got ${status === 429 ? '429 Rate Limited' : `${status} Server Error`}, will retry...`);
      }
    }

    throw lastError ?? new ModelError('Model request failed', this.name);
  }
}

/**
 * Factory function to create the model from resolved settings
 */
export function createOpenAIModel(settings: {
  model: string;
  apiKey?: string;
  apiBase?: string;
}): OpenAIResponsesModel {
  if (!settings.apiKey) {
    throw new ConfigurationError(
      'No API key configured. Set OPENAI_API_KEY or run: skillbench config set apiKey <key>'
    );
  }
  return new OpenAIResponsesModel({
    model: settings.model,
    apiKey: settings.apiKey,
    baseUrl: settings.apiBase,
  });
}
