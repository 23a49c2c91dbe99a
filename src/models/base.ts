/**
 * Base model interfaces and types
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface Message {
  type: 'message';
  role: ChatRole;
  content: string;
}

/**
 * A tool call the model issued, replayed to it on later requests.
 */
export interface FunctionCallItem {
  type: 'function_call';
  call_id: string;
  name: string;
  arguments: string;
}

export interface FunctionCallOutputItem {
  type: 'function_call_output';
  call_id: string;
  output: string;
}

export type ConversationItem = Message | FunctionCallItem | FunctionCallOutputItem;

export type ToolParameters = {
  type: 'object';
  properties: Record<string, { type: 'string'; description?: string }>;
  required: string[];
  additionalProperties: false;
};

export interface Tool {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  callId: string;
  output: string;
}

/**
 * The two kinds every model output item is reduced to before anything else
 * looks at it.
 */
export type NormalizedItem =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; call: ToolCall; rawArguments: string };

export interface ModelRequest {
  input: ConversationItem[];
  tools: Tool[];
}

export interface ModelResponse {
  /** Output items as the provider returned them */
  output: unknown[];
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

export interface IModel {
  readonly name: string;
  respond(request: ModelRequest): Promise<ModelResponse>;
}

export function systemMessage(content: string): Message {
  return { type: 'message', role: 'system', content };
}

export function userMessage(content: string): Message {
  return { type: 'message', role: 'user', content };
}

export function assistantMessage(content: string): Message {
  return { type: 'message', role: 'assistant', content };
}
