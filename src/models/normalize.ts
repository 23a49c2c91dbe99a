/**
 * Response item normalization
 *
 * Providers and SDK versions hand back output items in several shapes. This
 * module is the only code that knows about them: everything downstream sees
 * `NormalizedItem`.
 */

import { z } from 'zod';
import type { ConversationItem, NormalizedItem, ToolCall } from './base.js';

const ArgumentsSchema = z.unknown();

// Responses API: { type: 'function_call', call_id, name, arguments }
const FunctionCallShape = z.object({
  type: z.literal('function_call'),
  call_id: z.string().optional(),
  id: z.string().optional(),
  name: z.string(),
  arguments: ArgumentsSchema,
});

// Chat-completions style: { type: 'tool_call', id, function: { name, arguments } }
const NestedToolCallShape = z.object({
  type: z.literal('tool_call'),
  id: z.string().optional(),
  call_id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: ArgumentsSchema,
  }),
});

const OutputTextPartShape = z.object({
  type: z.literal('output_text'),
  text: z.string(),
});

const MessageShape = z.object({
  type: z.literal('message'),
  content: z.union([z.string(), z.array(z.unknown())]),
});

const OutputTextShape = z.object({
  type: z.literal('output_text'),
  text: z.string().optional(),
  content: z.string().optional(),
});

/**
 * Parse a tool-call argument payload. Anything that is not a JSON object
 * becomes `{}`.
 */
export function parseToolArguments(payload: unknown): { args: Record<string, unknown>; raw: string } {
  if (typeof payload !== 'string') {
    const asObject = z.record(z.unknown()).safeParse(payload);
    if (asObject.success) {
      return { args: asObject.data, raw: JSON.stringify(asObject.data) };
    }
    return { args: {}, raw: '{}' };
  }

  try {
    const parsed: unknown = JSON.parse(payload);
    const asObject = z.record(z.unknown()).safeParse(parsed);
    return { args: asObject.success ? asObject.data : {}, raw: payload };
  } catch {
    return { args: {}, raw: payload };
  }
}

function textItems(...candidates: Array<string | undefined>): NormalizedItem[] {
  return candidates
    .filter((text): text is string => typeof text === 'string' && text.trim().length > 0)
    .map((text): NormalizedItem => ({ kind: 'text', text }));
}

function toolCallItem(
  id: string,
  name: string,
  payload: unknown
): NormalizedItem {
  const { args, raw } = parseToolArguments(payload);
  const call: ToolCall = { id, name, arguments: args };
  return { kind: 'tool_call', call, rawArguments: raw };
}

/**
 * Normalize one output item. Items that carry neither text nor a tool call
 * (reasoning summaries, for instance) yield nothing; a message with several
 * text parts yields one text item per non-blank part.
 *
 * `fallbackId` names a tool call whose item carries no id.
 */
export function normalizeItem(item: unknown, fallbackId: string): NormalizedItem[] {
  const functionCall = FunctionCallShape.safeParse(item);
  if (functionCall.success) {
    const { call_id, id, name } = functionCall.data;
    return [toolCallItem(call_id ?? id ?? fallbackId, name, functionCall.data.arguments)];
  }

  const nested = NestedToolCallShape.safeParse(item);
  if (nested.success) {
    const { call_id, id } = nested.data;
    return [toolCallItem(call_id ?? id ?? fallbackId, nested.data.function.name, nested.data.function.arguments)];
  }

  const message = MessageShape.safeParse(item);
  if (message.success) {
    const { content } = message.data;
    if (typeof content === 'string') {
      return textItems(content);
    }
    return textItems(
      ...content.map(part => {
        const parsed = OutputTextPartShape.safeParse(part);
        return parsed.success ? parsed.data.text : undefined;
      })
    );
  }

  const outputText = OutputTextShape.safeParse(item);
  if (outputText.success) {
    return textItems(outputText.data.text ?? outputText.data.content);
  }

  return [];
}

/**
 * Normalize a whole response, preserving item order. Tool calls without an id
 * are named `<idPrefix>_<position>`.
 */
export function normalizeOutput(items: readonly unknown[], idPrefix: string = 'call'): NormalizedItem[] {
  return items.flatMap((item, index) => normalizeItem(item, `${idPrefix}_${index}`));
}

/**
 * Conversation records that let the model see its own output on the next
 * request.
 */
export function toConversationItems(items: readonly NormalizedItem[]): ConversationItem[] {
  return items.map((item): ConversationItem =>
    item.kind === 'tool_call'
      ? { type: 'function_call', call_id: item.call.id, name: item.call.name, arguments: item.rawArguments }
      : { type: 'message', role: 'assistant', content: item.text }
  );
}
