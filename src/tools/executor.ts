/**
 * Tool Executor
 *
 * Turns a model tool call into exactly one result. Calls are parsed into a
 * closed set of invocations; unknown names and handler failures come back as
 * plain-text results the model can read and correct.
 */

import { z } from 'zod';
import type { Workspace } from '../core/workspace.js';
import type { ToolCall, ToolResult } from '../models/base.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isToolName } from './definitions.js';
import type { ToolCallRecord } from './types.js';

export type ToolInvocation =
  | { kind: 'read_file'; callId: string; path: string }
  | { kind: 'write_file'; callId: string; path: string; content: string }
  | { kind: 'run_shell'; callId: string; command: string }
  | { kind: 'unknown'; callId: string; name: string };

export interface ToolExecution {
  result: ToolResult;
  record: ToolCallRecord;
}

type InvocationOf<K extends ToolInvocation['kind']> = Extract<ToolInvocation, { kind: K }>;

interface HandlerOutcome {
  output: string;
  record: ToolCallRecord;
}

type Handler<K extends ToolInvocation['kind']> = (invocation: InvocationOf<K>) => Promise<HandlerOutcome>;

export type ToolHandlers = { [K in ToolInvocation['kind']]: Handler<K> };

// Missing or non-string arguments become empty strings.
const text = z.string().catch('');
const ReadArgs = z.object({ path: text });
const WriteArgs = z.object({ path: text, content: text });
const ShellArgs = z.object({ command: text });

export function parseInvocation(call: ToolCall): ToolInvocation {
  if (!isToolName(call.name)) {
    return { kind: 'unknown', callId: call.id, name: call.name };
  }

  switch (call.name) {
    case 'read_file':
      return { kind: 'read_file', callId: call.id, ...ReadArgs.parse(call.arguments) };
    case 'write_file':
      return { kind: 'write_file', callId: call.id, ...WriteArgs.parse(call.arguments) };
    case 'run_shell':
      return { kind: 'run_shell', callId: call.id, ...ShellArgs.parse(call.arguments) };
  }
}

/**
 * Trace record for an invocation whose handler threw.
 */
function failedRecord(invocation: ToolInvocation): ToolCallRecord {
  switch (invocation.kind) {
    case 'read_file':
      return { type: 'read', call_id: invocation.callId, path: invocation.path, ok: false };
    case 'write_file':
      return { type: 'write', call_id: invocation.callId, path: invocation.path, bytes: 0, ok: false };
    case 'run_shell':
      return { type: 'shell', call_id: invocation.callId, command: invocation.command, exit_code: 1, ok: false };
    case 'unknown':
      return { type: 'unknown', call_id: invocation.callId, name: invocation.name, ok: false };
  }
}

export function createWorkspaceHandlers(workspace: Workspace): ToolHandlers {
  return {
    read_file: async ({ callId, path }) => ({
      output: await workspace.read(path),
      record: { type: 'read', call_id: callId, path, ok: true },
    }),

    write_file: async ({ callId, path, content }) => ({
      output: await workspace.write(path, content),
      record: { type: 'write', call_id: callId, path, bytes: Buffer.byteLength(content, 'utf-8'), ok: true },
    }),

    run_shell: async ({ callId, command }) => {
      const result = await workspace.run(command);
      return {
        output: JSON.stringify(result),
        record: { type: 'shell', call_id: callId, command, exit_code: result.exit_code, ok: true },
      };
    },

    unknown: async ({ callId, name }) => ({
      output: `Unknown tool: ${name}`,
      record: { type: 'unknown', call_id: callId, name, ok: false },
    }),
  };
}

export class ToolExecutor {
  private handlers: ToolHandlers;

  constructor(handlers: ToolHandlers) {
    this.handlers = handlers;
  }

  static forWorkspace(workspace: Workspace): ToolExecutor {
    return new ToolExecutor(createWorkspaceHandlers(workspace));
  }

  async execute(call: ToolCall): Promise<ToolExecution> {
    const invocation = parseInvocation(call);
    logger.debug(`Executing tool: ${call.name}`);

    try {
      const { output, record } = await this.dispatch(invocation);
      logger.debug(`Tool ${call.name} returned ${output.length} chars`);
      return { result: { callId: call.id, output }, record };
    } catch (error) {
      logger.warn(`Tool ${call.name} failed: ${errorMessage(error)}`);
      return {
        result: { callId: call.id, output: `Error: ${errorMessage(error)}` },
        record: failedRecord(invocation),
      };
    }
  }

  private dispatch(invocation: ToolInvocation): Promise<HandlerOutcome> {
    switch (invocation.kind) {
      case 'read_file':
        return this.handlers.read_file(invocation);
      case 'write_file':
        return this.handlers.write_file(invocation);
      case 'run_shell':
        return this.handlers.run_shell(invocation);
      case 'unknown':
        return this.handlers.unknown(invocation);
    }
  }
}
