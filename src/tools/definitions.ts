/**
 * The fixed tool set surfaced to the model
 */

import type { Tool } from '../models/base.js';

export const TOOL_NAMES = ['read_file', 'write_file', 'run_shell'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(known => known === name);
}

export const TOOL_DEFINITIONS: Record<ToolName, Tool> = {
  read_file: {
    name: 'read_file',
    description: 'Read a UTF-8 text file from the workspace by relative path.',
    parameters: {
      type: 'object',
      properties: { path: { type: 'string' } },
      required: ['path'],
      additionalProperties: false,
    },
  },
  write_file: {
    name: 'write_file',
    description: 'Write a UTF-8 text file to the workspace by relative path.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string' },
        content: { type: 'string' },
      },
      required: ['path', 'content'],
      additionalProperties: false,
    },
  },
  run_shell: {
    name: 'run_shell',
    description: 'Run a shell command in the workspace. Return stdout/stderr and exit code.',
    parameters: {
      type: 'object',
      properties: { command: { type: 'string' } },
      required: ['command'],
      additionalProperties: false,
    },
  },
};

export function getTools(): Tool[] {
  return TOOL_NAMES.map(name => TOOL_DEFINITIONS[name]);
}
