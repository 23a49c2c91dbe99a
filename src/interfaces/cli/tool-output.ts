/**
 * Console lines for one tool invocation in the interactive session
 */

import { z } from 'zod';
import type { ToolCallRecord } from '../../tools/types.js';

export const READ_PREVIEW_CHARS = 200;
export const SHELL_PREVIEW_CHARS = 500;

const ShellOutputSchema = z.object({
  exit_code: z.number(),
  stdout: z.string(),
  stderr: z.string(),
});

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function parseShellOutput(output: string): z.infer<typeof ShellOutputSchema> | undefined {
  try {
    const parsed = ShellOutputSchema.safeParse(JSON.parse(output));
    return parsed.success ? parsed.data : undefined;
  } catch {
    // error results ("Error: ...") are plain text
    return undefined;
  }
}

export function describeToolCall(record: ToolCallRecord, output: string): string[] {
  switch (record.type) {
    case 'read':
      return [`[Calling read_file: ${record.path}]`, `[Output: ${truncate(output, READ_PREVIEW_CHARS)}]`];
    case 'write':
      return [`[Calling write_file: ${record.path}]`, `[Output: ${output}]`];
    case 'shell': {
      const lines = [`[Calling run_shell: ${record.command}]`];
      const shell = parseShellOutput(output);
      if (!shell) {
        lines.push(`[Output: ${truncate(output, SHELL_PREVIEW_CHARS)}]`);
        return lines;
      }
      lines.push(`[Exit code: ${shell.exit_code}]`);
      if (shell.stdout) lines.push(`[stdout]: ${truncate(shell.stdout, SHELL_PREVIEW_CHARS)}`);
      if (shell.stderr) lines.push(`[stderr]: ${truncate(shell.stderr, SHELL_PREVIEW_CHARS)}`);
      return lines;
    }
    case 'unknown':
      return [`[Calling ${record.name}]`, `[Output: ${output}]`];
  }
}
