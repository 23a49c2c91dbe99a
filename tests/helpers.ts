import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { IModel, ModelRequest, ModelResponse } from '../src/models/base.js';

const created: string[] = [];

/**
 * Temp directory holding the given files (relative path -> content).
 */
export async function makeTree(files: Record<string, string> = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'skillbench-test-'));
  created.push(root);
  for (const [relPath, content] of Object.entries(files)) {
    const target = join(root, relPath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  }
  return root;
}

export async function cleanupTrees(): Promise<void> {
  const roots = created.splice(0);
  await Promise.all(roots.map(root => rm(root, { recursive: true, force: true })));
}

export function functionCall(callId: string, name: string, args: Record<string, unknown>) {
  return { type: 'function_call', call_id: callId, name, arguments: JSON.stringify(args) };
}

export function textMessage(text: string) {
  return { type: 'message', role: 'assistant', content: [{ type: 'output_text', text }] };
}

/**
 * Model double that replays canned outputs, one per request, repeating the
 * last one when the script runs out.
 */
export class ScriptedModel implements IModel {
  readonly name = 'scripted';
  readonly requests: ModelRequest[] = [];
  private outputs: unknown[][];

  constructor(outputs: unknown[][]) {
    this.outputs = outputs;
  }

  async respond(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push({ input: [...request.input], tools: request.tools });
    const index = Math.min(this.requests.length - 1, this.outputs.length - 1);
    return { output: this.outputs[index] ?? [] };
  }
}
