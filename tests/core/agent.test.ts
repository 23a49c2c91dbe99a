import { afterEach, describe, expect, it, vi } from 'vitest';
import { SkillAgent } from '../../src/core/agent.js';
import { Workspace } from '../../src/core/workspace.js';
import type { IModel } from '../../src/models/base.js';
import { ToolExecutor } from '../../src/tools/executor.js';
import { ModelError } from '../../src/utils/errors.js';
import { ScriptedModel, cleanupTrees, functionCall, makeTree, textMessage } from '../helpers.js';

afterEach(cleanupTrees);

async function agentWith(model: IModel, options: { maxSteps?: number; preamble?: string[] } = {}) {
  const workspace = new Workspace(await makeTree({ 'input.txt': 'seed' }));
  const agent = new SkillAgent({
    model,
    executor: ToolExecutor.forWorkspace(workspace),
    preamble: options.preamble,
    maxSteps: options.maxSteps,
  });
  return { agent, workspace };
}

describe('SkillAgent', () => {
  it('finishes when the model answers without tool calls', async () => {
    const model = new ScriptedModel([[textMessage('All done')]]);
    const { agent } = await agentWith(model);

    const response = await agent.chat('hello');

    expect(response).toEqual({ content: 'All done', steps: 1, toolCalls: [], stepLimitReached: false });
    expect(agent.getConversationHistory()).toEqual([
      { type: 'message', role: 'user', content: 'hello' },
      { type: 'message', role: 'assistant', content: 'All done' },
    ]);
  });

  it('runs tool calls and sends their results back', async () => {
    const model = new ScriptedModel([
      [functionCall('call_w', 'write_file', { path: 'out.txt', content: 'hi' })],
      [textMessage('Wrote it')],
    ]);
    const { agent, workspace } = await agentWith(model);

    const response = await agent.chat('write a file');

    expect(response.content).toBe('Wrote it');
    expect(response.steps).toBe(2);
    expect(response.toolCalls).toEqual([{ type: 'write', call_id: 'call_w', path: 'out.txt', bytes: 2, ok: true }]);
    await expect(workspace.read('out.txt')).resolves.toBe('hi');

    const secondInput = model.requests[1].input;
    expect(secondInput.slice(-2)).toEqual([
      { type: 'function_call', call_id: 'call_w', name: 'write_file', arguments: '{"path":"out.txt","content":"hi"}' },
      { type: 'function_call_output', call_id: 'call_w', output: 'Wrote 2 bytes to out.txt' },
    ]);
  });

  it('answers a tool call whose arguments are not an object', async () => {
    const model = new ScriptedModel([
      [{ type: 'function_call', call_id: 'c_num', name: 'run_shell', arguments: 42 }],
      [textMessage('Handled')],
    ]);
    const { agent } = await agentWith(model);

    const response = await agent.chat('go');

    expect(response.steps).toBe(2);
    expect(response.content).toBe('Handled');
    expect(response.toolCalls).toHaveLength(1);
    expect(response.toolCalls[0]).toMatchObject({ type: 'shell', call_id: 'c_num', command: '' });

    const secondInput = model.requests[1].input;
    expect(secondInput.slice(-2)).toMatchObject([
      { type: 'function_call', call_id: 'c_num', name: 'run_shell', arguments: '{}' },
      { type: 'function_call_output', call_id: 'c_num' },
    ]);
  });

  it('executes calls one at a time in the order given', async () => {
    const model = new ScriptedModel([
      [
        functionCall('c1', 'write_file', { path: 'step.txt', content: 'first' }),
        functionCall('c2', 'read_file', { path: 'step.txt' }),
      ],
      [textMessage('ok')],
    ]);
    const { agent } = await agentWith(model);

    await agent.chat('go');

    const outputs = model.requests[1].input.filter(item => item.type === 'function_call_output');
    expect(outputs).toEqual([
      { type: 'function_call_output', call_id: 'c1', output: 'Wrote 5 bytes to step.txt' },
      { type: 'function_call_output', call_id: 'c2', output: 'first' },
    ]);
  });

  it('stops exactly at the step bound', async () => {
    const model = new ScriptedModel([[textMessage('still working'), functionCall('loop', 'read_file', { path: 'input.txt' })]]);
    const { agent } = await agentWith(model, { maxSteps: 3 });

    const response = await agent.chat('never finish');

    expect(model.requests).toHaveLength(3);
    expect(response.steps).toBe(3);
    expect(response.stepLimitReached).toBe(true);
    expect(response.toolCalls).toHaveLength(3);
    expect(response.content).toBe('still working');
  });

  it('returns empty text when the bound is hit without any text', async () => {
    const model = new ScriptedModel([[functionCall('loop', 'read_file', { path: 'input.txt' })]]);
    const { agent } = await agentWith(model, { maxSteps: 2 });

    const response = await agent.chat('loop');

    expect(response.content).toBe('');
    expect(response.stepLimitReached).toBe(true);
    expect(agent.getConversationHistory().filter(item => item.type === 'message' && item.role === 'assistant')).toEqual([]);
  });

  it('defaults to twenty steps', async () => {
    const model = new ScriptedModel([[textMessage('x')]]);
    const { agent } = await agentWith(model);
    expect(agent.getMaxSteps()).toBe(20);
  });

  it('resets to the system preamble', async () => {
    const model = new ScriptedModel([[textMessage('answer')]]);
    const { agent } = await agentWith(model, { preamble: ['persona', '', 'skills'] });

    await agent.chat('question');
    expect(agent.getConversationHistory()).toHaveLength(4);

    agent.resetConversation();
    expect(agent.getConversationHistory()).toEqual([
      { type: 'message', role: 'system', content: 'persona' },
      { type: 'message', role: 'system', content: 'skills' },
    ]);
  });

  it('reports each tool call to the turn listener', async () => {
    const model = new ScriptedModel([
      [functionCall('c1', 'read_file', { path: 'input.txt' })],
      [textMessage('done')],
    ]);
    const { agent } = await agentWith(model);
    const onToolCall = vi.fn();

    await agent.chat('read', { onToolCall });

    expect(onToolCall).toHaveBeenCalledTimes(1);
    expect(onToolCall).toHaveBeenCalledWith(
      { type: 'read', call_id: 'c1', path: 'input.txt', ok: true },
      { callId: 'c1', output: 'seed' }
    );
  });

  it('wraps model failures in ModelError', async () => {
    const failing: IModel = {
      name: 'failing',
      respond: async () => {
        throw new Error('connection reset');
      },
    };
    const { agent } = await agentWith(failing);

    await expect(agent.chat('hi')).rejects.toBeInstanceOf(ModelError);
  });
});
