import { afterEach, describe, expect, it } from 'vitest';
import { evaluateCase, runEvals, scoreRun } from '../../src/eval/harness.js';
import type { AgentRunner } from '../../src/eval/runner-client.js';
import type { RunRequest } from '../../src/eval/agent-run.js';
import { EvalCaseSchema, EvalCase, RunResult } from '../../src/eval/types.js';
import { RunnerError } from '../../src/utils/errors.js';
import { cleanupTrees, makeTree } from '../helpers.js';

afterEach(cleanupTrees);

const evalCase = (raw: unknown): EvalCase => EvalCaseSchema.parse(raw);

/**
 * Runner returning canned results per prompt.
 */
class CannedRunner implements AgentRunner {
  readonly requests: RunRequest[] = [];
  private results: Map<string, RunResult | Error>;
  private delays: Map<string, number>;

  constructor(results: Record<string, RunResult | Error>, delays: Record<string, number> = {}) {
    this.results = new Map(Object.entries(results));
    this.delays = new Map(Object.entries(delays));
  }

  async run(request: RunRequest): Promise<RunResult> {
    this.requests.push(request);
    await new Promise(resolve => setTimeout(resolve, this.delays.get(request.prompt) ?? 0));
    const result = this.results.get(request.prompt);
    if (result === undefined) {
      throw new Error(`no canned result for ${request.prompt}`);
    }
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

describe('scoreRun', () => {
  it('passes a skill-driven run that produced its file', async () => {
    const workspace = await makeTree({ 'out/report.txt': 'report' });
    const result = await scoreRun(
      evalCase({
        id: 'report',
        prompt: 'Make the report',
        expect: { skill_used: true, must_run: ['scripts/report.sh'], files: ['out/report.txt'] },
      }),
      {
        workspace_dir: workspace,
        final_text: 'Report written to out/report.txt',
        tool_calls: [
          { type: 'read', call_id: 'c1', path: 'skills/report/SKILL.md', ok: true },
          { type: 'shell', call_id: 'c2', command: 'sh skills/report/scripts/report.sh', exit_code: 0, ok: true },
        ],
      }
    );

    expect(result).toEqual({
      id: 'report',
      passed: true,
      checks: [
        { name: 'routing.skill_used', passed: true, got: true, want: true },
        { name: 'process.must_run', passed: true, pattern: 'scripts/report.sh' },
        { name: 'outcome.file_exists', passed: true, file: 'out/report.txt' },
      ],
      final_text_excerpt: 'Report written to out/report.txt',
    });
  });

  it('fails a run that executed a forbidden command', async () => {
    const workspace = await makeTree();
    const result = await scoreRun(
      evalCase({ id: 'no-tests', prompt: 'Explain the code', expect: { must_not_run: ['pytest'] } }),
      {
        workspace_dir: workspace,
        final_text: 'Here is the explanation',
        tool_calls: [{ type: 'shell', call_id: 'c1', command: 'pytest -q', exit_code: 1, ok: true }],
      }
    );

    expect(result.passed).toBe(false);
    expect(result.checks).toEqual([{ name: 'process.must_not_run', passed: false, pattern: 'pytest' }]);
  });

  it('reports a wrong routing decision with what was observed', async () => {
    const workspace = await makeTree();
    const result = await scoreRun(
      evalCase({ id: 'no-skill', prompt: 'Say hi', expect: { skill_used: false } }),
      {
        workspace_dir: workspace,
        final_text: 'hi',
        tool_calls: [{ type: 'read', call_id: 'c1', path: 'skills/greet/SKILL.md', ok: true }],
      }
    );

    expect(result.checks).toEqual([{ name: 'routing.skill_used', passed: false, got: true, want: false }]);
  });

  it('passes a case without expectations and trims the excerpt', async () => {
    const workspace = await makeTree();
    const result = await scoreRun(evalCase({ id: 'free', prompt: 'anything' }), {
      workspace_dir: workspace,
      final_text: 'a'.repeat(500),
      tool_calls: [],
    });

    expect(result.passed).toBe(true);
    expect(result.checks).toEqual([]);
    expect(result.final_text_excerpt).toBe('a'.repeat(400));
  });
});

describe('evaluateCase', () => {
  it('records a failed run as a runner check', async () => {
    const runner = new CannedRunner({ crash: new RunnerError('Agent run exited with code 2', 2, 'boom') });

    const result = await evaluateCase(evalCase({ id: 'crash', prompt: 'crash' }), runner, {
      workdir: '/tmp/template',
      skillsDir: 'skills/',
    });

    expect(result).toEqual({
      id: 'crash',
      passed: false,
      checks: [{ name: 'runner', passed: false, error: 'Agent run exited with code 2', exit_code: 2, stderr: 'boom' }],
      final_text_excerpt: '',
    });
    expect(runner.requests).toEqual([{ workdir: '/tmp/template', skillsDir: 'skills/', prompt: 'crash' }]);
  });
});

describe('runEvals', () => {
  it('aggregates results and keeps going after a failed run', async () => {
    const workspace = await makeTree({ 'done.txt': 'x' });
    const runner = new CannedRunner({
      first: { workspace_dir: workspace, final_text: 'ok', tool_calls: [] },
      second: new RunnerError('Agent run printed invalid JSON', 0),
      third: { workspace_dir: workspace, final_text: 'ok', tool_calls: [] },
    });
    const cases = [
      evalCase({ id: 'one', prompt: 'first', expect: { files: ['done.txt'] } }),
      evalCase({ id: 'two', prompt: 'second' }),
      evalCase({ id: 'three', prompt: 'third', expect: { files: ['missing.txt'] } }),
    ];

    const report = await runEvals(cases, runner, { workdir: '/tmp/template', skillsDir: 'skills/' });

    expect(report.total).toBe(3);
    expect(report.passed).toBe(1);
    expect(report.results.map(result => [result.id, result.passed])).toEqual([
      ['one', true],
      ['two', false],
      ['three', false],
    ]);
    expect(report.results[1].checks[0]).toMatchObject({ name: 'runner', exit_code: 0 });
  });

  it('keeps case order when running concurrently', async () => {
    const workspace = await makeTree();
    const run = (text: string): RunResult => ({ workspace_dir: workspace, final_text: text, tool_calls: [] });
    const runner = new CannedRunner(
      { slow: run('slow'), medium: run('medium'), fast: run('fast') },
      { slow: 60, medium: 30, fast: 0 }
    );
    const cases = ['slow', 'medium', 'fast'].map(prompt => evalCase({ id: prompt, prompt }));

    const report = await runEvals(cases, runner, { workdir: '/tmp/template', skillsDir: 'skills/', concurrency: 3 });

    expect(report.results.map(result => result.final_text_excerpt)).toEqual(['slow', 'medium', 'fast']);
    expect(runner.requests.map(request => request.prompt)).toEqual(['slow', 'medium', 'fast']);
  });

  it('reports an empty batch as all passed', async () => {
    const report = await runEvals([], new CannedRunner({}), { workdir: '/tmp/template', skillsDir: 'skills/' });
    expect(report).toEqual({ passed: 0, total: 0, results: [] });
  });
});
