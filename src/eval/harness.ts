/**
 * Eval Harness
 *
 * Runs each case through an AgentRunner, scores the trace and the resulting
 * workspace, and aggregates a pass/fail report.
 */

import { RunnerError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { fileExists, skillWasUsed, traceContainsCommand } from './checks.js';
import type { AgentRunner } from './runner-client.js';
import type { CheckResult, EvalCase, EvalReport, EvalResult, RunResult } from './types.js';

export const EXCERPT_CHARS = 400;

export interface EvalOptions {
  /** Template directory each case starts from */
  workdir: string;
  skillsDir: string;
  /** Cases run at the same time; results keep case order */
  concurrency?: number;
}

/**
 * Score a finished run against a case's expectations. A case with no
 * expectations passes.
 */
export async function scoreRun(evalCase: EvalCase, run: RunResult): Promise<EvalResult> {
  const expect = evalCase.expect;
  const checks: CheckResult[] = [];

  if (expect.skill_used !== undefined) {
    const got = skillWasUsed(run.tool_calls);
    checks.push({ name: 'routing.skill_used', passed: got === expect.skill_used, got, want: expect.skill_used });
  }

  for (const pattern of expect.must_run) {
    checks.push({ name: 'process.must_run', passed: traceContainsCommand(run.tool_calls, pattern), pattern });
  }

  for (const pattern of expect.must_not_run) {
    checks.push({ name: 'process.must_not_run', passed: !traceContainsCommand(run.tool_calls, pattern), pattern });
  }

  for (const file of expect.files) {
    checks.push({ name: 'outcome.file_exists', passed: await fileExists(run.workspace_dir, file), file });
  }

  return {
    id: evalCase.id,
    passed: checks.every(check => check.passed),
    checks,
    final_text_excerpt: run.final_text.slice(0, EXCERPT_CHARS),
  };
}

/**
 * Run one case. A failed run is recorded as a failing `runner` check rather
 * than aborting the batch.
 */
export async function evaluateCase(
  evalCase: EvalCase,
  runner: AgentRunner,
  options: EvalOptions
): Promise<EvalResult> {
  let run: RunResult;
  try {
    run = await runner.run({ workdir: options.workdir, skillsDir: options.skillsDir, prompt: evalCase.prompt });
  } catch (error) {
    logger.warn(`Case ${evalCase.id}: run failed: ${errorMessage(error)}`);
    return {
      id: evalCase.id,
      passed: false,
      checks: [
        {
          name: 'runner',
          passed: false,
          error: errorMessage(error),
          exit_code: error instanceof RunnerError ? error.exitCode : null,
          stderr: error instanceof RunnerError ? error.stderr : '',
        },
      ],
      final_text_excerpt: '',
    };
  }

  const result = await scoreRun(evalCase, run);
  logger.debug(`Case ${evalCase.id}: ${result.passed ? 'passed' : 'failed'} (${run.workspace_dir})`);
  return result;
}

export async function runEvals(
  cases: readonly EvalCase[],
  runner: AgentRunner,
  options: EvalOptions
): Promise<EvalReport> {
  const results = new Array<EvalResult>(cases.length);
  const concurrency = Math.max(1, options.concurrency ?? 1);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < cases.length) {
      const index = next++;
      results[index] = await evaluateCase(cases[index], runner, options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, cases.length) }, () => worker()));

  const passed = results.filter(result => result.passed).length;
  return { passed, total: results.length, results };
}
