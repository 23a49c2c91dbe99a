/**
 * Eval case, run result and report shapes
 */

import { z } from 'zod';
import { ToolCallRecordSchema } from '../tools/types.js';

export const ExpectationsSchema = z.object({
  skill_used: z.boolean().optional(),
  must_run: z.array(z.string()).default([]),
  must_not_run: z.array(z.string()).default([]),
  files: z.array(z.string()).default([]),
});

export const EvalCaseSchema = z.object({
  id: z.string().min(1),
  prompt: z.string(),
  expect: ExpectationsSchema.default({}),
});

/**
 * What an agent run prints on stdout for the harness.
 */
export const RunResultSchema = z.object({
  workspace_dir: z.string().min(1),
  final_text: z.string().default(''),
  tool_calls: z.array(ToolCallRecordSchema).default([]),
});

export type Expectations = z.infer<typeof ExpectationsSchema>;
export type EvalCase = z.infer<typeof EvalCaseSchema>;
export type RunResult = z.infer<typeof RunResultSchema>;

export type CheckResult =
  | { name: 'routing.skill_used'; passed: boolean; got: boolean; want: boolean }
  | { name: 'process.must_run' | 'process.must_not_run'; passed: boolean; pattern: string }
  | { name: 'outcome.file_exists'; passed: boolean; file: string }
  | { name: 'runner'; passed: false; error: string; exit_code: number | null; stderr: string };

export interface EvalResult {
  id: string;
  passed: boolean;
  checks: CheckResult[];
  final_text_excerpt: string;
}

export interface EvalReport {
  passed: number;
  total: number;
  results: EvalResult[];
}
