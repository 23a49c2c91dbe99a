import { readFile } from 'fs/promises';
import { z } from 'zod';
import { EvalCaseError, errorMessage } from '../utils/errors.js';
import { EvalCase, EvalCaseSchema } from './types.js';

/**
 * Parse JSON Lines eval cases. Blank lines are skipped; any other line that
 * is not a valid case fails the whole file.
 */
export function parseCases(text: string): EvalCase[] {
  const cases: EvalCase[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;
    const lineNumber = index + 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new EvalCaseError(`Line ${lineNumber}: invalid JSON: ${errorMessage(error)}`, lineNumber);
    }

    const parsed = EvalCaseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EvalCaseError(`Line ${lineNumber}: ${describeIssues(parsed.error)}`, lineNumber);
    }
    cases.push(parsed.data);
  });

  return cases;
}

export async function loadCases(path: string): Promise<EvalCase[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new EvalCaseError(`Cannot read cases file ${path}: ${errorMessage(error)}`);
  }
  return parseCases(text);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`)
    .join('; ');
}
