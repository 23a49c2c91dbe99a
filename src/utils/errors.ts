export class SkillbenchError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'SkillbenchError';
  }
}

export class ConfigurationError extends SkillbenchError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ModelError extends SkillbenchError {
  constructor(message: string, public modelName?: string, public status?: number) {
    super(message, 'MODEL_ERROR');
    this.name = 'ModelError';
  }
}

export class WorkspaceError extends SkillbenchError {
  constructor(message: string) {
    super(message, 'WORKSPACE_ERROR');
    this.name = 'WorkspaceError';
  }
}

/**
 * A relative path that would resolve outside the workspace root.
 */
export class PathConfinementError extends WorkspaceError {
  constructor(public requestedPath: string) {
    super(`Path escapes the workspace: ${requestedPath}`);
    this.code = 'PATH_CONFINEMENT';
    this.name = 'PathConfinementError';
  }
}

export class MissingFileError extends WorkspaceError {
  constructor(public requestedPath: string) {
    super(`File not found: ${requestedPath}`);
    this.code = 'FILE_NOT_FOUND';
    this.name = 'MissingFileError';
  }
}

/**
 * The agent-run child process exited non-zero or printed something that is
 * not a run result.
 */
export class RunnerError extends SkillbenchError {
  constructor(
    message: string,
    public exitCode: number | null,
    public stderr: string = '',
    public stdout: string = ''
  ) {
    super(message, 'RUNNER_ERROR');
    this.name = 'RunnerError';
  }
}

export class EvalCaseError extends SkillbenchError {
  constructor(message: string, public line?: number) {
    super(message, 'EVAL_CASE_ERROR');
    this.name = 'EvalCaseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
