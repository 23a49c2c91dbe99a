/**
 * Workspace Sandbox
 *
 * An ephemeral directory an agent run works in. Relative paths are confined to
 * the root and shell commands run with the root as their working directory.
 * Confinement is best effort: symlinks inside the tree are not resolved.
 */

import { access, cp, mkdir, mkdtemp, readFile, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import {
  MissingFileError,
  PathConfinementError,
  WorkspaceError,
  errorMessage,
} from '../utils/errors.js';
import { execCommand } from '../utils/exec.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceOptions {
  /**
   * Environment handed to every shell command. Defaults to a copy of
   * `process.env` taken when the workspace is opened.
   */
  env?: NodeJS.ProcessEnv;
}

export interface CreateWorkspaceOptions extends WorkspaceOptions {
  /** Parent directory for the copy; the OS temp dir when omitted. */
  parentDir?: string;
  prefix?: string;
}

export interface ShellResult {
  command: string;
  exit_code: number;
  stdout: string;
  stderr: string;
}

const LEADING_SEPARATORS = /^[\\/]+/;

export class Workspace {
  readonly root: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(root: string, options: WorkspaceOptions = {}) {
    this.root = resolve(root);
    this.env = { ...(options.env ?? process.env) };
  }

  /**
   * Copy a template tree into a fresh temp directory and open it.
   */
  static async create(templateDir: string, options: CreateWorkspaceOptions = {}): Promise<Workspace> {
    const source = resolve(templateDir);

    let isDirectory = false;
    try {
      isDirectory = (await stat(source)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) {
      throw new WorkspaceError(`Workspace template is not a directory: ${source}`);
    }

    const parent = options.parentDir ?? tmpdir();
    const root = await mkdtemp(join(parent, options.prefix ?? 'skillbench-'));
    await cp(source, root, { recursive: true });

    logger.debug(`Created workspace ${root} from ${source}`);
    return new Workspace(root, options);
  }

  /**
   * Resolve a model-supplied path inside the root. Leading separators are
   * dropped so absolute-looking paths land under the root; anything that
   * still resolves outside it is rejected.
   */
  resolvePath(relPath: string): string {
    const cleaned = relPath.replace(LEADING_SEPARATORS, '');
    const resolved = resolve(this.root, cleaned);
    const rel = relative(this.root, resolved);

    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new PathConfinementError(relPath);
    }
    return resolved;
  }

  /**
   * Root-relative path with forward slashes, as reported in traces and metadata.
   */
  toRelative(absPath: string): string {
    return relative(this.root, absPath).split(sep).join('/');
  }

  async read(relPath: string): Promise<string> {
    const absPath = this.resolvePath(relPath);
    try {
      return await readFile(absPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new MissingFileError(relPath);
      }
      throw new WorkspaceError(`Cannot read ${relPath}: ${errorMessage(error)}`);
    }
  }

  async write(relPath: string, content: string): Promise<string> {
    const absPath = this.resolvePath(relPath);
    await mkdir(dirname(absPath), { recursive: true });
    await writeFile(absPath, content, 'utf-8');
    return `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${relPath}`;
  }

  async exists(relPath: string): Promise<boolean> {
    try {
      await access(this.resolvePath(relPath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Run a shell command in the root. A non-zero exit is a normal result.
   * No timeout is applied: a command that never exits blocks the caller.
   */
  async run(command: string): Promise<ShellResult> {
    const { stdout, stderr, code } = await execCommand(command, [], {
      cwd: this.root,
      env: this.env,
      shell: true,
    });
    return { command, exit_code: code, stdout, stderr };
  }
}
