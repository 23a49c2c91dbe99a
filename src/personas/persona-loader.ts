/**
 * Context and persona loaders - caller-ordered markdown files (AGENTS.md,
 * SOUL.md, ...) injected as system instructions
 */

import type { Workspace } from '../core/workspace.js';
import { assembleContext } from './context-assembler.js';
import { AssembledContext, ContextFileMetadata, DEFAULT_MAX_CONTEXT_CHARS } from './types.js';

const CONTEXT_INTRODUCTION =
  'You have the following context definitions. ' +
  'Follow these instructions to shape your responses.\n' +
  'Context definitions are provided below delimited by CONTEXT START/END markers.';

const PERSONA_INTRODUCTION =
  'You have the following personality/persona definitions. ' +
  'Follow these instructions to shape your responses.\n' +
  'Personality definitions are provided below delimited by PERSONALITY START/END markers.';

async function buildFileContext(
  workspace: Workspace,
  files: readonly string[],
  label: string,
  introduction: string,
  maxChars: number
): Promise<AssembledContext<ContextFileMetadata>> {
  return assembleContext<ContextFileMetadata>(workspace, files, {
    label,
    introduction,
    maxChars,
    displayName: source => source.path,
    describe: (source, emitted) =>
      emitted ? { path: source.path, chars: source.content.length } : undefined,
  });
}

/**
 * Generic context files, in the order given. Missing files are skipped.
 */
export function buildContext(
  workspace: Workspace,
  files: readonly string[],
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): Promise<AssembledContext<ContextFileMetadata>> {
  return buildFileContext(workspace, files, 'CONTEXT', CONTEXT_INTRODUCTION, maxChars);
}

/**
 * Persona definition files, in the order given. Missing files are skipped.
 */
export function buildPersonaContext(
  workspace: Workspace,
  files: readonly string[],
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): Promise<AssembledContext<ContextFileMetadata>> {
  return buildFileContext(workspace, files, 'PERSONALITY', PERSONA_INTRODUCTION, maxChars);
}

/**
 * Split a comma-separated file list as accepted on the command line.
 */
export function parseFileList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}
