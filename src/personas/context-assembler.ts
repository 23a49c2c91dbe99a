/**
 * Budgeted concatenation of labeled text sources.
 *
 * Sources are read in the order given and wrapped in START/END markers. The
 * first chunk that would push the emitted text past the budget is dropped
 * together with everything after it; committed chunks are never shortened.
 * The budget covers the introduction as well, so the returned text is never
 * longer than `maxChars`.
 */

import type { Workspace } from '../core/workspace.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AssembledContext, ContextChunk } from './types.js';

export interface SourceFile {
  path: string;
  content: string;
}

export interface AssembleOptions<M> {
  /** Marker label, upper case by convention */
  label: string;
  /** Leading instructions placed before the first chunk */
  introduction: string;
  maxChars: number;
  /** Human-readable name of the source */
  displayName: (source: SourceFile) => string;
  /** Title printed in both markers; the display name when omitted */
  markerTitle?: (source: SourceFile, displayName: string) => string;
  /**
   * Metadata for a readable source. `emitted` tells whether its chunk made it
   * into the text. Return undefined to record nothing.
   */
  describe: (source: SourceFile, emitted: boolean) => M | undefined;
  /**
   * Keep reading sources after the cutoff so `describe` sees every one of
   * them. Off by default: reading stops at the cutoff.
   */
  describeAfterCutoff?: boolean;
}

export function formatChunk(label: string, title: string, content: string): string {
  const header = `\n\n===== ${label} START: ${title} =====\n`;
  const footer = `\n===== ${label} END: ${title} =====\n`;
  return header + content + footer;
}

export async function assembleContext<M>(
  workspace: Workspace,
  paths: readonly string[],
  options: AssembleOptions<M>
): Promise<AssembledContext<M>> {
  const chunks: ContextChunk[] = [];
  const metadata: M[] = [];
  let used = options.introduction.length;
  let cutoff = false;

  for (const path of paths) {
    if (cutoff && !options.describeAfterCutoff) {
      break;
    }

    let content: string;
    try {
      content = await workspace.read(path);
    } catch (error) {
      logger.debug(`Skipping ${options.label.toLowerCase()} source ${path}: ${errorMessage(error)}`);
      continue;
    }

    const source: SourceFile = { path, content };
    let emitted = false;

    if (!cutoff) {
      const displayName = options.displayName(source);
      const title = options.markerTitle ? options.markerTitle(source, displayName) : displayName;
      const text = formatChunk(options.label, title, content);

      if (used + text.length > options.maxChars) {
        cutoff = true;
        logger.debug(`${options.label} budget of ${options.maxChars} chars reached at ${path}`);
      } else {
        chunks.push({ sourceLabel: options.label, path, displayName, text });
        used += text.length;
        emitted = true;
      }
    }

    const entry = options.describe(source, emitted);
    if (entry !== undefined) {
      metadata.push(entry);
    }
  }

  const text = chunks.length > 0
    ? options.introduction + chunks.map(chunk => chunk.text).join('')
    : '';

  return { text, chunks, metadata };
}
