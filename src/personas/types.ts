/**
 * Types shared by the context, persona and skill loaders
 */

/**
 * One labeled source committed to a bundle.
 */
export interface ContextChunk {
  /** Marker label, e.g. SKILL, CONTEXT or PERSONALITY */
  sourceLabel: string;
  /** Workspace-relative path with forward slashes */
  path: string;
  /** Human-readable title shown in the markers */
  displayName: string;
  /** Full chunk text including the start/end markers */
  text: string;
}

/**
 * Result of one assembly: the injected text plus what went into it.
 */
export interface AssembledContext<M> {
  /** Introduction followed by every committed chunk; empty when nothing fit */
  text: string;
  chunks: ContextChunk[];
  metadata: M[];
}

/**
 * Metadata for a discovered SKILL.md. Recorded even when the budget cut the
 * skill's text out of the bundle.
 */
export interface SkillMetadata {
  path: string;
  /** Frontmatter name, empty when the file has none */
  name: string;
}

/**
 * Metadata for a context or persona file whose text made it into the bundle.
 */
export interface ContextFileMetadata {
  path: string;
  chars: number;
}

export const DEFAULT_MAX_CONTEXT_CHARS = 200_000;
