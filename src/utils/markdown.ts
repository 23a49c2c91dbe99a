/**
 * Terminal rendering for agent answers. Plain prose is printed as-is; anything
 * the markdown lexer sees structure in goes through marked-terminal.
 */

import { Lexer, Marked, type Token } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export const EMPTY_ANSWER = '(no text response)';

const MAX_WIDTH = 100;

// Token types that carry no formatting of their own.
const PLAIN_TOKENS = new Set(['paragraph', 'text', 'space', 'escape']);

const renderer = new Marked(
  markedTerminal({
    width: Math.min(process.stdout.columns ?? MAX_WIDTH, MAX_WIDTH),
    showSectionPrefix: false,
    tab: 2,
  })
);

function containsMarkup(tokens: Token[]): boolean {
  return tokens.some(token => {
    if (!PLAIN_TOKENS.has(token.type)) return true;
    const children = 'tokens' in token ? token.tokens : undefined;
    return Array.isArray(children) && containsMarkup(children);
  });
}

export function hasMarkup(text: string): boolean {
  return containsMarkup(Lexer.lex(text));
}

/**
 * Text of an answer ready for the terminal.
 */
export function formatAnswer(text: string): string {
  if (text.trim().length === 0) return EMPTY_ANSWER;
  if (!hasMarkup(text)) return text;

  try {
    const rendered = renderer.parse(text);
    return typeof rendered === 'string' ? rendered.trimEnd() : text;
  } catch (error) {
    logger.debug(`Markdown rendering failed: ${errorMessage(error)}`);
    return text;
  }
}
