/**
 * Conversation state
 *
 * Append-only list of items sent to the model. The leading system messages
 * form the preamble; `reset` drops everything after them.
 */

import { ConversationItem, systemMessage } from '../models/base.js';

export class Conversation {
  private items: ConversationItem[];
  private readonly preambleLength: number;

  constructor(preamble: readonly string[] = []) {
    this.items = preamble
      .filter(text => text.trim().length > 0)
      .map(text => systemMessage(text));
    this.preambleLength = this.items.length;
  }

  append(...items: ConversationItem[]): void {
    this.items.push(...items);
  }

  reset(): void {
    this.items = this.items.slice(0, this.preambleLength);
  }

  /**
   * Snapshot of every item, preamble included.
   */
  getItems(): ConversationItem[] {
    return [...this.items];
  }

  getPreamble(): ConversationItem[] {
    return this.items.slice(0, this.preambleLength);
  }

  get length(): number {
    return this.items.length;
  }
}
