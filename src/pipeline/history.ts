/**
 * Bounded conversation history (oldest turns evicted first)
 */

import type { ConversationTurn } from './types.js';

export class ConversationHistory {
  private entries: ConversationTurn[] = [];

  constructor(private readonly depth: number) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`History depth must be a positive integer, got ${depth}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Append a turn, then drop the oldest ones beyond the depth limit
   */
  append(turn: ConversationTurn): void {
    this.entries.push(Object.freeze({ query: turn.query, answer: turn.answer }));
    if (this.entries.length > this.depth) {
      this.entries = this.entries.slice(-this.depth);
    }
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Oldest first
   */
  turns(): readonly ConversationTurn[] {
    return [...this.entries];
  }
}
