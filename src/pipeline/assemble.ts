/**
 * Prompt assembly from extracted sources and conversation history
 */

import type { ConversationTurn, ExtractionResult } from './types.js';
import { contextAnswerPrompt, TRANSCRIPT_MARKER, videoSummaryPrompt } from './prompts.js';

export const SOURCE_DELIMITER = '\n\n---\n\n';

export interface AssembleOptions {
  historyEnabled: boolean;
}

/**
 * Join successful extractions in source order
 */
export function buildContext(results: readonly ExtractionResult[]): string {
  return results
    .flatMap((r) => (r.success ? [r.text] : []))
    .join(SOURCE_DELIMITER);
}

/**
 * Render prior turns; empty string when there is nothing to include
 */
export function renderHistory(history: readonly ConversationTurn[], enabled: boolean): string {
  if (!enabled || history.length === 0) {
    return '';
  }
  const turns = history.map((t) => `User: ${t.query}\nAssistant: ${t.answer}\n\n`).join('');
  return `CONVERSATION HISTORY:\n${turns}---\n\n`;
}

/**
 * Build the full prompt for a turn. Deterministic for identical inputs.
 */
export function assemblePrompt(
  query: string,
  results: readonly ExtractionResult[],
  history: readonly ConversationTurn[],
  options: AssembleOptions,
): string {
  const context = buildContext(results);
  const parts = {
    history: renderHistory(history, options.historyEnabled),
    context,
    query,
  };
  return context.includes(TRANSCRIPT_MARKER) ? videoSummaryPrompt(parts) : contextAnswerPrompt(parts);
}
