/**
 * Answer Pipeline - Main Entry Point
 */

import type { SessionConfig } from './types.js';
import { Session } from './session.js';
import type { SessionDeps } from './session.js';
import { duckDuckGo } from './search.js';
import { extractSource } from './extractors/index.js';
import { streamCompletion } from './synthesis.js';

// Re-export types
export * from './types.js';
export * from './errors.js';

export { classifyQuery, extractVideoId, toSource, DEFAULT_VIDEO_QUERY } from './classify.js';
export { assemblePrompt, buildContext, renderHistory, SOURCE_DELIMITER } from './assemble.js';
export { ConversationHistory } from './history.js';
export { Session } from './session.js';
export type { SessionDeps, Synthesizer, TurnOptions } from './session.js';
export { duckDuckGo } from './search.js';
export type { SearchProvider } from './search.js';
export { createExtractor, extractSource } from './extractors/index.js';
export type { ExtractorOptions } from './extractors/index.js';
export { youtubeTranscripts } from './transcript.js';
export type { TranscriptBackend } from './transcript.js';
export { streamCompletion, checkOllamaHealth } from './synthesis.js';
export type { SynthesisOptions } from './synthesis.js';

/**
 * Session wired to DuckDuckGo, the live extractors and Ollama
 */
export function createSession(config: SessionConfig, overrides: Partial<SessionDeps> = {}): Session {
  return new Session(config, {
    search: duckDuckGo,
    extract: extractSource,
    synthesize: (prompt, signal) => streamCompletion(prompt, { signal }),
    ...overrides,
  });
}
