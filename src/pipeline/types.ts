/**
 * Pipeline Types
 */

import type { PipelineError, RetrievalError, StreamError } from './errors.js';

export type SourceKind = 'video' | 'document';

export interface Source {
  url: string;
  kind: SourceKind;
  videoId?: string;
}

export interface ClassifiedQuery {
  /** Text exactly as the user typed it */
  original: string;
  videoUrl?: string;
  /** Text handed to the prompt template */
  effective: string;
}

export type ExtractionFailureReason =
  | 'invalid_url'
  | 'network_error'
  | 'http_error'
  | 'unsupported_type'
  | 'parse_error'
  | 'empty_content'
  | 'transcript_unavailable'
  | 'unknown';

export type ExtractionResult =
  | { success: true; url: string; kind: SourceKind; text: string }
  | {
      success: false;
      url: string;
      kind: SourceKind;
      reason: ExtractionFailureReason;
      error: string;
    };

export type Extractor = (source: Source, signal?: AbortSignal) => Promise<ExtractionResult>;

export interface ConversationTurn {
  readonly query: string;
  readonly answer: string;
}

export interface StreamChunk {
  text: string;
  /** Set on the chunk carried by the completion record */
  done: boolean;
}

export interface SessionConfig {
  maxResults: number;
  historyDepth: number;
  historyEnabled: boolean;
  extractConcurrency: number;
}

export type TurnOutcome =
  | { status: 'answered'; query: ClassifiedQuery; answer: string; sources: string[] }
  | { status: 'no_results'; query: ClassifiedQuery }
  | { status: 'retrieval_failed'; query: ClassifiedQuery; error: RetrievalError }
  | { status: 'no_content'; query: ClassifiedQuery; attempted: string[] }
  | {
      status: 'stream_failed';
      query: ClassifiedQuery;
      error: StreamError;
      partial: string;
      sources: string[];
    }
  | {
      status: 'cancelled';
      query: ClassifiedQuery;
      partial: string;
      sources: string[];
      error?: PipelineError;
    };
