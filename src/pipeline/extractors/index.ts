/**
 * Content extractors for different source kinds
 */

import type { Extractor, ExtractionResult, Source, SourceKind } from '../types.js';
import type { TranscriptBackend } from '../transcript.js';
import { youtubeTranscripts } from '../transcript.js';
import { extractDocument } from './document.js';
import { extractVideo } from './video.js';
import { config } from '../../config.js';
import { logger } from '../../logger.js';

export { extractDocument, extractMarkup } from './document.js';
export { extractVideo, fetchVideoMetadata } from './video.js';
export type { VideoMetadata } from './video.js';

export interface ExtractorOptions {
  /** Per-source character cap */
  maxLength: number;
  timeoutMs: number;
  userAgent: string;
  transcripts: TranscriptBackend;
}

/**
 * Map of extractors by source kind
 */
const EXTRACTORS: Record<
  SourceKind,
  (source: Source, options: ExtractorOptions, signal?: AbortSignal) => Promise<ExtractionResult>
> = {
  video: extractVideo,
  document: extractDocument,
};

/**
 * Build an extractor bound to a fixed set of options
 */
export function createExtractor(overrides: Partial<ExtractorOptions> = {}): Extractor {
  const options: ExtractorOptions = {
    maxLength: config.MAX_LEN_PER_SOURCE,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    userAgent: config.USER_AGENT,
    transcripts: youtubeTranscripts,
    ...overrides,
  };

  return async (source, signal) => {
    let result: ExtractionResult;
    try {
      result = await EXTRACTORS[source.kind](source, options, signal);
    } catch (err) {
      logger.error('Extraction failed unexpectedly', source.url, err);
      result = { success: false, url: source.url, kind: source.kind, reason: 'unknown', error: String(err) };
    }

    if (result.success) {
      logger.info(`Successfully extracted text from ${source.url} (length: ${result.text.length})`);
    } else {
      logger.info(`Failed to extract text from ${source.url} (${result.reason})`);
    }
    return result;
  };
}

/**
 * Extract a source using the environment configuration
 */
export const extractSource: Extractor = createExtractor();
