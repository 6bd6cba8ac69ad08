/**
 * YouTube transcript retrieval via the youtube-transcript package
 */

import { YoutubeTranscript } from 'youtube-transcript';
import { decode } from 'entities';
import { cleanLines } from './text.js';
import { describeError } from './errors.js';
import { abortable } from './http.js';
import { TRANSCRIPT_MARKER } from './prompts.js';
import { logger } from '../logger.js';

const PREFERRED_LANGUAGE = 'en';

export interface TranscriptBackend {
  /** Resolve the transcript text for a video, or reject (also once signal aborts) */
  fetchTranscript(videoId: string, signal?: AbortSignal): Promise<string>;
}

interface Segment {
  text: string;
  lang?: string;
}

/**
 * English first; otherwise whatever track YouTube serves by default
 */
async function fetchSegments(videoId: string, signal?: AbortSignal): Promise<Segment[]> {
  signal?.throwIfAborted();
  try {
    const segments = await abortable(
      YoutubeTranscript.fetchTranscript(videoId, { lang: PREFERRED_LANGUAGE }),
      signal,
    );
    logger.info('Found English transcript', videoId);
    return segments;
  } catch (err) {
    if (signal?.aborted) {
      throw err;
    }
    logger.info('No English transcript available, trying any available transcript', videoId);
    logger.debug(describeError(err));
  }

  const segments = await abortable(YoutubeTranscript.fetchTranscript(videoId), signal);
  const lang = segments.find((s) => s.lang)?.lang;
  logger.info(`Using transcript in language: ${lang ?? 'unknown'}`, videoId);
  return segments;
}

/**
 * Join caption segments into plain text. Caption text arrives escaped
 * twice (`&amp;#39;`), hence the double decode.
 */
export function formatTranscript(videoId: string, segments: Segment[]): string {
  const text = cleanLines(
    segments
      .map((s) => decode(decode(s.text)).trim())
      .filter(Boolean)
      .join('\n'),
  );
  return `${TRANSCRIPT_MARKER} [video_id: ${videoId}]:\n\n${text}`;
}

export const youtubeTranscripts: TranscriptBackend = {
  async fetchTranscript(videoId: string, signal?: AbortSignal): Promise<string> {
    const segments = await fetchSegments(videoId, signal);
    if (segments.length === 0 || segments.every((s) => !s.text.trim())) {
      throw new Error(`Transcript for ${videoId} is empty`);
    }
    return formatTranscript(videoId, segments);
  },
};
