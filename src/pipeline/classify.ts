/**
 * Query classification: direct YouTube reference vs. general web query
 */

import type { ClassifiedQuery, Source } from './types.js';
import { withProtocol } from './text.js';

/**
 * Matches youtube.com, youtu.be and youtube-nocookie.com links, with or
 * without scheme and www. Group 6 is the 11-character video id.
 */
const YOUTUBE_URL =
  /^(https?:\/\/)?(www\.)?(youtube|youtu|youtube-nocookie)\.(com|be)\/(watch\?v=|embed\/|v\/|.+\?v=)?([^&=%?]{11})/;

/** Remainders that mean nothing more than "summarize it" */
const SUMMARIZE_SYNONYMS = ['summarize', 'summarise', 'summary'];

export const DEFAULT_VIDEO_QUERY =
  'Provide a detailed summary of this video, covering all main points and key information in a comprehensive way';

/**
 * Extract video ID from a YouTube URL
 */
export function extractVideoId(url: string): string | null {
  const match = YOUTUBE_URL.exec(url);
  return match ? match[6] : null;
}

/**
 * Split a query into an optional video URL and the text to answer.
 * Only the first video link is honoured; later ones stay in the text.
 */
export function classifyQuery(query: string): ClassifiedQuery {
  for (const token of query.split(/\s+/)) {
    if (!token || !extractVideoId(token)) {
      continue;
    }

    let effective = query.split(token).join('').trim();
    if (!effective || SUMMARIZE_SYNONYMS.includes(effective.toLowerCase())) {
      effective = DEFAULT_VIDEO_QUERY;
    }
    return { original: query, videoUrl: token, effective };
  }

  return { original: query, effective: query };
}

/**
 * Build a retrieval target from a URL, detecting YouTube videos
 */
export function toSource(url: string): Source {
  const normalized = withProtocol(url);
  const videoId = extractVideoId(normalized);
  if (videoId) {
    return { url: normalized, kind: 'video', videoId };
  }
  return { url: normalized, kind: 'document' };
}
