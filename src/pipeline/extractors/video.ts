/**
 * YouTube video extraction: transcript plus best-effort page metadata
 */

import { JSDOM } from 'jsdom';
import type { ExtractionResult, Source } from '../types.js';
import type { ExtractorOptions } from './index.js';
import { fetchPage } from '../http.js';
import { truncate } from '../text.js';
import { describeError } from '../errors.js';
import { logger } from '../../logger.js';

export interface VideoMetadata {
  title: string;
  description: string;
}

const UNKNOWN_TITLE = 'Unknown YouTube Video';

/**
 * Fetch the watch page for its title and description.
 * Resolves null when the page cannot be fetched or parsed.
 */
export async function fetchVideoMetadata(
  url: string,
  options: Pick<ExtractorOptions, 'timeoutMs' | 'userAgent'>,
  signal?: AbortSignal,
): Promise<VideoMetadata | null> {
  try {
    const page = await fetchPage(url, { ...options, signal });
    if (!page.ok) {
      throw new Error(`HTTP ${page.status} ${page.statusText}`);
    }

    const doc = new JSDOM(page.body).window.document;
    const title = doc.querySelector('title')?.textContent?.trim() || UNKNOWN_TITLE;
    const content = doc.querySelector('meta[name="description"]')?.getAttribute('content')?.trim();

    return {
      title,
      description: content ? `Video Description: ${content}` : '',
    };
  } catch (err) {
    logger.warn('Failed to fetch YouTube page metadata', url, describeError(err));
    return null;
  }
}

/**
 * Extract a video source. The transcript is required; metadata only
 * decorates it.
 */
export async function extractVideo(
  source: Source,
  options: ExtractorOptions,
  signal?: AbortSignal,
): Promise<ExtractionResult> {
  const { url, kind, videoId } = source;
  if (!videoId) {
    return { success: false, url, kind, reason: 'invalid_url', error: 'No video ID in URL' };
  }

  if (signal?.aborted) {
    return { success: false, url, kind, reason: 'network_error', error: 'Interrupted before fetching' };
  }

  logger.info(`Detected YouTube video: ${url} (ID: ${videoId})`);

  // Start both requests together; metadata never rejects
  const metadataRequest = fetchVideoMetadata(url, options, signal);
  let transcript: string;
  try {
    transcript = await options.transcripts.fetchTranscript(videoId, signal);
  } catch (err) {
    await metadataRequest;
    const error = describeError(err);
    logger.warn(`Failed to get transcript for YouTube video ${videoId}:`, error);
    return { success: false, url, kind, reason: 'transcript_unavailable', error };
  }

  logger.info('Successfully extracted transcript from YouTube video');
  const metadata = await metadataRequest;
  if (!metadata) {
    return { success: true, url, kind, text: truncate(transcript, options.maxLength) };
  }

  let text = `YOUTUBE VIDEO: ${metadata.title}\n\n`;
  if (metadata.description) {
    text += `${metadata.description}\n\n`;
  }
  text += transcript;

  return { success: true, url, kind, text: truncate(text, options.maxLength) };
}
