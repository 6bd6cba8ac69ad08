import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { extractVideo } from './video.js';
import type { ExtractorOptions } from './index.js';
import type { TranscriptBackend } from '../transcript.js';

const source = {
  url: 'https://youtu.be/dQw4w9WgXcQ',
  kind: 'video' as const,
  videoId: 'dQw4w9WgXcQ',
};

const TRANSCRIPT = 'YOUTUBE TRANSCRIPT [video_id: dQw4w9WgXcQ]:\n\nhello there';

describe('extractVideo', () => {
  const mockFetch = vi.fn<typeof fetch>();
  const fetchTranscript = vi.fn<TranscriptBackend['fetchTranscript']>();
  let options: ExtractorOptions;

  beforeEach(() => {
    mockFetch.mockReset();
    fetchTranscript.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    options = { maxLength: 20_000, timeoutMs: 4000, userAgent: 'test-agent', transcripts: { fetchTranscript } };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('prefixes page title and description onto the transcript', async () => {
    fetchTranscript.mockResolvedValueOnce(TRANSCRIPT);
    mockFetch.mockResolvedValueOnce(
      new Response(
        '<html><head><title>Demo Video - YouTube</title><meta name="description" content="All about demos"></head></html>',
        { headers: { 'content-type': 'text/html' } },
      ),
    );

    const result = await extractVideo(source, options);

    expect(fetchTranscript).toHaveBeenCalledWith('dQw4w9WgXcQ', undefined);
    expect(result).toEqual({
      success: true,
      url: source.url,
      kind: 'video',
      text: `YOUTUBE VIDEO: Demo Video - YouTube\n\nVideo Description: All about demos\n\n${TRANSCRIPT}`,
    });
  });

  it('falls back to a default title when the page has none', async () => {
    fetchTranscript.mockResolvedValueOnce(TRANSCRIPT);
    mockFetch.mockResolvedValueOnce(new Response('<html><body></body></html>', { headers: { 'content-type': 'text/html' } }));

    const result = await extractVideo(source, options);

    expect(result.success && result.text).toBe(`YOUTUBE VIDEO: Unknown YouTube Video\n\n${TRANSCRIPT}`);
  });

  it('uses the transcript alone when the metadata fetch fails', async () => {
    fetchTranscript.mockResolvedValueOnce(TRANSCRIPT);
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const result = await extractVideo(source, options);

    expect(result).toEqual({ success: true, url: source.url, kind: 'video', text: TRANSCRIPT });
  });

  it('fails the source when no transcript is available', async () => {
    fetchTranscript.mockRejectedValueOnce(new Error('Transcript is disabled on this video'));
    mockFetch.mockResolvedValueOnce(new Response('<html></html>', { headers: { 'content-type': 'text/html' } }));

    const result = await extractVideo(source, options);

    expect(result).toEqual({
      success: false,
      url: source.url,
      kind: 'video',
      reason: 'transcript_unavailable',
      error: 'Transcript is disabled on this video',
    });
  });

  it('truncates to the per-source cap', async () => {
    fetchTranscript.mockResolvedValueOnce(TRANSCRIPT);
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const result = await extractVideo(source, { ...options, maxLength: 18 });

    expect(result.success && result.text).toBe('YOUTUBE TRANSCRIPT');
  });
  it('hands the abort signal to the transcript backend', async () => {
    const controller = new AbortController();
    fetchTranscript.mockResolvedValueOnce(TRANSCRIPT);
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await extractVideo(source, options, controller.signal);

    expect(fetchTranscript).toHaveBeenCalledWith('dQw4w9WgXcQ', controller.signal);
  });

  it('does nothing once the turn is already interrupted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await extractVideo(source, options, controller.signal);

    expect(result).toEqual({
      success: false,
      url: source.url,
      kind: 'video',
      reason: 'network_error',
      error: 'Interrupted before fetching',
    });
    expect(fetchTranscript).not.toHaveBeenCalled();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
