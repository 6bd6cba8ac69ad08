import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('youtube-transcript', () => ({
  YoutubeTranscript: { fetchTranscript: vi.fn() },
}));

import { YoutubeTranscript } from 'youtube-transcript';
import { formatTranscript, youtubeTranscripts } from './transcript.js';

const mockFetchTranscript = vi.mocked(YoutubeTranscript.fetchTranscript);

function segment(text: string, lang = 'en') {
  return { text, duration: 1, offset: 0, lang };
}

describe('formatTranscript', () => {
  it('decodes entities, joins lines and adds the transcript marker', () => {
    expect(formatTranscript('abc', [segment('it&amp;#39;s'), segment('  '), segment('Tom &amp; Jerry')])).toBe(
      "YOUTUBE TRANSCRIPT [video_id: abc]:\n\nit's\nTom & Jerry",
    );
  });
});

describe('youtubeTranscripts', () => {
  beforeEach(() => {
    mockFetchTranscript.mockReset();
  });

  it('asks for English first', async () => {
    mockFetchTranscript.mockResolvedValueOnce([segment('hello'), segment('world')]);

    const text = await youtubeTranscripts.fetchTranscript('abc');

    expect(mockFetchTranscript).toHaveBeenCalledTimes(1);
    expect(mockFetchTranscript).toHaveBeenCalledWith('abc', { lang: 'en' });
    expect(text).toBe('YOUTUBE TRANSCRIPT [video_id: abc]:\n\nhello\nworld');
  });

  it('falls back to the default track when English is missing', async () => {
    mockFetchTranscript
      .mockRejectedValueOnce(new Error('No transcripts are available in en this video (abc)'))
      .mockResolvedValueOnce([segment('hola', 'es')]);

    const text = await youtubeTranscripts.fetchTranscript('abc');

    expect(mockFetchTranscript).toHaveBeenLastCalledWith('abc');
    expect(text).toBe('YOUTUBE TRANSCRIPT [video_id: abc]:\n\nhola');
  });

  it('rejects when no transcript exists at all', async () => {
    mockFetchTranscript
      .mockRejectedValueOnce(new Error('no en'))
      .mockRejectedValueOnce(new Error('Transcript is disabled on this video (abc)'));

    await expect(youtubeTranscripts.fetchTranscript('abc')).rejects.toThrow('Transcript is disabled');
  });

  it('rejects an empty transcript', async () => {
    mockFetchTranscript.mockResolvedValueOnce([]);

    await expect(youtubeTranscripts.fetchTranscript('abc')).rejects.toThrow('Transcript for abc is empty');
  });
  it('stops waiting as soon as the turn is interrupted', async () => {
    mockFetchTranscript.mockReturnValueOnce(new Promise(() => {}));
    const controller = new AbortController();

    const pending = youtubeTranscripts.fetchTranscript('abc', controller.signal);
    controller.abort(new Error('interrupted'));

    await expect(pending).rejects.toThrow('interrupted');
    expect(mockFetchTranscript).toHaveBeenCalledTimes(1);
  });

  it('does not start a request once interrupted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('interrupted'));

    await expect(youtubeTranscripts.fetchTranscript('abc', controller.signal)).rejects.toThrow('interrupted');
    expect(mockFetchTranscript).not.toHaveBeenCalled();
  });
});
