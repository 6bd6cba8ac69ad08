import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseCommand, reportOutcome } from './chat.js';
import { StreamError } from './pipeline/errors.js';

const query = { original: 'q', effective: 'q' };

describe('parseCommand', () => {
  it('recognises the reserved commands in any case', () => {
    expect(parseCommand('exit')).toBe('exit');
    expect(parseCommand('QUIT')).toBe('exit');
    expect(parseCommand('Clear History')).toBe('clear');
    expect(parseCommand(' toggle history ')).toBe('toggle');
  });

  it('treats everything else as a query', () => {
    expect(parseCommand('exit strategies for startups')).toBeNull();
    expect(parseCommand('toggle')).toBeNull();
  });
});

describe('reportOutcome', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('numbers the sources used after an answer', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    reportOutcome({ status: 'answered', query, answer: 'Hello', sources: ['https://a.test', 'https://b.test'] });

    expect(log).toHaveBeenCalledWith('  [1] https://a.test');
    expect(log).toHaveBeenCalledWith('  [2] https://b.test');
  });

  it('still lists the sources checked when streaming failed', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    reportOutcome({
      status: 'stream_failed',
      query,
      error: new StreamError('connection', 'Could not connect to Ollama'),
      partial: '',
      sources: ['https://a.test'],
    });

    expect(log).toHaveBeenCalledWith('  [1] https://a.test');
  });
});
