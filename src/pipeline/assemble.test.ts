import { describe, it, expect } from 'vitest';
import { assemblePrompt, buildContext, renderHistory } from './assemble.js';
import { INSUFFICIENT_INFORMATION } from './prompts.js';
import type { ExtractionResult } from './types.js';

const ok = (url: string, text: string): ExtractionResult => ({ success: true, url, kind: 'document', text });
const failed = (url: string): ExtractionResult => ({
  success: false,
  url,
  kind: 'document',
  reason: 'http_error',
  error: 'HTTP 500',
});

describe('buildContext', () => {
  it('joins surviving texts in source order with a visible delimiter', () => {
    const results = [ok('https://a.test', 'alpha'), failed('https://b.test'), ok('https://c.test', 'gamma')];

    expect(buildContext(results)).toBe('alpha\n\n---\n\ngamma');
  });
});

describe('renderHistory', () => {
  const history = [
    { query: 'q1', answer: 'a1' },
    { query: 'q2', answer: 'a2' },
  ];

  it('lists prior turns oldest first', () => {
    expect(renderHistory(history, true)).toBe(
      'CONVERSATION HISTORY:\nUser: q1\nAssistant: a1\n\nUser: q2\nAssistant: a2\n\n---\n\n',
    );
  });

  it('renders nothing when disabled or empty', () => {
    expect(renderHistory(history, false)).toBe('');
    expect(renderHistory([], true)).toBe('');
  });
});

describe('assemblePrompt', () => {
  it('uses the general template with the fallback phrase for web context', () => {
    const prompt = assemblePrompt('what is x?', [ok('https://a.test', 'x is a letter')], [], {
      historyEnabled: true,
    });

    expect(prompt).toContain(`state "${INSUFFICIENT_INFORMATION}"`);
    expect(prompt).toContain('\nCONTEXT:\n---\nx is a letter\n---\n\nUSER QUERY: what is x?\n\nFACTUAL ANSWER:\n');
    expect(prompt).not.toContain('CONVERSATION HISTORY');
  });

  it('switches to the video template when a transcript is present', () => {
    const transcript = 'YOUTUBE TRANSCRIPT [video_id: abc]:\n\nhello';
    const prompt = assemblePrompt('summarize it', [ok('https://youtu.be/abcdefghijk', transcript)], [], {
      historyEnabled: true,
    });

    expect(prompt).toContain('You are a factual assistant tasked with summarizing YouTube content.');
    expect(prompt).toContain(`\nVIDEO CONTENT:\n---\n${transcript}\n---\n\nTASK: summarize it\n\nFACTUAL SUMMARY:\n`);
  });

  it('places history before the context block', () => {
    const prompt = assemblePrompt('and y?', [ok('https://a.test', 'y is next')], [{ query: 'what is x?', answer: 'a letter' }], {
      historyEnabled: true,
    });

    expect(prompt).toContain(
      'CONVERSATION HISTORY:\nUser: what is x?\nAssistant: a letter\n\n---\n\nCONTEXT:\n---\ny is next\n---',
    );
  });

  it('omits history when disabled', () => {
    const prompt = assemblePrompt('and y?', [ok('https://a.test', 'y is next')], [{ query: 'q', answer: 'a' }], {
      historyEnabled: false,
    });

    expect(prompt).not.toContain('CONVERSATION HISTORY');
    expect(prompt).toContain('7. Maintain a neutral, factual tone throughout your response\n\nCONTEXT:');
  });

  it('is deterministic', () => {
    const args = ['q', [ok('https://a.test', 'text')], [{ query: 'p', answer: 'r' }], { historyEnabled: true }] as const;

    expect(assemblePrompt(...args)).toBe(assemblePrompt(...args));
  });
});
