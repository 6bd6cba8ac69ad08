/**
 * Streaming answer synthesis against the Ollama generate API
 */

import { z } from 'zod';
import type { StreamChunk } from './types.js';
import { StreamError, describeError } from './errors.js';
import { timeoutSignal } from './http.js';
import { config, getGenerateUrl } from '../config.js';
import { logger } from '../logger.js';

export interface SynthesisOptions {
  url?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const recordSchema = z
  .object({
    response: z.string().optional(),
    done: z.boolean().optional(),
    error: z.string().optional(),
  })
  .passthrough();

type GenerateRecord = z.infer<typeof recordSchema>;

type ParsedLine = { type: 'record'; record: GenerateRecord } | { type: 'malformed' };

/**
 * Policy 1: a line that is not JSON is logged and skipped; the stream goes on.
 */
function skipMalformedRecord(line: string): ParsedLine {
  logger.warn(`Skipping invalid JSON line from stream: ${line.slice(0, 200)}`);
  return { type: 'malformed' };
}

/**
 * Policy 2: valid JSON that is not a usable record ends the stream with an error.
 */
function abortOnRecordFailure(message: string, cause?: unknown): never {
  throw new StreamError('record', `Error processing stream record: ${message}`, { cause });
}

function parseLine(line: string): ParsedLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return skipMalformedRecord(line);
  }

  const parsed = recordSchema.safeParse(json);
  if (!parsed.success) {
    return abortOnRecordFailure(parsed.error.issues.map((i) => i.message).join('; '), parsed.error);
  }
  if (parsed.data.error) {
    return abortOnRecordFailure(parsed.data.error);
  }
  return { type: 'record', record: parsed.data };
}

/**
 * Stream a completion for a prompt. Yields text chunks in arrival order and
 * returns when the backend sends `done: true` or closes the body.
 * Single pass: the connection is released on every exit path.
 */
export async function* streamCompletion(
  prompt: string,
  options: SynthesisOptions = {},
): AsyncGenerator<StreamChunk, void, undefined> {
  const url = options.url ?? getGenerateUrl();
  const model = options.model ?? config.OLLAMA_MODEL;
  const timeoutMs = options.timeoutMs ?? config.OLLAMA_TIMEOUT_MS;

  const body = {
    model,
    prompt,
    stream: true,
    options: {
      temperature: options.temperature ?? config.OLLAMA_TEMPERATURE,
      num_predict: options.maxTokens ?? config.OLLAMA_NUM_PREDICT,
    },
  };

  const timeout = timeoutSignal(timeoutMs, options.signal);

  // Map any failure to a StreamError, keeping ones we already raised
  const toStreamError = (err: unknown): StreamError => {
    if (err instanceof StreamError) return err;
    if (timeout.timedOut()) {
      return new StreamError('timeout', `Request to Ollama timed out after ${timeoutMs}ms`, { cause: err });
    }
    if (options.signal?.aborted) {
      return new StreamError('aborted', 'Generation interrupted', { cause: err });
    }
    return new StreamError('connection', `Could not connect to Ollama at ${url}: ${describeError(err)}`, {
      cause: err,
    });
  };

  let reader: ReadableStreamDefaultReader<Uint8Array> | undefined;

  try {
    logger.info(`Sending streaming request to Ollama (model: ${model})...`);

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: timeout.signal,
      });
    } catch (err) {
      throw toStreamError(err);
    }

    if (!res.ok) {
      const text = await res.text().catch((err: unknown) => `(unreadable body: ${describeError(err)})`);
      logger.debug(`Ollama error response body: ${text}`);
      throw new StreamError('http_status', `Ollama error: ${res.status} ${res.statusText}`.trim(), {
        status: res.status,
      });
    }
    if (!res.body) {
      throw new StreamError('connection', 'Ollama response has no body');
    }

    logger.info('Receiving stream from Ollama...');
    reader = res.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let finished = false;

    while (!finished) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await reader.read();
      } catch (err) {
        throw toStreamError(err);
      }

      if (chunk.done) {
        buffer += decoder.decode();
        finished = true;
      } else {
        buffer += decoder.decode(chunk.value, { stream: true });
      }

      // A trailing partial line stays buffered until more bytes arrive
      const lines = buffer.split('\n');
      buffer = finished ? '' : (lines.pop() ?? '');

      for (const raw of lines) {
        const line = raw.trim();
        if (!line) continue;

        const parsed = parseLine(line);
        if (parsed.type === 'malformed') continue;

        const { response, done } = parsed.record;
        if (response) {
          yield { text: response, done: done === true };
        }
        if (done) {
          logger.info('Ollama stream finished.');
          return;
        }
      }
    }

    logger.warn('Ollama stream ended without a completion record');
  } finally {
    timeout.dispose();
    if (reader) {
      await reader.cancel().catch((err: unknown) => logger.debug('Stream cancel failed', describeError(err)));
    }
  }
}

/**
 * Check if Ollama is running and accessible
 */
export async function checkOllamaHealth(baseUrl: string = config.OLLAMA_URL): Promise<boolean> {
  try {
    const res = await fetch(`${baseUrl.replace(/\/+$/, '')}/api/tags`, {
      signal: AbortSignal.timeout(5000),
    });
    return res.ok;
  } catch (err) {
    logger.debug('Ollama health check failed', describeError(err));
    return false;
  }
}
