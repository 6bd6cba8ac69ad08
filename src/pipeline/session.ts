/**
 * One query turn end to end, plus the conversation state between turns
 */

import type {
  ClassifiedQuery,
  ConversationTurn,
  ExtractionResult,
  Extractor,
  SessionConfig,
  Source,
  StreamChunk,
  TurnOutcome,
} from './types.js';
import type { SearchProvider } from './search.js';
import { classifyQuery, toSource } from './classify.js';
import { assemblePrompt } from './assemble.js';
import { ConversationHistory } from './history.js';
import { RetrievalError, StreamError } from './errors.js';
import { logger } from '../logger.js';

export type Synthesizer = (prompt: string, signal?: AbortSignal) => AsyncIterable<StreamChunk>;

export interface SessionDeps {
  search: SearchProvider;
  extract: Extractor;
  synthesize: Synthesizer;
}

export interface TurnOptions {
  /** Called with each generated fragment as soon as it arrives */
  onChunk?: (text: string) => void;
  signal?: AbortSignal;
}

export class Session {
  private readonly history: ConversationHistory;
  private readonly config: SessionConfig;
  private readonly deps: SessionDeps;
  private historyOn: boolean;

  constructor(config: SessionConfig, deps: SessionDeps) {
    this.config = config;
    this.deps = deps;
    this.history = new ConversationHistory(config.historyDepth);
    this.historyOn = config.historyEnabled;
  }

  get historyEnabled(): boolean {
    return this.historyOn;
  }

  /**
   * Flip history on or off; returns the new state
   */
  toggleHistory(): boolean {
    this.historyOn = !this.historyOn;
    return this.historyOn;
  }

  clearHistory(): void {
    this.history.clear();
  }

  get turns(): readonly ConversationTurn[] {
    return this.history.turns();
  }

  /**
   * Run one turn: classify, retrieve, extract, assemble, stream.
   * Never throws for search, extraction or stream failures; those come back
   * as outcomes. History only grows on a non-empty, complete answer.
   */
  async runTurn(input: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    const { onChunk, signal } = options;
    logger.info(`Received query: ${input}`);

    const query = classifyQuery(input);

    let sources: Source[];
    if (query.videoUrl) {
      logger.info(`YouTube URL detected in query: ${query.videoUrl}`);
      logger.info(`Updated query for YouTube video: ${query.effective}`);
      sources = [toSource(query.videoUrl)];
    } else {
      logger.info('Searching web using DuckDuckGo...');
      try {
        const urls = await this.deps.search.search(query.effective, this.config.maxResults);
        sources = urls.map(toSource);
      } catch (err) {
        const error =
          err instanceof RetrievalError ? err : new RetrievalError(`Web search failed: ${String(err)}`, { cause: err });
        return { status: 'retrieval_failed', query, error };
      }
      if (sources.length === 0) {
        return { status: 'no_results', query };
      }
    }

    logger.info('Fetching and extracting content...');
    const results = await this.extractAll(sources, signal);
    const used = results.flatMap((r) => (r.success ? [r.url] : []));

    // Fetches fail once aborted; that is an interrupt, not missing content
    if (signal?.aborted) {
      logger.info('Turn interrupted during extraction');
      return { status: 'cancelled', query, partial: '', sources: used };
    }
    if (used.length === 0) {
      logger.error('No text could be extracted from any search result.');
      return { status: 'no_content', query, attempted: sources.map((s) => s.url) };
    }

    const turns = this.history.turns();
    if (this.historyOn && turns.length > 0) {
      logger.info(`Including ${turns.length} previous conversation turns`);
    }
    const prompt = assemblePrompt(query.effective, results, turns, { historyEnabled: this.historyOn });
    logger.info(`Total prompt length: ${prompt.length}`);

    return this.synthesize(query, prompt, used, onChunk, signal);
  }

  /**
   * Extract every source, at most extractConcurrency at a time.
   * Results keep source order whatever order fetches finish in.
   */
  private async extractAll(sources: Source[], signal?: AbortSignal): Promise<ExtractionResult[]> {
    const batchSize = Math.max(1, this.config.extractConcurrency);
    const results: ExtractionResult[] = [];

    for (let i = 0; i < sources.length; i += batchSize) {
      const batch = sources.slice(i, i + batchSize);
      for (const source of batch) {
        logger.info(`Processing ${source.url}...`);
      }
      results.push(...(await Promise.all(batch.map((source) => this.deps.extract(source, signal)))));
    }

    return results;
  }

  private async synthesize(
    query: ClassifiedQuery,
    prompt: string,
    sources: string[],
    onChunk: ((text: string) => void) | undefined,
    signal: AbortSignal | undefined,
  ): Promise<TurnOutcome> {
    let answer = '';
    try {
      for await (const chunk of this.deps.synthesize(prompt, signal)) {
        onChunk?.(chunk.text);
        answer += chunk.text;
      }
    } catch (err) {
      if (!(err instanceof StreamError)) {
        throw err;
      }
      if (err.kind === 'aborted') {
        return { status: 'cancelled', query, partial: answer, sources, error: err };
      }
      logger.error('Failed to generate or stream the synthesized answer:', err.message);
      return { status: 'stream_failed', query, error: err, partial: answer, sources };
    }

    if (answer) {
      this.history.append({ query: query.original, answer });
    } else {
      logger.warn('No response content received from Ollama stream.');
    }
    return { status: 'answered', query, answer, sources };
  }
}
