/**
 * Web search via DuckDuckGo (duck-duck-scrape)
 */

import ddg from 'duck-duck-scrape';
import { RetrievalError, describeError } from './errors.js';
import { logger } from '../logger.js';

export interface SearchProvider {
  /** Ranked result URLs; an empty list is a valid answer */
  search(query: string, maxResults: number): Promise<string[]>;
}

/** The slice of duck-duck-scrape's search() this module relies on */
export type WebSearchFn = (
  query: string,
) => Promise<{ noResults: boolean; results: ReadonlyArray<{ url: string }> }>;

export function createDuckDuckGo(searchFn: WebSearchFn = (query) => ddg.search(query)): SearchProvider {
  return {
    async search(query: string, maxResults: number): Promise<string[]> {
      let urls: string[];
      try {
        const results = await searchFn(query);
        urls = results.noResults ? [] : results.results.map((r) => r.url).slice(0, maxResults);
      } catch (err) {
        logger.error('Failed during web search:', describeError(err));
        throw new RetrievalError(`Web search failed: ${describeError(err)}`, { cause: err });
      }

      if (urls.length === 0) {
        logger.info('No search results found.');
      } else {
        logger.info(`Found ${urls.length} potential URLs:`);
        for (const url of urls) {
          logger.info(`  - ${url}`);
        }
      }
      return urls;
    },
  };
}

export const duckDuckGo: SearchProvider = createDuckDuckGo();
