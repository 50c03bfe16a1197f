import axios from 'axios';
import { createModuleLogger } from '../../utils/logger';
import { CollaboratorResult, describeFailure, failWith, succeed } from '../../utils/errors';

const logger = createModuleLogger('web-search');

/**
 * Black-box web search: query in, result snippets out
 */
export interface SearchProvider {
  search(query: string): Promise<CollaboratorResult<string[]>>;
}

export interface SerperConfig {
  apiKey?: string;
  apiUrl: string;
  resultLimit: number;
  timeoutMs?: number;
}

interface SerperOrganicResult {
  title?: string;
  snippet?: string;
  link?: string;
}

interface SerperResponse {
  organic?: SerperOrganicResult[];
}

export class SerperSearchProvider implements SearchProvider {
  private config: SerperConfig;

  constructor(config: SerperConfig) {
    this.config = config;
  }

  async search(query: string): Promise<CollaboratorResult<string[]>> {
    if (!this.config.apiKey) {
      return failWith('search', 'disabled', 'Serper API key is not configured');
    }

    logger.debug('Searching', { query });

    try {
      const response = await axios.post<SerperResponse>(
        this.config.apiUrl,
        { q: query, num: this.config.resultLimit },
        {
          headers: {
            'X-API-KEY': this.config.apiKey,
            'Content-Type': 'application/json',
          },
          timeout: this.config.timeoutMs ?? 15000,
        }
      );

      const organic = response.data.organic;
      if (!Array.isArray(organic)) {
        return failWith('search', 'malformed', 'Search response has no organic results');
      }

      const titles = organic
        .map((result) => result.title?.trim() ?? '')
        .filter((title) => title.length > 0)
        .slice(0, this.config.resultLimit);

      if (titles.length === 0) {
        return failWith('search', 'empty', `No results for "${query}"`);
      }

      return succeed(titles);
    } catch (error) {
      const failure = describeFailure('search', error);
      logger.warn('Search request failed', { query, kind: failure.kind, error: failure.message });
      return { ok: false, error: failure };
    }
  }
}
