// src/search/serper-search.provider.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';

import { advisorConfig } from '../config/advisor.config';
import { ProviderError, errorMessage } from '../shared/errors';
import { OrganicResult, SearchProvider, SearchSession } from './search.types';

export interface SerperOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls `organic[]` out of a Serper response body. A body that is not an
 * object, or an `organic` field that is not a list, is a malformed payload.
 * Individual hits without a link are skipped.
 */
export function parseOrganicResults(body: unknown, query: string): OrganicResult[] {
  if (!isRecord(body)) {
    throw new ProviderError('Search provider returned a non-object payload', query);
  }

  const organic = body.organic;
  if (organic === undefined) return [];
  if (!Array.isArray(organic)) {
    throw new ProviderError('Search provider payload has a non-list "organic" field', query);
  }

  const results: OrganicResult[] = [];
  for (const item of organic) {
    if (!isRecord(item) || typeof item.link !== 'string' || !item.link) continue;

    results.push({
      ...item,
      link: item.link,
      title: typeof item.title === 'string' ? item.title : item.link,
      snippet: typeof item.snippet === 'string' ? item.snippet : '',
    });
  }

  return results;
}

export class SerperSearchSession implements SearchSession {
  private readonly logger = new Logger(SerperSearchSession.name);
  private readonly abort = new AbortController();
  private closed = false;

  constructor(private readonly http: AxiosInstance) {}

  async search(query: string): Promise<OrganicResult[]> {
    if (this.closed) {
      throw new ProviderError('Search session is already closed', query);
    }

    try {
      const res = await this.http.post<unknown>(
        '/search',
        { q: query },
        { signal: this.abort.signal },
      );

      const results = parseOrganicResults(res.data, query);
      this.logger.debug(`search(): q="${query}" organic=${results.length}`);
      return results;
    } catch (e) {
      if (e instanceof ProviderError) throw e;

      const status = axios.isAxiosError(e) ? e.response?.status : undefined;
      throw new ProviderError(
        `Search provider call failed${status ? ` (HTTP ${status})` : ''}: ${errorMessage(e)}`,
        query,
        { cause: e, status },
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.abort.abort();
  }
}

@Injectable()
export class SerperSearchProvider implements SearchProvider {
  private readonly options: SerperOptions;

  constructor(
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.options = {
      apiKey: config.search.serperApiKey,
      baseUrl: config.search.serperBaseUrl,
      timeoutMs: config.search.timeoutMs,
    };
  }

  openSession(): SearchSession {
    const http = axios.create({
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs,
      headers: {
        'X-API-KEY': this.options.apiKey,
        'Content-Type': 'application/json',
      },
    });

    return new SerperSearchSession(http);
  }
}
