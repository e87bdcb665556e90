/**
 * Web search + scrape over a Firecrawl-compatible /v1/search endpoint.
 * Each hit comes back with its page scraped to markdown.
 */

import { z } from 'zod';
import {
  PermanentServiceError,
  ServiceError,
  TransientServiceError,
  errorMessage,
  serviceErrorFromResponse,
} from '../errors.js';
import type { SearchProvider, SearchResult } from '../types/index.js';

export interface SearchConfig {
  apiUrl: string;
  apiKey?: string;
  resultLimit: number;
  timeout: number;
}

const SearchResponseSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  data: z.array(z.object({
    url: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
    markdown: z.string().optional(),
  })).default([]),
});

export async function webSearch(query: string, config: SearchConfig): Promise<SearchResult[]> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeout);
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;

  try {
    const response = await fetch(config.apiUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        query,
        limit: config.resultLimit,
        scrapeOptions: { formats: ['markdown'] },
      }),
      signal: controller.signal,
    });

    const body = await response.text();
    if (!response.ok) {
      throw serviceErrorFromResponse('search', response.status, body);
    }

    const parsed = SearchResponseSchema.safeParse(JSON.parse(body));
    if (!parsed.success) {
      throw new PermanentServiceError(`Unexpected search response: ${parsed.error.message}`, 'search', response.status);
    }
    if (parsed.data.success === false) {
      throw serviceErrorFromResponse('search', response.status, parsed.data.error ?? 'search reported failure');
    }

    return parsed.data.data.map(item => ({
      url: item.url,
      title: item.title ?? item.url,
      content: item.markdown ?? item.description ?? '',
    }));
  } catch (error) {
    if (error instanceof ServiceError) throw error;
    if (error instanceof SyntaxError) {
      throw new PermanentServiceError('Search returned a non-JSON body', 'search', undefined, { cause: error });
    }
    console.error(`[Search] Request failed for "${query}": ${errorMessage(error)}`);
    throw new TransientServiceError(`Search request failed: ${errorMessage(error)}`, 'search', undefined, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createSearchProvider(config: SearchConfig): SearchProvider {
  return {
    name: 'web-search',
    search: (query: string) => webSearch(query, config),
  };
}
