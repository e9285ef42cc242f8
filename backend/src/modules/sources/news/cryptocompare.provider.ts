/**
 * CryptoCompare News Provider
 * Source: CryptoCompare news API (public, no key required)
 *
 * Endpoint: https://min-api.cryptocompare.com/data/v2/news/
 * Latest BTC headlines in English, scored with the sentiment lexicon.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FetchError } from '../../signal/contracts/fetch.error.js';
import type { FetchOptions, Headline, NewsPayload } from '../../signal/contracts/source.types.js';
import { getJson, numeric, parseOrThrow } from '../source.utils.js';
import { summarizeHeadlines, type SentimentAnalyzer } from './news.sentiment.js';

export const CRYPTOCOMPARE_BASE_URL = 'https://min-api.cryptocompare.com';
export const HEADLINE_LIMIT = 10;

const responseSchema = z.object({
  Response: z.string().optional(),
  Message: z.string().optional(),
  Data: z.unknown().optional(),
});

const articleSchema = z.object({
  title: z.string().default(''),
  body: z.string().default(''),
  source: z.string().optional(),
  source_info: z.object({ name: z.string().optional() }).optional(),
  published_on: numeric.default(0),
  url: z.string().default(''),
});

/**
 * @throws FetchError UPSTREAM on an API error or an empty feed
 */
export function parseNews(data: unknown, analyzer: SentimentAnalyzer, limit: number = HEADLINE_LIMIT): NewsPayload {
  const response = parseOrThrow(responseSchema, data, 'news');
  if (response.Response === 'Error') {
    throw new FetchError('UPSTREAM', 'news', `CryptoCompare error: ${response.Message || 'unknown'}`);
  }

  const articles = Array.isArray(response.Data)
    ? parseOrThrow(z.array(articleSchema), response.Data, 'news')
    : [];
  if (articles.length === 0) {
    throw new FetchError('UPSTREAM', 'news', 'No headlines returned');
  }

  const headlines: Headline[] = articles.slice(0, limit).map((article) => ({
    title: article.title,
    source: article.source_info?.name ?? article.source ?? 'Unknown',
    publishedAt: article.published_on,
    url: article.url,
    sentiment: analyzer.analyze(article.title, article.body),
  }));

  return summarizeHeadlines(headlines);
}

export type CryptoCompareNewsProviderOptions = {
  http: AxiosInstance;
  analyzer: SentimentAnalyzer;
};

export class CryptoCompareNewsProvider {
  private readonly http: AxiosInstance;
  private readonly analyzer: SentimentAnalyzer;

  constructor(options: CryptoCompareNewsProviderOptions) {
    this.http = options.http;
    this.analyzer = options.analyzer;
  }

  async fetchNews(options: FetchOptions): Promise<NewsPayload> {
    const data = await getJson(
      this.http,
      'CRYPTOCOMPARE',
      'news',
      '/data/v2/news/',
      { categories: 'BTC', lang: 'EN', sortOrder: 'latest' },
      options
    );
    return parseNews(data, this.analyzer);
  }
}
