/**
 * SOURCES
 * =======
 *
 * Wires the four upstream providers into the eight SourceClients the
 * refresh coordinator fetches each cycle.
 */

import { silentLogger, type Logger } from '../../common/logger.js';
import { createHttpClient } from '../network/index.js';
import type { SourceClients } from '../signal/contracts/source.types.js';
import { KrakenProvider, KRAKEN_BASE_URL } from './kraken/kraken.provider.js';
import { OkxProvider, OKX_BASE_URL } from './okx/okx.provider.js';
import { CryptoCompareNewsProvider, CRYPTOCOMPARE_BASE_URL } from './news/cryptocompare.provider.js';
import { SentimentAnalyzer } from './news/news.sentiment.js';
import type { SentimentLexicon } from './news/lexicon.loader.js';
import { PolymarketProvider, GAMMA_BASE_URL } from './polymarket/polymarket.provider.js';

export type SourceProviders = {
  kraken: KrakenProvider;
  okx: OkxProvider;
  news: CryptoCompareNewsProvider;
  polymarket: PolymarketProvider;
};

export type CreateProvidersOptions = {
  timeoutMs: number;
  wallBandPct: number;
  lexicon: SentimentLexicon;
  proxyUrl?: string;
  logger?: Logger;
};

export function createSourceProviders(options: CreateProvidersOptions): SourceProviders {
  const http = (baseURL: string) =>
    createHttpClient({ baseURL, timeoutMs: options.timeoutMs, proxyUrl: options.proxyUrl });

  return {
    kraken: new KrakenProvider({ http: http(KRAKEN_BASE_URL), wallBandPct: options.wallBandPct }),
    okx: new OkxProvider({ http: http(OKX_BASE_URL), logger: options.logger ?? silentLogger }),
    news: new CryptoCompareNewsProvider({
      http: http(CRYPTOCOMPARE_BASE_URL),
      analyzer: new SentimentAnalyzer(options.lexicon),
    }),
    polymarket: new PolymarketProvider({ http: http(GAMMA_BASE_URL) }),
  };
}

export function toSourceClients(providers: SourceProviders): SourceClients {
  const { kraken, okx, news, polymarket } = providers;
  return {
    price: { name: 'price', fetch: (o) => kraken.fetchPrice(o) },
    orderBook: { name: 'orderBook', fetch: (o) => kraken.fetchOrderBook(o) },
    funding: { name: 'funding', fetch: (o) => okx.fetchFunding(o) },
    openInterest: { name: 'openInterest', fetch: (o) => okx.fetchOpenInterest(o) },
    longShortRatio: { name: 'longShortRatio', fetch: (o) => okx.fetchLongShortRatio(o) },
    liquidations: { name: 'liquidations', fetch: (o) => okx.fetchLiquidations(o) },
    news: { name: 'news', fetch: (o) => news.fetchNews(o) },
    polymarket: { name: 'polymarket', fetch: (o) => polymarket.fetchMarket(o) },
  };
}

export function createSourceClients(options: CreateProvidersOptions): SourceClients {
  return toSourceClients(createSourceProviders(options));
}

export { KrakenProvider, OkxProvider, CryptoCompareNewsProvider, PolymarketProvider, SentimentAnalyzer };
export { loadSentimentLexicon, type SentimentLexicon } from './news/lexicon.loader.js';
