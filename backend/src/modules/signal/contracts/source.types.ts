/**
 * SOURCE CONTRACTS
 * ================
 *
 * Every external data category is fetched by one SourceClient. The
 * coordinator captures each outcome as a tagged SourceSnapshot, so a failed
 * source is a value in the snapshot map rather than a thrown error.
 */

import type { FetchErrorKind } from './fetch.error.js';

export type SourceName =
  | 'price'
  | 'orderBook'
  | 'funding'
  | 'openInterest'
  | 'longShortRatio'
  | 'liquidations'
  | 'news'
  | 'polymarket';

export const SOURCE_NAMES: readonly SourceName[] = [
  'price',
  'orderBook',
  'funding',
  'openInterest',
  'longShortRatio',
  'liquidations',
  'news',
  'polymarket',
];

// ═══════════════════════════════════════════════════════════════
// PAYLOADS
// ═══════════════════════════════════════════════════════════════

export type PricePayload = {
  symbol: string;
  price: number;
};

export type OrderBookWallPayload = {
  symbol: string;
  bestBid: number;
  bestAsk: number;
  midPrice: number;
  bandPct: number;       // 0.01 = ±1% around mid
  bidWallVolume: number;
  askWallVolume: number;
  wallRatio: number | null; // bid / ask, null when there is no ask volume in band
};

export type FundingPayload = {
  instrument: string;
  currentRate: number;   // per 8h settlement, 0.0001 = 0.01%
  nextFundingTime: number | null;
  recentRates: Array<{ rate: number; time: number }>;
};

export type OpenInterestPayload = {
  instrument: string;
  contracts: number;
  btc: number;
  timestamp: number;
};

export type LongShortPayload = {
  currency: string;
  currentRatio: number;
  history: Array<{ timestamp: number; ratio: number }>;
};

export type LiquidationSide = 'long' | 'short' | 'unknown';

export type LiquidationEvent = {
  side: LiquidationSide;
  price: number;
  sizeBtc: number;
  valueUsd: number;
  time: number;
};

export type LiquidationPayload = {
  longUsd: number;
  shortUsd: number;
  longCount: number;
  shortCount: number;
  totalUsd: number;
  recentEvents: LiquidationEvent[];
};

export type SentimentLabel = 'bullish' | 'bearish' | 'neutral';

export type HeadlineSentiment = {
  score: number;         // -1..1
  label: SentimentLabel;
  polarity: number;
  bullishKeywords: number;
  bearishKeywords: number;
};

export type Headline = {
  title: string;
  source: string;
  publishedAt: number;   // unix seconds
  url: string;
  sentiment: HeadlineSentiment;
};

export type NewsPayload = {
  overallSentiment: SentimentLabel;
  avgScore: number;
  bullishCount: number;
  bearishCount: number;
  neutralCount: number;
  headlines: Headline[];
};

export type PolymarketOutcome = {
  tokenId: string;
  price: number | null;
};

export type PolymarketPayload = {
  question: string;
  endDate: string | null;
  slug: string | null;
  outcomes: Record<string, PolymarketOutcome>;
};

export interface SourcePayloads {
  price: PricePayload;
  orderBook: OrderBookWallPayload;
  funding: FundingPayload;
  openInterest: OpenInterestPayload;
  longShortRatio: LongShortPayload;
  liquidations: LiquidationPayload;
  news: NewsPayload;
  polymarket: PolymarketPayload;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════

export type OkSnapshot<P> = {
  readonly status: 'ok';
  readonly payload: P;
  readonly fetchedAt: number;
  readonly latencyMs: number;
};

export type FailedSnapshot = {
  readonly status: 'failed';
  readonly error: { readonly kind: FetchErrorKind; readonly message: string };
  readonly attemptedAt: number;
};

export type SourceSnapshot<P> = OkSnapshot<P> | FailedSnapshot;

export type SnapshotMap = {
  readonly [K in SourceName]: SourceSnapshot<SourcePayloads[K]>;
};

export function okPayload<P>(snapshot: SourceSnapshot<P>): P | null {
  return snapshot.status === 'ok' ? snapshot.payload : null;
}

// ═══════════════════════════════════════════════════════════════
// CLIENTS
// ═══════════════════════════════════════════════════════════════

export type FetchOptions = {
  signal: AbortSignal;
  timeoutMs: number;
};

/**
 * One attempt per call. Implementations reject with a FetchError and never
 * retry internally; the coordinator owns the retry policy.
 */
export interface SourceClient<P> {
  readonly name: SourceName;
  fetch(options: FetchOptions): Promise<P>;
}

export type SourceClients = {
  [K in SourceName]: SourceClient<SourcePayloads[K]>;
};
