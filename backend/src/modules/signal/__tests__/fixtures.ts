/**
 * Test builders for snapshots, payloads and fake source clients.
 */

import type { FetchErrorKind } from '../contracts/fetch.error.js';
import type { CacheState, HistoryEntry } from '../contracts/signal.types.js';
import { DEFAULT_EVALUATOR_CONFIG } from '../contracts/signal.config.js';
import { evaluateSignals } from '../evaluators/index.js';
import { DecisionEngine } from '../engine/decision.engine.js';
import type {
  FailedSnapshot,
  FetchOptions,
  FundingPayload,
  LiquidationPayload,
  LongShortPayload,
  NewsPayload,
  OkSnapshot,
  OpenInterestPayload,
  OrderBookWallPayload,
  PolymarketPayload,
  PricePayload,
  SnapshotMap,
  SourceClients,
  SourceName,
  SourcePayloads,
} from '../contracts/source.types.js';

export function ok<P>(payload: P, fetchedAt = 1_000): OkSnapshot<P> {
  return { status: 'ok', payload, fetchedAt, latencyMs: 5 };
}

export function failed(kind: FetchErrorKind = 'TRANSPORT', message = 'connect ECONNREFUSED'): FailedSnapshot {
  return { status: 'failed', error: { kind, message }, attemptedAt: 1_000 };
}

// ═══════════════════════════════════════════════════════════════
// PAYLOADS
// ═══════════════════════════════════════════════════════════════

export const pricePayload = (price: number): PricePayload => ({ symbol: 'BTC/USD', price });

export const orderBookPayload = (bid: number, ask: number): OrderBookWallPayload => ({
  symbol: 'BTC/USD',
  bestBid: 100_000,
  bestAsk: 100_010,
  midPrice: 100_005,
  bandPct: 0.01,
  bidWallVolume: bid,
  askWallVolume: ask,
  wallRatio: ask > 0 ? bid / ask : null,
});

export const fundingPayload = (currentRate: number): FundingPayload => ({
  instrument: 'BTC-USDT-SWAP',
  currentRate,
  nextFundingTime: null,
  recentRates: [],
});

export const openInterestPayload = (): OpenInterestPayload => ({
  instrument: 'BTC-USDT-SWAP',
  contracts: 2_500_000,
  btc: 25_000,
  timestamp: 1_000,
});

export const longShortPayload = (ratio: number): LongShortPayload => ({
  currency: 'BTC',
  currentRatio: ratio,
  history: [{ timestamp: 1_000, ratio }],
});

export const liquidationPayload = (longUsd: number, shortUsd: number): LiquidationPayload => ({
  longUsd,
  shortUsd,
  longCount: longUsd > 0 ? 1 : 0,
  shortCount: shortUsd > 0 ? 1 : 0,
  totalUsd: longUsd + shortUsd,
  recentEvents: [],
});

export const newsPayload = (avgScore: number): NewsPayload => ({
  overallSentiment: 'neutral',
  avgScore,
  bullishCount: 0,
  bearishCount: 0,
  neutralCount: 0,
  headlines: [],
});

export const polymarketPayload = (up: number | null, down: number | null): PolymarketPayload => ({
  question: 'Bitcoin Up or Down - test market',
  endDate: null,
  slug: 'bitcoin-up-or-down-test',
  outcomes: {
    Up: { tokenId: 'token-up', price: up },
    Down: { tokenId: 'token-down', price: down },
  },
});

/**
 * Every source ok. With default weights this yields an UP verdict:
 * orderBook UP 1.0 (w1.0), funding UP 0.5 (w1.5), three NEUTRAL votes,
 * normalized score 1.75 / 5.0 = 0.35.
 */
export function snapshotMap(overrides: Partial<SnapshotMap> = {}): SnapshotMap {
  return {
    price: ok(pricePayload(100_000)),
    orderBook: ok(orderBookPayload(150, 50)),
    funding: ok(fundingPayload(-0.00015)),
    openInterest: ok(openInterestPayload()),
    longShortRatio: ok(longShortPayload(1.5)),
    liquidations: ok(liquidationPayload(0, 0)),
    news: ok(newsPayload(0.05)),
    polymarket: ok(polymarketPayload(0.45, 0.57)),
    ...overrides,
  };
}

export function allFailed(): SnapshotMap {
  return {
    price: failed(),
    orderBook: failed(),
    funding: failed(),
    openInterest: failed(),
    longShortRatio: failed(),
    liquidations: failed(),
    news: failed(),
    polymarket: failed(),
  };
}

// ═══════════════════════════════════════════════════════════════
// PUBLISHED STATE
// ═══════════════════════════════════════════════════════════════

export function cacheState(cycle: number, lastUpdated = 10_000): CacheState {
  const snapshots = snapshotMap();
  const verdict = new DecisionEngine().decide(evaluateSignals(snapshots, DEFAULT_EVALUATOR_CONFIG), lastUpdated);
  return {
    cycleId: `cycle-${cycle}`,
    cycle,
    latestVerdict: verdict,
    latestSnapshots: snapshots,
    oddsValue: { hasValue: false, detail: 'No Polymarket data' },
    lastUpdated,
    cycleDurationMs: 12,
  };
}

export function historyEntry(state: CacheState, btcPriceAtTime: number | null = 100_000): HistoryEntry {
  return { cycleId: state.cycleId, verdict: state.latestVerdict, btcPriceAtTime };
}

// ═══════════════════════════════════════════════════════════════
// FAKE CLIENTS
// ═══════════════════════════════════════════════════════════════

export type FetchImpls = {
  [K in SourceName]: (options: FetchOptions) => Promise<SourcePayloads[K]>;
};

export function defaultImpls(): FetchImpls {
  return {
    price: async () => pricePayload(100_000),
    orderBook: async () => orderBookPayload(150, 50),
    funding: async () => fundingPayload(-0.00015),
    openInterest: async () => openInterestPayload(),
    longShortRatio: async () => longShortPayload(1.5),
    liquidations: async () => liquidationPayload(0, 0),
    news: async () => newsPayload(0.05),
    polymarket: async () => polymarketPayload(0.45, 0.57),
  };
}

export function makeClients(overrides: Partial<FetchImpls> = {}): SourceClients {
  const impl: FetchImpls = { ...defaultImpls(), ...overrides };
  return {
    price: { name: 'price', fetch: impl.price },
    orderBook: { name: 'orderBook', fetch: impl.orderBook },
    funding: { name: 'funding', fetch: impl.funding },
    openInterest: { name: 'openInterest', fetch: impl.openInterest },
    longShortRatio: { name: 'longShortRatio', fetch: impl.longShortRatio },
    liquidations: { name: 'liquidations', fetch: impl.liquidations },
    news: { name: 'news', fetch: impl.news },
    polymarket: { name: 'polymarket', fetch: impl.polymarket },
  };
}

export function rejectAll(error: Error): FetchImpls {
  const fail = async (): Promise<never> => {
    throw error;
  };
  return {
    price: fail,
    orderBook: fail,
    funding: fail,
    openInterest: fail,
    longShortRatio: fail,
    liquidations: fail,
    news: fail,
    polymarket: fail,
  };
}

export type Deferred<T> = { promise: Promise<T>; resolve: (value: T) => void };

export function deferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}

export const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));
