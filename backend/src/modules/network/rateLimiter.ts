/**
 * RATE LIMITER
 * ============
 * Per-provider request pacing for the upstream REST APIs.
 */

import Bottleneck from 'bottleneck';

export type RateLimitConfig = {
  minTime: number; // ms between requests
  maxConcurrent: number;
};

export type Provider = 'KRAKEN' | 'OKX' | 'CRYPTOCOMPARE' | 'POLYMARKET';

// OKX serves four sources per cycle, the others one each
export const RATE_LIMITS: Record<Provider, RateLimitConfig> = {
  KRAKEN: {
    minTime: 200,
    maxConcurrent: 2,
  },
  OKX: {
    minTime: 100, // public endpoints allow 20 req / 2 s
    maxConcurrent: 4,
  },
  CRYPTOCOMPARE: {
    minTime: 500,
    maxConcurrent: 1,
  },
  POLYMARKET: {
    minTime: 250,
    maxConcurrent: 2,
  },
};

const limiters = new Map<Provider, Bottleneck>();

export function getRateLimiter(provider: Provider): Bottleneck {
  const existing = limiters.get(provider);
  if (existing) return existing;

  const config = RATE_LIMITS[provider];
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
  });
  limiters.set(provider, limiter);
  return limiter;
}

export function schedule<T>(provider: Provider, fn: () => Promise<T>): Promise<T> {
  return getRateLimiter(provider).schedule(fn);
}
