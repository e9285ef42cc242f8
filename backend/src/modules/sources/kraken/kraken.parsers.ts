/**
 * Kraken public REST payloads.
 *
 * Ticker: { error: [], result: { XXBTZUSD: { c: ["<last>", "<lot>"], ... } } }
 * Depth:  { error: [], result: { XXBTZUSD: { bids: [[price, volume, ts]], asks: [...] } } }
 */

import { z } from 'zod';
import { FetchError } from '../../signal/contracts/fetch.error.js';
import type { OrderBookWallPayload, PricePayload, SourceName } from '../../signal/contracts/source.types.js';
import { numeric, parseOrThrow } from '../source.utils.js';

export const KRAKEN_PAIR = 'XBTUSD';
export const KRAKEN_SYMBOL = 'BTC/USD';

const envelope = <T extends z.ZodTypeAny>(entry: T) =>
  z.object({
    error: z.array(z.string()).default([]),
    result: z.record(entry).optional(),
  });

const tickerSchema = envelope(
  z.object({
    c: z.tuple([numeric]).rest(z.unknown()),
  })
);

const levelSchema = z.tuple([numeric, numeric]).rest(z.unknown());

const depthSchema = envelope(
  z.object({
    bids: z.array(levelSchema),
    asks: z.array(levelSchema),
  })
);

export type BookLevel = { price: number; volume: number };

function firstResult<T>(
  parsed: { error: string[]; result?: Record<string, T> },
  source: SourceName
): T {
  if (parsed.error.length > 0) {
    throw new FetchError('UPSTREAM', source, `Kraken error: ${parsed.error.join(', ')}`);
  }
  const entry = parsed.result ? Object.values(parsed.result)[0] : undefined;
  if (entry === undefined) {
    throw new FetchError('UPSTREAM', source, 'Kraken returned no result for pair');
  }
  return entry;
}

export function parseTicker(data: unknown): PricePayload {
  const entry = firstResult(parseOrThrow(tickerSchema, data, 'price'), 'price');
  return { symbol: KRAKEN_SYMBOL, price: entry.c[0] };
}

export function parseDepth(data: unknown): { bids: BookLevel[]; asks: BookLevel[] } {
  const entry = firstResult(parseOrThrow(depthSchema, data, 'orderBook'), 'orderBook');
  const toLevel = ([price, volume]: [number, number, ...unknown[]]): BookLevel => ({ price, volume });
  return { bids: entry.bids.map(toLevel), asks: entry.asks.map(toLevel) };
}

/**
 * Resting volume near the mid on each side.
 *
 * Bids count when price ≥ mid·(1 − bandPct), asks when price ≤ mid·(1 + bandPct).
 * An empty side contributes 0 to the mid.
 */
export function computeWallStrength(
  bids: readonly BookLevel[],
  asks: readonly BookLevel[],
  bandPct: number,
  symbol: string = KRAKEN_SYMBOL
): OrderBookWallPayload {
  const bestBid = bids[0]?.price ?? 0;
  const bestAsk = asks[0]?.price ?? 0;
  const midPrice = (bestBid + bestAsk) / 2;

  const lower = midPrice * (1 - bandPct);
  const upper = midPrice * (1 + bandPct);

  let bidWallVolume = 0;
  for (const level of bids) {
    if (level.price >= lower) bidWallVolume += level.volume;
  }
  let askWallVolume = 0;
  for (const level of asks) {
    if (level.price <= upper) askWallVolume += level.volume;
  }

  return {
    symbol,
    bestBid,
    bestAsk,
    midPrice,
    bandPct,
    bidWallVolume,
    askWallVolume,
    wallRatio: askWallVolume > 0 ? bidWallVolume / askWallVolume : null,
  };
}
