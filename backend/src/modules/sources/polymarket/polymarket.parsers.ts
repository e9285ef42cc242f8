/**
 * Polymarket gamma `/markets` payloads.
 *
 * `outcomes`, `outcomePrices` and `clobTokenIds` arrive as JSON-encoded
 * strings (sometimes as plain arrays).
 */

import { z } from 'zod';
import { FetchError } from '../../signal/contracts/fetch.error.js';
import type { PolymarketOutcome, PolymarketPayload } from '../../signal/contracts/source.types.js';
import { parseOrThrow } from '../source.utils.js';

const jsonStringArray = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value; // left for the array check to reject
  }
}, z.array(z.union([z.string(), z.number()]).transform(String)));

const marketSchema = z.object({
  question: z.string().default(''),
  endDate: z.string().nullish(),
  slug: z.string().nullish(),
  outcomes: jsonStringArray.default([]),
  outcomePrices: jsonStringArray.default([]),
  clobTokenIds: jsonStringArray.default([]),
});

const marketsSchema = z.union([z.array(marketSchema), z.object({ data: z.array(marketSchema) }).transform((r) => r.data)]);

export type GammaMarket = z.infer<typeof marketSchema>;

function isBitcoinQuestion(question: string): boolean {
  const q = question.toLowerCase();
  return q.includes('btc') || q.includes('bitcoin');
}

function isUpOrDown(question: string): boolean {
  return question.toLowerCase().includes('up or down');
}

/**
 * Keep future BTC markets; "up or down" questions first, otherwise API order.
 * Markets with an unparseable end date are dropped, those without one kept.
 */
export function selectBtcMarkets(markets: GammaMarket[], now: number): GammaMarket[] {
  const open = markets.filter((market) => {
    if (!isBitcoinQuestion(market.question)) return false;
    if (!market.endDate) return true;
    const end = Date.parse(market.endDate);
    return Number.isFinite(end) && end >= now;
  });

  const preferred = open.filter((m) => isUpOrDown(m.question));
  const rest = open.filter((m) => !isUpOrDown(m.question));
  return [...preferred, ...rest];
}

export function toMarketContext(market: GammaMarket): PolymarketPayload {
  const outcomes: Record<string, PolymarketOutcome> = {};

  market.clobTokenIds.forEach((tokenId, i) => {
    const label = market.outcomes[i] ?? `Outcome ${i}`;
    const rawPrice = market.outcomePrices[i];
    const price = rawPrice === undefined ? null : Number(rawPrice);
    outcomes[label] = { tokenId, price: price !== null && Number.isFinite(price) ? price : null };
  });

  return {
    question: market.question,
    endDate: market.endDate ?? null,
    slug: market.slug ?? null,
    outcomes,
  };
}

/**
 * @throws FetchError UPSTREAM when no open BTC market is listed
 */
export function parseMarkets(data: unknown, now: number): PolymarketPayload {
  const markets = parseOrThrow(marketsSchema, data, 'polymarket');
  const selected = selectBtcMarkets(markets, now)[0];
  if (!selected) {
    throw new FetchError('UPSTREAM', 'polymarket', 'No active BTC market found');
  }
  return toMarketContext(selected);
}
