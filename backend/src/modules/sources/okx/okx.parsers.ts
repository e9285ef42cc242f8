/**
 * OKX v5 public payloads for BTC-USDT-SWAP.
 *
 * Every response is wrapped as { code: "0", msg: "", data: [...] }; a
 * non-zero code is an upstream failure even on HTTP 200.
 */

import { z } from 'zod';
import { FetchError } from '../../signal/contracts/fetch.error.js';
import type {
  FundingPayload,
  LiquidationEvent,
  LiquidationPayload,
  LongShortPayload,
  OpenInterestPayload,
  SourceName,
} from '../../signal/contracts/source.types.js';
import { numeric, parseOrThrow } from '../source.utils.js';

export const OKX_INSTRUMENT = 'BTC-USDT-SWAP';
export const OKX_UNDERLYING = 'BTC-USDT';
export const OKX_CURRENCY = 'BTC';

// BTC per BTC-USDT-SWAP contract
export const CONTRACT_VALUE_BTC = 0.01;

export const LONG_SHORT_HISTORY_POINTS = 12;
export const RECENT_LIQUIDATION_EVENTS = 20;

function okxEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    code: z.string(),
    msg: z.string().optional(),
    data: z.array(item).default([]),
  });
}

function unwrap<T>(parsed: { code: string; msg?: string; data: T[] }, source: SourceName): T[] {
  if (parsed.code !== '0') {
    throw new FetchError('UPSTREAM', source, `OKX error ${parsed.code}: ${parsed.msg || 'unknown'}`);
  }
  return parsed.data;
}

function firstItem<T>(items: T[], source: SourceName): T {
  const first = items[0];
  if (first === undefined) {
    throw new FetchError('UPSTREAM', source, 'OKX returned no data');
  }
  return first;
}

// ═══════════════════════════════════════════════════════════════
// FUNDING
// ═══════════════════════════════════════════════════════════════

const fundingRateSchema = okxEnvelope(
  z.object({
    instId: z.string(),
    fundingRate: numeric,
    fundingTime: numeric.optional(),
  })
);

const fundingHistorySchema = okxEnvelope(
  z.object({
    fundingRate: numeric,
    fundingTime: numeric,
  })
);

export function parseFundingRate(data: unknown): Omit<FundingPayload, 'recentRates'> {
  const item = firstItem(unwrap(parseOrThrow(fundingRateSchema, data, 'funding'), 'funding'), 'funding');
  return {
    instrument: item.instId,
    currentRate: item.fundingRate,
    nextFundingTime: item.fundingTime ?? null,
  };
}

export function parseFundingHistory(data: unknown): FundingPayload['recentRates'] {
  return unwrap(parseOrThrow(fundingHistorySchema, data, 'funding'), 'funding').map((item) => ({
    rate: item.fundingRate,
    time: item.fundingTime,
  }));
}

// ═══════════════════════════════════════════════════════════════
// OPEN INTEREST
// ═══════════════════════════════════════════════════════════════

const openInterestSchema = okxEnvelope(
  z.object({
    instId: z.string(),
    oi: numeric,
    oiCcy: numeric,
    ts: numeric,
  })
);

export function parseOpenInterest(data: unknown): OpenInterestPayload {
  const item = firstItem(
    unwrap(parseOrThrow(openInterestSchema, data, 'openInterest'), 'openInterest'),
    'openInterest'
  );
  return { instrument: item.instId, contracts: item.oi, btc: item.oiCcy, timestamp: item.ts };
}

// ═══════════════════════════════════════════════════════════════
// LONG / SHORT ACCOUNT RATIO
// ═══════════════════════════════════════════════════════════════

// rows are [ts, ratio], newest first
const longShortSchema = okxEnvelope(z.tuple([numeric, numeric]).rest(z.unknown()));

export function parseLongShortRatio(data: unknown): LongShortPayload {
  const rows = unwrap(parseOrThrow(longShortSchema, data, 'longShortRatio'), 'longShortRatio');
  const history = rows.slice(0, LONG_SHORT_HISTORY_POINTS).map(([timestamp, ratio]) => ({ timestamp, ratio }));
  const current = firstItem(history, 'longShortRatio');
  return { currency: OKX_CURRENCY, currentRatio: current.ratio, history };
}

// ═══════════════════════════════════════════════════════════════
// LIQUIDATIONS
// ═══════════════════════════════════════════════════════════════

const liquidationSchema = okxEnvelope(
  z.object({
    details: z
      .array(
        z.object({
          bkPx: numeric,
          sz: numeric,
          posSide: z.string().optional(),
          ts: numeric,
        })
      )
      .default([]),
  })
);

export function parseLiquidations(data: unknown): LiquidationPayload {
  const batches = unwrap(parseOrThrow(liquidationSchema, data, 'liquidations'), 'liquidations');

  let longUsd = 0;
  let shortUsd = 0;
  let longCount = 0;
  let shortCount = 0;
  const events: LiquidationEvent[] = [];

  for (const batch of batches) {
    for (const detail of batch.details) {
      const sizeBtc = detail.sz * CONTRACT_VALUE_BTC;
      const valueUsd = detail.bkPx * sizeBtc;
      const side = detail.posSide === 'long' || detail.posSide === 'short' ? detail.posSide : 'unknown';

      if (side === 'long') {
        longUsd += valueUsd;
        longCount++;
      } else if (side === 'short') {
        shortUsd += valueUsd;
        shortCount++;
      }

      events.push({ side, price: detail.bkPx, sizeBtc, valueUsd, time: detail.ts });
    }
  }

  events.sort((a, b) => b.time - a.time);

  return {
    longUsd,
    shortUsd,
    longCount,
    shortCount,
    totalUsd: longUsd + shortUsd,
    recentEvents: events.slice(0, RECENT_LIQUIDATION_EVENTS),
  };
}
