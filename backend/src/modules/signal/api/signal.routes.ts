/**
 * SIGNAL API ROUTES
 * =================
 *
 * Read-only views over the published CacheState. Handlers never fetch
 * upstream data or wait on a refresh.
 *
 * ENDPOINTS (under /api):
 *   GET /dashboard-data   - Full published state
 *   GET /signal           - Verdict, odds value and sub-signals
 *   GET /signal-history   - Past verdicts, oldest first (?limit=n keeps the newest n)
 *   GET /bet-suggestion   - Verdict with vote counts and market line
 *   GET /derivatives      - Funding, open interest, long/short, liquidations
 *   GET /order-book       - Order book wall strength
 *   GET /news             - Headlines and sentiment
 *   GET /polymarket       - Prediction market context
 *   GET /health           - Liveness + refresh status (always 200)
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import { okPayload } from '../contracts/source.types.js';
import type { SignalCache } from '../runtime/signal.cache.js';
import type { RefreshCoordinator } from '../runtime/refresh.coordinator.js';

export type SignalRoutesOptions = {
  cache: SignalCache;
  coordinator: RefreshCoordinator;
  now?: () => number;
};

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

function ageSeconds(ageMs: number | null): number | null {
  return ageMs === null ? null : Math.round(ageMs / 100) / 10;
}

export const signalRoutes: FastifyPluginAsync<SignalRoutesOptions> = async (fastify, opts) => {
  const { cache, coordinator } = opts;
  const now = opts.now ?? Date.now;

  // ═══════════════════════════════════════════════════════════════
  // DASHBOARD
  // ═══════════════════════════════════════════════════════════════

  fastify.get('/dashboard-data', async () => {
    const state = cache.get();
    return { ok: true, ...state, cacheAgeSeconds: ageSeconds(cache.ageMs(now())) };
  });

  fastify.get('/signal', async () => {
    const state = cache.get();
    return {
      ok: true,
      btcPrice: okPayload(state.latestSnapshots.price)?.price ?? null,
      verdict: state.latestVerdict,
      oddsValue: state.oddsValue,
      signals: state.latestVerdict.contributingSignals,
      timestamp: state.lastUpdated,
    };
  });

  /**
   * Available before the first publish (empty list).
   */
  fastify.get('/signal-history', async (request) => {
    const parsed = historyQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new ValidationError('limit must be an integer between 1 and 1000');
    }
    const history = cache.getHistory(parsed.data.limit);
    return { ok: true, history, count: history.length };
  });

  fastify.get('/bet-suggestion', async () => {
    const state = cache.get();
    const verdict = state.latestVerdict;
    return {
      ok: true,
      finalSignal: verdict.direction,
      confidence: verdict.confidence,
      upAttributesCount: verdict.upCount,
      downAttributesCount: verdict.downCount,
      oddsValue: state.oddsValue,
      polymarketLine: okPayload(state.latestSnapshots.polymarket),
      timestamp: verdict.timestamp,
    };
  });

  // ═══════════════════════════════════════════════════════════════
  // RAW SNAPSHOTS
  // ═══════════════════════════════════════════════════════════════

  fastify.get('/derivatives', async () => {
    const { funding, openInterest, longShortRatio, liquidations } = cache.get().latestSnapshots;
    return { ok: true, funding, openInterest, longShortRatio, liquidations };
  });

  fastify.get('/order-book', async () => {
    return { ok: true, orderBook: cache.get().latestSnapshots.orderBook };
  });

  fastify.get('/news', async () => {
    return { ok: true, news: cache.get().latestSnapshots.news };
  });

  fastify.get('/polymarket', async () => {
    return { ok: true, polymarket: cache.get().latestSnapshots.polymarket };
  });

  // ═══════════════════════════════════════════════════════════════
  // HEALTH
  // ═══════════════════════════════════════════════════════════════

  fastify.get('/health', async () => {
    const stats = cache.stats();
    return {
      ok: true,
      status: 'ok',
      populated: stats.populated,
      lastUpdated: stats.lastUpdated,
      cacheAgeSeconds: ageSeconds(cache.ageMs(now())),
      publishes: stats.publishes,
      history: { size: stats.historySize, capacity: stats.historyCapacity },
      refresh: coordinator.status(),
    };
  });
};
