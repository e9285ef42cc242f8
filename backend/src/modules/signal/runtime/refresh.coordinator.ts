/**
 * REFRESH COORDINATOR
 * ===================
 *
 * Background job that owns the refresh cycle:
 *
 *   fetch all sources (concurrently, each with its own timeout)
 *     → evaluate sub-signals
 *     → decide verdict
 *     → check prediction-market odds
 *     → publish one CacheState + one history entry
 *
 * - At most one cycle in flight; a trigger that lands on a running cycle is
 *   skipped, not queued.
 * - A failed or slow source degrades to a FailedSnapshot. It never aborts the
 *   cycle and is never retried within it.
 * - Runs until `stop()`, which waits for the in-flight cycle to settle.
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage, silentLogger, type Logger } from '../../../common/logger.js';
import { toFetchError } from '../../network/http.errors.js';
import { FetchError } from '../contracts/fetch.error.js';
import {
  okPayload,
  SOURCE_NAMES,
  type SnapshotMap,
  type SourceClients,
  type SourceName,
  type SourcePayloads,
  type SourceSnapshot,
} from '../contracts/source.types.js';
import type { CacheState, Verdict } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { evaluateSignals } from '../evaluators/index.js';
import type { DecisionEngine } from '../engine/decision.engine.js';
import { checkOddsValue, DEFAULT_MAX_SHARE_PRICE } from '../engine/odds-value.js';
import type { SignalCache } from './signal.cache.js';
import { withTimeout } from './utils.js';

export const DEFAULT_REFRESH_INTERVAL_MS = 45_000;
export const DEFAULT_SOURCE_TIMEOUT_MS = 10_000;

export type RefreshCoordinatorOptions = {
  clients: SourceClients;
  cache: SignalCache;
  engine: DecisionEngine;
  evaluatorConfig: EvaluatorConfig;
  intervalMs?: number;
  sourceTimeoutMs?: number;
  maxSharePrice?: number;
  logger?: Logger;
  now?: () => number;
  newCycleId?: () => string;
};

export type CycleOutcome =
  | {
      status: 'published';
      cycleId: string;
      cycle: number;
      durationMs: number;
      failedSources: SourceName[];
      verdict: Verdict;
    }
  | { status: 'skipped'; reason: 'IN_FLIGHT' | 'STOPPED' }
  | { status: 'failed'; error: string };

export type CoordinatorStatus = {
  running: boolean;
  inFlight: boolean;
  intervalMs: number;
  sourceTimeoutMs: number;
  cyclesPublished: number;
  cyclesSkipped: number;
  cyclesFailed: number;
  lastCycleAt: string | null;
  lastCycleDurationMs: number | null;
  lastError: string | null;
};

export class RefreshCoordinator {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private stopped = false;

  private cyclesPublished = 0;
  private cyclesSkipped = 0;
  private cyclesFailed = 0;
  private lastCycleAt = 0;
  private lastCycleDurationMs: number | null = null;
  private lastError: string | null = null;

  private readonly clients: SourceClients;
  private readonly cache: SignalCache;
  private readonly engine: DecisionEngine;
  private readonly evaluatorConfig: EvaluatorConfig;
  private readonly intervalMs: number;
  private readonly sourceTimeoutMs: number;
  private readonly maxSharePrice: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly newCycleId: () => string;

  constructor(options: RefreshCoordinatorOptions) {
    this.clients = options.clients;
    this.cache = options.cache;
    this.engine = options.engine;
    this.evaluatorConfig = options.evaluatorConfig;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
    this.maxSharePrice = options.maxSharePrice ?? DEFAULT_MAX_SHARE_PRICE;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.newCycleId = options.newCycleId ?? (() => uuidv4());
  }

  /**
   * Run one cycle now, then one per interval.
   */
  start(): void {
    if (this.timer) {
      this.logger.warn({}, 'Refresh coordinator already running');
      return;
    }

    this.stopped = false;
    this.logger.info(
      { intervalMs: this.intervalMs, sourceTimeoutMs: this.sourceTimeoutMs },
      'Refresh coordinator starting'
    );

    void this.trigger();
    this.timer = setInterval(() => void this.trigger(), this.intervalMs);
  }

  /**
   * Stop scheduling and wait for the in-flight cycle, if any.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info({ cyclesPublished: this.cyclesPublished }, 'Refresh coordinator stopped');
  }

  /**
   * Run a cycle unless one is already in flight. Never rejects.
   */
  async trigger(): Promise<CycleOutcome> {
    if (this.stopped) {
      return { status: 'skipped', reason: 'STOPPED' };
    }
    if (this.inFlight) {
      this.cyclesSkipped++;
      this.logger.warn({ cyclesSkipped: this.cyclesSkipped }, 'Cycle still in flight, skipping trigger');
      return { status: 'skipped', reason: 'IN_FLIGHT' };
    }

    const run = this.runCycle();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  status(): CoordinatorStatus {
    return {
      running: this.timer !== null,
      inFlight: this.inFlight !== null,
      intervalMs: this.intervalMs,
      sourceTimeoutMs: this.sourceTimeoutMs,
      cyclesPublished: this.cyclesPublished,
      cyclesSkipped: this.cyclesSkipped,
      cyclesFailed: this.cyclesFailed,
      lastCycleAt: this.lastCycleAt ? new Date(this.lastCycleAt).toISOString() : null,
      lastCycleDurationMs: this.lastCycleDurationMs,
      lastError: this.lastError,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // CYCLE
  // ═══════════════════════════════════════════════════════════════

  private async runCycle(): Promise<CycleOutcome> {
    const startedAt = this.now();
    this.lastCycleAt = startedAt;

    try {
      const cycleId = this.newCycleId();
      const snapshots = await this.fetchAll();

      const signals = evaluateSignals(snapshots, this.evaluatorConfig);
      const verdict = this.engine.decide(signals, this.now());
      const oddsValue = checkOddsValue(okPayload(snapshots.polymarket), verdict.direction, this.maxSharePrice);

      const lastUpdated = this.now();
      const cycleDurationMs = lastUpdated - startedAt;
      const cycle = this.cyclesPublished + 1;

      const state: CacheState = {
        cycleId,
        cycle,
        latestVerdict: verdict,
        latestSnapshots: snapshots,
        oddsValue,
        lastUpdated,
        cycleDurationMs,
      };
      this.cache.publish(state, {
        cycleId,
        verdict,
        btcPriceAtTime: okPayload(snapshots.price)?.price ?? null,
      });

      this.cyclesPublished = cycle;
      this.lastCycleDurationMs = cycleDurationMs;
      this.lastError = null;

      const failedSources = failedSourceNames(snapshots);
      this.logger.info(
        {
          cycle,
          cycleId,
          direction: verdict.direction,
          confidence: verdict.confidence,
          normalizedScore: verdict.normalizedScore,
          reason: verdict.reason,
          failedSources,
          durationMs: cycleDurationMs,
        },
        'Signal refreshed'
      );

      return { status: 'published', cycleId, cycle, durationMs: cycleDurationMs, failedSources, verdict };
    } catch (err) {
      // Previous state stays published.
      this.cyclesFailed++;
      this.lastError = errorMessage(err);
      this.logger.error({ err: this.lastError }, 'Refresh cycle failed');
      return { status: 'failed', error: this.lastError };
    }
  }

  private async fetchAll(): Promise<SnapshotMap> {
    const [price, orderBook, funding, openInterest, longShortRatio, liquidations, news, polymarket] =
      await Promise.all([
        this.fetchOne('price'),
        this.fetchOne('orderBook'),
        this.fetchOne('funding'),
        this.fetchOne('openInterest'),
        this.fetchOne('longShortRatio'),
        this.fetchOne('liquidations'),
        this.fetchOne('news'),
        this.fetchOne('polymarket'),
      ]);

    return { price, orderBook, funding, openInterest, longShortRatio, liquidations, news, polymarket };
  }

  private async fetchOne<K extends SourceName>(name: K): Promise<SourceSnapshot<SourcePayloads[K]>> {
    const client = this.clients[name];
    const timeoutMs = this.sourceTimeoutMs;
    const attemptedAt = this.now();

    try {
      const payload = await withTimeout(
        (signal) => client.fetch({ signal, timeoutMs }),
        timeoutMs,
        () => new FetchError('TIMEOUT', name, `${name} timed out after ${timeoutMs}ms`)
      );
      const fetchedAt = this.now();
      return { status: 'ok', payload, fetchedAt, latencyMs: fetchedAt - attemptedAt };
    } catch (err) {
      const error = toFetchError(name, err);
      this.logger.warn({ source: name, kind: error.kind, err: error.message }, 'Source fetch failed');
      return { status: 'failed', error: { kind: error.kind, message: error.message }, attemptedAt };
    }
  }
}

function failedSourceNames(snapshots: SnapshotMap): SourceName[] {
  return SOURCE_NAMES.filter((name) => snapshots[name].status === 'failed');
}
