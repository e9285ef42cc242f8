/**
 * SIGNAL CACHE
 * ============
 *
 * The read side of the service. Holds exactly one published CacheState and
 * the verdict history.
 *
 * - One writer (the refresh coordinator) calls `publish`; it swaps the whole
 *   state in a single synchronous step and appends history in the same step,
 *   so a reader sees cycle N or cycle N+1, never a mix.
 * - Published values are deep-frozen; readers get the shared reference.
 * - Reads never wait on a refresh in progress.
 */

import { CacheUnpopulatedError } from '../../../common/errors.js';
import type { CacheState, HistoryEntry } from '../contracts/signal.types.js';
import { HistoryLog } from './history.log.js';
import { deepFreeze } from './utils.js';

export type SignalCacheStats = {
  populated: boolean;
  publishes: number;
  lastUpdated: number | null;
  historySize: number;
  historyCapacity: number;
};

export class SignalCache {
  private state: CacheState | null = null;
  private publishes = 0;

  constructor(private readonly history: HistoryLog<HistoryEntry> = new HistoryLog<HistoryEntry>()) {}

  publish(state: CacheState, entry: HistoryEntry): void {
    const frozenState = deepFreeze(state);
    const frozenEntry = deepFreeze(entry);
    this.state = frozenState;
    this.history.append(frozenEntry);
    this.publishes++;
  }

  /**
   * Last fully published state.
   * @throws CacheUnpopulatedError before the first publish
   */
  get(): CacheState {
    if (!this.state) throw new CacheUnpopulatedError();
    return this.state;
  }

  peek(): CacheState | null {
    return this.state;
  }

  isPopulated(): boolean {
    return this.state !== null;
  }

  ageMs(now: number = Date.now()): number | null {
    return this.state ? now - this.state.lastUpdated : null;
  }

  /**
   * Chronological (oldest → newest); `limit` keeps the most recent entries.
   */
  getHistory(limit?: number): HistoryEntry[] {
    return limit === undefined ? this.history.snapshot() : this.history.latest(limit);
  }

  stats(): SignalCacheStats {
    return {
      populated: this.state !== null,
      publishes: this.publishes,
      lastUpdated: this.state?.lastUpdated ?? null,
      historySize: this.history.size,
      historyCapacity: this.history.capacity,
    };
  }
}
