/**
 * SIGNAL TYPES
 * ============
 *
 * Sub-signals → weighted vote → Verdict → published CacheState.
 * Every value here is produced once per refresh cycle and never mutated.
 */

import type { SnapshotMap } from './source.types.js';

export type SignalName = 'funding' | 'liquidations' | 'orderBook' | 'longShortRatio' | 'news';

// Canonical order: sums over signals always run in this order.
export const SIGNAL_ORDER: readonly SignalName[] = [
  'funding',
  'liquidations',
  'orderBook',
  'longShortRatio',
  'news',
];

export type VoteDirection = 'UP' | 'DOWN' | 'NEUTRAL';
export type VerdictDirection = 'UP' | 'DOWN' | 'SKIP';

export type SubSignalResult = {
  readonly source: SignalName;
  readonly direction: VoteDirection;
  readonly strength: number;   // 0..1, 0 inside the dead zone
  readonly weight: number;
  readonly explanation: string;
};

export type VerdictReason =
  | 'THRESHOLD_UP'
  | 'THRESHOLD_DOWN'
  | 'BELOW_THRESHOLD'
  | 'INSUFFICIENT_AGREEMENT'
  | 'INSUFFICIENT_DATA';

export type Verdict = {
  readonly direction: VerdictDirection;
  readonly confidence: number;       // 0..1; a SKIP stays under the threshold on its score's side
  readonly weightedScore: number;
  readonly normalizedScore: number;  // weightedScore / availableWeight
  readonly availableWeight: number;
  readonly contributingSignals: readonly SubSignalResult[];
  readonly upCount: number;
  readonly downCount: number;
  readonly neutralCount: number;
  readonly totalSignals: number;
  readonly insufficientData: boolean;
  readonly reason: VerdictReason;
  readonly thresholds: { readonly up: number; readonly down: number };
  readonly timestamp: number;
};

export type OddsValue = {
  readonly hasValue: boolean;
  readonly sharePrice?: number;
  readonly potentialPayout?: number;
  readonly detail: string;
};

export type CacheState = {
  readonly cycleId: string;
  readonly cycle: number;
  readonly latestVerdict: Verdict;
  readonly latestSnapshots: SnapshotMap;
  readonly oddsValue: OddsValue;
  readonly lastUpdated: number;
  readonly cycleDurationMs: number;
};

export type HistoryEntry = {
  readonly cycleId: string;
  readonly verdict: Verdict;
  readonly btcPriceAtTime: number | null;
};
