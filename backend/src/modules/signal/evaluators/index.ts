import type { SnapshotMap } from '../contracts/source.types.js';
import type { SubSignalResult } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { evaluateFunding } from './funding.evaluator.js';
import { evaluateLiquidations } from './liquidations.evaluator.js';
import { evaluateOrderBook } from './order-book.evaluator.js';
import { evaluateLongShort } from './long-short.evaluator.js';
import { evaluateNews } from './news.evaluator.js';

export { evaluateFunding, evaluateLiquidations, evaluateOrderBook, evaluateLongShort, evaluateNews };

/**
 * Run every evaluator over the cycle's snapshots. Failed sources are absent
 * from the result, never NEUTRAL.
 */
export function evaluateSignals(snapshots: SnapshotMap, config: EvaluatorConfig): SubSignalResult[] {
  const results = [
    evaluateFunding(snapshots.funding, config),
    evaluateLiquidations(snapshots.liquidations, config),
    evaluateOrderBook(snapshots.orderBook, config),
    evaluateLongShort(snapshots.longShortRatio, config),
    evaluateNews(snapshots.news, config),
  ];
  return results.filter((r): r is SubSignalResult => r !== null);
}
