/**
 * Order-book wall imbalance: bid wall → support below (UP),
 * ask wall → resistance above (DOWN).
 */

import type { OrderBookWallPayload, SourceSnapshot } from '../contracts/source.types.js';
import type { SubSignalResult } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { neutral, vote } from './vote.js';

export function evaluateOrderBook(
  snapshot: SourceSnapshot<OrderBookWallPayload>,
  config: EvaluatorConfig
): SubSignalResult | null {
  if (snapshot.status !== 'ok') return null;

  const { bidWallVolume: bid, askWallVolume: ask, wallRatio } = snapshot.payload;
  const weight = config.weights.orderBook;

  if (bid <= 0 && ask <= 0) {
    return neutral('orderBook', weight, 'Order book empty within band');
  }

  const ratio = wallRatio ?? Infinity;
  const walls = `bids ${bid.toFixed(2)} vs asks ${ask.toFixed(2)}`;
  const ratioText = Number.isFinite(ratio) ? ratio.toFixed(2) : 'no asks';

  if (ratio >= config.wallBidStrong) {
    return vote('orderBook', 'UP', (ratio - 1) / 2, weight, `Bid wall dominant, ${walls} (ratio ${ratioText}): support below`);
  }

  if (ratio <= config.wallAskStrong) {
    return vote('orderBook', 'DOWN', (1 - ratio) / 0.5, weight, `Ask wall dominant, ${walls} (ratio ${ratioText}): resistance above`);
  }

  return neutral('orderBook', weight, `Walls balanced, ratio ${ratioText}`);
}
