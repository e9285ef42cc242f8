/**
 * Long/short account ratio (contrarian).
 * Strength is the distance from a balanced book (ratio 1) in units of the
 * configured band: 1/3 at the threshold, saturating at three times it.
 */

import type { LongShortPayload, SourceSnapshot } from '../contracts/source.types.js';
import type { SubSignalResult } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { neutral, vote } from './vote.js';

export function evaluateLongShort(
  snapshot: SourceSnapshot<LongShortPayload>,
  config: EvaluatorConfig
): SubSignalResult | null {
  if (snapshot.status !== 'ok') return null;

  const ratio = snapshot.payload.currentRatio;
  const weight = config.weights.longShortRatio;
  const text = ratio.toFixed(2);

  if (ratio >= config.longShortHigh) {
    return vote(
      'longShortRatio',
      'DOWN',
      (ratio - 1) / ((config.longShortHigh - 1) * 3),
      weight,
      `L/S ratio ${text}: longs very crowded (contrarian bearish)`
    );
  }

  if (ratio <= config.longShortLow) {
    return vote(
      'longShortRatio',
      'UP',
      (1 - ratio) / ((1 - config.longShortLow) * 3),
      weight,
      `L/S ratio ${text}: shorts very crowded (contrarian bullish)`
    );
  }

  return neutral('longShortRatio', weight, `L/S ratio ${text}: within normal range`);
}
