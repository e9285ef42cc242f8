/**
 * Funding rate (contrarian).
 * Crowded longs pay high positive funding → DOWN; crowded shorts → UP.
 */

import type { FundingPayload, SourceSnapshot } from '../contracts/source.types.js';
import type { SubSignalResult } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { neutral, pct, vote } from './vote.js';

export function evaluateFunding(
  snapshot: SourceSnapshot<FundingPayload>,
  config: EvaluatorConfig
): SubSignalResult | null {
  if (snapshot.status !== 'ok') return null;

  const rate = snapshot.payload.currentRate;
  const weight = config.weights.funding;

  if (rate >= config.fundingHigh) {
    return vote(
      'funding',
      'DOWN',
      rate / (config.fundingHigh * 3),
      weight,
      `Funding ${pct(rate)}: longs crowded, risk of pullback`
    );
  }

  if (rate <= config.fundingLow) {
    return vote(
      'funding',
      'UP',
      Math.abs(rate) / (Math.abs(config.fundingLow) * 3),
      weight,
      `Funding ${pct(rate)}: shorts crowded, risk of squeeze up`
    );
  }

  return neutral('funding', weight, `Funding ${pct(rate)}: within normal range`);
}
