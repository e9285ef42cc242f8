/**
 * Prediction-market odds check: a directional verdict is only worth acting on
 * when the matching outcome share is cheap enough.
 */

import type { PolymarketPayload } from '../contracts/source.types.js';
import type { OddsValue, VerdictDirection } from '../contracts/signal.types.js';

export const DEFAULT_MAX_SHARE_PRICE = 0.55;

const OUTCOME_LABEL: Record<'UP' | 'DOWN', string> = { UP: 'Up', DOWN: 'Down' };

export function checkOddsValue(
  market: PolymarketPayload | null,
  direction: VerdictDirection,
  maxSharePrice: number = DEFAULT_MAX_SHARE_PRICE
): OddsValue {
  if (!market) {
    return { hasValue: false, detail: 'No Polymarket data' };
  }
  if (direction === 'SKIP') {
    return { hasValue: false, detail: 'Signal is SKIP, no bet' };
  }

  const price = market.outcomes[OUTCOME_LABEL[direction]]?.price ?? null;
  if (price === null || price <= 0) {
    return { hasValue: false, detail: 'No price for target outcome' };
  }

  if (price <= maxSharePrice) {
    const payout = 1 / price;
    return {
      hasValue: true,
      sharePrice: price,
      potentialPayout: Math.round(payout * 100) / 100,
      detail: `${direction} shares at $${price.toFixed(2)} → ${payout.toFixed(2)}x payout if correct`,
    };
  }

  return {
    hasValue: false,
    sharePrice: price,
    detail: `${direction} shares at $${price.toFixed(2)}: too expensive (max $${maxSharePrice.toFixed(2)})`,
  };
}
