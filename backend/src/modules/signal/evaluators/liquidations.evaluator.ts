/**
 * Liquidation skew.
 *
 * `continuation`: the side being liquidated keeps getting pushed, so
 * long-dominant liquidations vote DOWN and short-dominant vote UP.
 * `exhaustion`: the flushed side is done selling (or buying), so the vote
 * flips to the bounce.
 */

import type { LiquidationPayload, SourceSnapshot } from '../contracts/source.types.js';
import type { SubSignalResult, VoteDirection } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { neutral, usd, vote } from './vote.js';

function dominanceRatio(side: number, other: number): number {
  if (other > 0) return side / other;
  return side > 0 ? Infinity : 0;
}

export function evaluateLiquidations(
  snapshot: SourceSnapshot<LiquidationPayload>,
  config: EvaluatorConfig
): SubSignalResult | null {
  if (snapshot.status !== 'ok') return null;

  const { longUsd, shortUsd, totalUsd } = snapshot.payload;
  const weight = config.weights.liquidations;

  if (totalUsd <= 0) {
    return neutral('liquidations', weight, 'No recent liquidations');
  }

  const longRatio = dominanceRatio(longUsd, shortUsd);
  const shortRatio = dominanceRatio(shortUsd, longUsd);
  const exhaustion = config.liquidationMode === 'exhaustion';

  if (longRatio >= config.liquidationDominance) {
    const direction: VoteDirection = exhaustion ? 'UP' : 'DOWN';
    const read = exhaustion ? 'longs flushed, bounce likely' : 'longs capitulating, downside continuation';
    return vote(
      'liquidations',
      direction,
      (longRatio - 1) / 3,
      weight,
      `Long liqs ${usd(longUsd)} vs short ${usd(shortUsd)} (ratio ${formatRatio(longRatio)}): ${read}`
    );
  }

  if (shortRatio >= config.liquidationDominance) {
    const direction: VoteDirection = exhaustion ? 'DOWN' : 'UP';
    const read = exhaustion ? 'shorts squeezed, pullback likely' : 'short squeeze, upside continuation';
    return vote(
      'liquidations',
      direction,
      (shortRatio - 1) / 3,
      weight,
      `Short liqs ${usd(shortUsd)} vs long ${usd(longUsd)} (ratio ${formatRatio(shortRatio)}): ${read}`
    );
  }

  return neutral(
    'liquidations',
    weight,
    `Liquidations balanced: long ${usd(longUsd)} vs short ${usd(shortUsd)}`
  );
}

function formatRatio(ratio: number): string {
  return Number.isFinite(ratio) ? `${ratio.toFixed(1)}x` : 'one-sided';
}
