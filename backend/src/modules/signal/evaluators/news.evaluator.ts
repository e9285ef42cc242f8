/**
 * Aggregated headline sentiment.
 */

import type { NewsPayload, SourceSnapshot } from '../contracts/source.types.js';
import type { SubSignalResult } from '../contracts/signal.types.js';
import type { EvaluatorConfig } from '../contracts/signal.config.js';
import { neutral, vote } from './vote.js';

export function evaluateNews(
  snapshot: SourceSnapshot<NewsPayload>,
  config: EvaluatorConfig
): SubSignalResult | null {
  if (snapshot.status !== 'ok') return null;

  const { avgScore, bullishCount, bearishCount } = snapshot.payload;
  const weight = config.weights.news;
  const counts = `${bullishCount} bullish, ${bearishCount} bearish headlines`;

  if (avgScore > config.newsBand) {
    return vote('news', 'UP', avgScore, weight, `News sentiment bullish (score ${avgScore.toFixed(3)}): ${counts}`);
  }

  if (avgScore < -config.newsBand) {
    return vote('news', 'DOWN', Math.abs(avgScore), weight, `News sentiment bearish (score ${avgScore.toFixed(3)}): ${counts}`);
  }

  return neutral('news', weight, `News sentiment neutral (score ${avgScore.toFixed(3)})`);
}
