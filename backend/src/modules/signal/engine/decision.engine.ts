/**
 * DECISION ENGINE
 * ===============
 *
 * Weighted vote over the sub-signals produced this cycle.
 *
 * FORMULA:
 * --------
 * weightedScore   = Σ weight × strength × sign(direction)   (UP +1, DOWN −1, NEUTRAL 0)
 * availableWeight = Σ weight over present signals
 *                   (neutralPolicy 'exclude' leaves NEUTRAL votes out)
 * normalizedScore = weightedScore / availableWeight, 0 when no weight
 * direction       = UP   if normalizedScore ≥ +upThreshold
 *                   DOWN if normalizedScore ≤ −downThreshold
 *                   SKIP otherwise
 * confidence      = min(1, |normalizedScore|)
 *
 * A below-threshold SKIP keeps |normalizedScore| as its confidence, which is
 * under the threshold on the score's own side (downThreshold for a negative
 * score). With asymmetric thresholds it may exceed the other side's.
 *
 * Failed sources never reach the engine; they are absent from the input
 * rather than NEUTRAL. With nothing available the verdict is an explicit
 * INSUFFICIENT_DATA SKIP at confidence 0.
 */

import {
  SIGNAL_ORDER,
  type SubSignalResult,
  type Verdict,
  type VerdictDirection,
  type VerdictReason,
  type VoteDirection,
} from '../contracts/signal.types.js';
import {
  decisionConfigSchema,
  type DecisionConfig,
  type DecisionConfigInput,
  type NeutralPolicy,
} from '../contracts/signal.config.js';

export type ScoreBreakdown = {
  ordered: SubSignalResult[];
  weightedScore: number;
  availableWeight: number;
  normalizedScore: number;
  upCount: number;
  downCount: number;
  neutralCount: number;
};

const DIRECTION_SIGN: Record<VoteDirection, number> = { UP: 1, DOWN: -1, NEUTRAL: 0 };

function compareSignals(a: SubSignalResult, b: SubSignalResult): number {
  const byName = SIGNAL_ORDER.indexOf(a.source) - SIGNAL_ORDER.indexOf(b.source);
  if (byName !== 0) return byName;
  if (a.direction !== b.direction) return a.direction < b.direction ? -1 : 1;
  if (a.strength !== b.strength) return a.strength - b.strength;
  if (a.weight !== b.weight) return a.weight - b.weight;
  if (a.explanation === b.explanation) return 0;
  return a.explanation < b.explanation ? -1 : 1;
}

/**
 * Sort into canonical order, then sum. Floating-point addition is not
 * associative, so the order is fixed before any arithmetic.
 */
export function scoreSignals(
  signals: readonly SubSignalResult[],
  neutralPolicy: NeutralPolicy
): ScoreBreakdown {
  const ordered = [...signals].sort(compareSignals);

  let weightedScore = 0;
  let availableWeight = 0;
  let upCount = 0;
  let downCount = 0;
  let neutralCount = 0;

  for (const s of ordered) {
    weightedScore += s.weight * s.strength * DIRECTION_SIGN[s.direction];

    if (s.direction === 'UP') upCount++;
    else if (s.direction === 'DOWN') downCount++;
    else neutralCount++;

    if (s.direction === 'NEUTRAL' && neutralPolicy === 'exclude') continue;
    availableWeight += s.weight;
  }

  const normalizedScore = availableWeight > 0 ? weightedScore / availableWeight : 0;

  return { ordered, weightedScore, availableWeight, normalizedScore, upCount, downCount, neutralCount };
}

export class DecisionEngine {
  readonly config: Readonly<DecisionConfig>;

  constructor(config: DecisionConfigInput = {}) {
    this.config = Object.freeze(decisionConfigSchema.parse(config));
  }

  decide(signals: readonly SubSignalResult[], timestamp: number): Verdict {
    const { upThreshold, downThreshold, minAgreeingSignals, neutralPolicy } = this.config;
    const score = scoreSignals(signals, neutralPolicy);
    const thresholds = { up: upThreshold, down: downThreshold };

    const base = {
      weightedScore: score.weightedScore,
      normalizedScore: score.normalizedScore,
      availableWeight: score.availableWeight,
      contributingSignals: score.ordered,
      upCount: score.upCount,
      downCount: score.downCount,
      neutralCount: score.neutralCount,
      totalSignals: SIGNAL_ORDER.length,
      thresholds,
      timestamp,
    };

    if (score.ordered.length === 0 || score.availableWeight <= 0) {
      return this.finish({ ...base, direction: 'SKIP', confidence: 0, insufficientData: true, reason: 'INSUFFICIENT_DATA' });
    }

    const n = score.normalizedScore;
    const magnitude = Math.min(1, Math.abs(n));

    let candidate: 'UP' | 'DOWN' | null = null;
    if (n >= upThreshold) candidate = 'UP';
    else if (n <= -downThreshold) candidate = 'DOWN';

    if (candidate === null) {
      return this.finish({ ...base, direction: 'SKIP', confidence: magnitude, insufficientData: false, reason: 'BELOW_THRESHOLD' });
    }

    const agreeing = candidate === 'UP' ? score.upCount : score.downCount;
    if (agreeing < minAgreeingSignals) {
      // Scaled by the share of required agreement reached, so it stays under the threshold crossed.
      const threshold = candidate === 'UP' ? upThreshold : downThreshold;
      const confidence = Math.min(magnitude, threshold) * (agreeing / minAgreeingSignals);
      return this.finish({ ...base, direction: 'SKIP', confidence, insufficientData: false, reason: 'INSUFFICIENT_AGREEMENT' });
    }

    const direction: VerdictDirection = candidate;
    const reason: VerdictReason = candidate === 'UP' ? 'THRESHOLD_UP' : 'THRESHOLD_DOWN';
    return this.finish({ ...base, direction, confidence: magnitude, insufficientData: false, reason });
  }

  private finish(verdict: Verdict): Verdict {
    return Object.freeze({
      ...verdict,
      contributingSignals: Object.freeze([...verdict.contributingSignals]),
      thresholds: Object.freeze({ ...verdict.thresholds }),
    });
  }
}
