/**
 * Shared helpers for the sub-signal evaluators.
 */

import type { SignalName, SubSignalResult, VoteDirection } from '../contracts/signal.types.js';

/**
 * Clamp to [0,1]. Infinity saturates at 1 (a one-sided book or
 * liquidation tape is maximally lopsided), NaN collapses to 0.
 */
export function toStrength(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

export function vote(
  source: SignalName,
  direction: VoteDirection,
  strength: number,
  weight: number,
  explanation: string
): SubSignalResult {
  const s = direction === 'NEUTRAL' ? 0 : toStrength(strength);
  return Object.freeze({
    source,
    direction: s === 0 ? 'NEUTRAL' : direction,
    strength: s,
    weight,
    explanation,
  });
}

export function neutral(source: SignalName, weight: number, explanation: string): SubSignalResult {
  return vote(source, 'NEUTRAL', 0, weight, explanation);
}

export function pct(rate: number, digits = 4): string {
  return `${(rate * 100).toFixed(digits)}%`;
}

export function usd(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}
