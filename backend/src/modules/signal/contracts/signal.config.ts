/**
 * SIGNAL CONFIG
 * =============
 *
 * Weights and thresholds for the evaluators and the decision engine.
 * Built once at boot and passed in at construction; nothing reads it from
 * ambient state.
 */

import { z } from 'zod';

export const neutralPolicySchema = z.enum(['dilute', 'exclude']);
export const liquidationModeSchema = z.enum(['continuation', 'exhaustion']);

export type NeutralPolicy = z.infer<typeof neutralPolicySchema>;
export type LiquidationMode = z.infer<typeof liquidationModeSchema>;

const threshold = z.number().gt(0).lte(1);
const weight = z.number().gt(0).lte(10);

export const decisionConfigSchema = z.object({
  upThreshold: threshold.default(0.3),
  downThreshold: threshold.default(0.3),
  minAgreeingSignals: z.number().int().min(0).max(5).default(1),
  neutralPolicy: neutralPolicySchema.default('dilute'),
});

export const evaluatorConfigSchema = z
  .object({
    weights: z
      .object({
        funding: weight.default(1.5),
        liquidations: weight.default(1.5),
        orderBook: weight.default(1.0),
        longShortRatio: weight.default(0.5),
        news: weight.default(0.5),
      })
      .default({}),
    fundingHigh: z.number().gt(0).default(0.0001),
    fundingLow: z.number().lt(0).default(-0.0001),
    liquidationDominance: z.number().gt(1).default(1.5),
    liquidationMode: liquidationModeSchema.default('continuation'),
    wallBidStrong: z.number().gt(1).default(1.3),
    wallAskStrong: z.number().gt(0).lt(1).default(0.77),
    longShortHigh: z.number().gt(1).default(2.5),
    longShortLow: z.number().gt(0).lt(1).default(0.7),
    newsBand: z.number().min(0).lt(1).default(0.1),
  })
  .refine((c) => c.longShortHigh > c.longShortLow, {
    message: 'longShortHigh must exceed longShortLow',
  });

export type DecisionConfig = z.infer<typeof decisionConfigSchema>;
export type EvaluatorConfig = z.infer<typeof evaluatorConfigSchema>;

export type DecisionConfigInput = z.input<typeof decisionConfigSchema>;
export type EvaluatorConfigInput = z.input<typeof evaluatorConfigSchema>;

export const DEFAULT_DECISION_CONFIG: DecisionConfig = decisionConfigSchema.parse({});
export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = evaluatorConfigSchema.parse({});

export function buildEvaluatorConfig(input: EvaluatorConfigInput = {}): EvaluatorConfig {
  return evaluatorConfigSchema.parse(input);
}
