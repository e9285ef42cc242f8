/**
 * ENVIRONMENT CONFIG
 * ==================
 *
 * Every setting comes from process env (after dotenv). Parsed once at boot;
 * any invalid value fails the boot with a ConfigError listing all issues.
 *
 * Signal thresholds and weights are optional here: unset values fall back to
 * the defaults of the signal config schemas, which also range-check them.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';
import {
  decisionConfigSchema,
  evaluatorConfigSchema,
  type DecisionConfig,
  type EvaluatorConfig,
} from '../modules/signal/contracts/signal.config.js';
import { DEFAULT_MAX_SHARE_PRICE } from '../modules/signal/engine/odds-value.js';
import { DEFAULT_HISTORY_CAPACITY } from '../modules/signal/runtime/history.log.js';
import {
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_SOURCE_TIMEOUT_MS,
} from '../modules/signal/runtime/refresh.coordinator.js';
import { DEFAULT_WALL_BAND_PCT } from '../modules/sources/kraken/kraken.provider.js';
import { DEFAULT_LEXICON_PATH } from '../modules/sources/news/lexicon.loader.js';

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());

function intVar(defaultValue: number, min: number, max: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue));
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: intVar(5000, 1, 65535),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  REFRESH_INTERVAL_MS: intVar(DEFAULT_REFRESH_INTERVAL_MS, 5_000, 3_600_000),
  SOURCE_TIMEOUT_MS: intVar(DEFAULT_SOURCE_TIMEOUT_MS, 500, 60_000),
  HISTORY_CAPACITY: intVar(DEFAULT_HISTORY_CAPACITY, 1, 1000),

  UP_THRESHOLD: optionalNumber,
  DOWN_THRESHOLD: optionalNumber,
  MIN_AGREEING_SIGNALS: optionalNumber,
  NEUTRAL_POLICY: z.preprocess(blankToUndefined, z.string().optional()),
  LIQUIDATION_MODE: z.preprocess(blankToUndefined, z.string().optional()),

  FUNDING_HIGH: optionalNumber,
  FUNDING_LOW: optionalNumber,
  LIQUIDATION_DOMINANCE: optionalNumber,
  WALL_BID_STRONG: optionalNumber,
  WALL_ASK_STRONG: optionalNumber,
  LONG_SHORT_HIGH: optionalNumber,
  LONG_SHORT_LOW: optionalNumber,
  NEWS_BAND: optionalNumber,

  WEIGHT_FUNDING: optionalNumber,
  WEIGHT_LIQUIDATIONS: optionalNumber,
  WEIGHT_ORDER_BOOK: optionalNumber,
  WEIGHT_LONG_SHORT: optionalNumber,
  WEIGHT_NEWS: optionalNumber,

  WALL_BAND_PCT: z.preprocess(
    blankToUndefined,
    z.coerce.number().gt(0).lte(0.1).default(DEFAULT_WALL_BAND_PCT)
  ),
  MAX_SHARE_PRICE: z.preprocess(
    blankToUndefined,
    z.coerce.number().gt(0).lte(1).default(DEFAULT_MAX_SHARE_PRICE)
  ),
  HTTPS_PROXY_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SENTIMENT_LEXICON_PATH: z.string().min(1).default(DEFAULT_LEXICON_PATH),
});

export type Env = z.infer<typeof envSchema>;

export type AppConfig = {
  server: {
    nodeEnv: Env['NODE_ENV'];
    host: string;
    port: number;
    logLevel: Env['LOG_LEVEL'];
    corsOrigins: true | string[];
  };
  refresh: {
    intervalMs: number;
    sourceTimeoutMs: number;
    historyCapacity: number;
  };
  decision: DecisionConfig;
  evaluator: EvaluatorConfig;
  sources: {
    wallBandPct: number;
    proxyUrl?: string;
    lexiconPath: string;
  };
  maxSharePrice: number;
};

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    const where = [prefix, path].filter(Boolean).join('.');
    return `${where || '(root)'}: ${issue.message}`;
  });
}

export function parseCorsOrigins(raw: string): true | string[] {
  if (raw.trim() === '*') return true;
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Parse and validate the whole configuration.
 * @throws ConfigError with every issue found
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedEnv = envSchema.safeParse(source);
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error));
  }
  const env = parsedEnv.data;

  const decision = decisionConfigSchema.safeParse({
    upThreshold: env.UP_THRESHOLD,
    downThreshold: env.DOWN_THRESHOLD,
    minAgreeingSignals: env.MIN_AGREEING_SIGNALS,
    neutralPolicy: env.NEUTRAL_POLICY,
  });

  const evaluator = evaluatorConfigSchema.safeParse({
    weights: {
      funding: env.WEIGHT_FUNDING,
      liquidations: env.WEIGHT_LIQUIDATIONS,
      orderBook: env.WEIGHT_ORDER_BOOK,
      longShortRatio: env.WEIGHT_LONG_SHORT,
      news: env.WEIGHT_NEWS,
    },
    fundingHigh: env.FUNDING_HIGH,
    fundingLow: env.FUNDING_LOW,
    liquidationDominance: env.LIQUIDATION_DOMINANCE,
    liquidationMode: env.LIQUIDATION_MODE,
    wallBidStrong: env.WALL_BID_STRONG,
    wallAskStrong: env.WALL_ASK_STRONG,
    longShortHigh: env.LONG_SHORT_HIGH,
    longShortLow: env.LONG_SHORT_LOW,
    newsBand: env.NEWS_BAND,
  });

  const issues: string[] = [];
  if (!decision.success) issues.push(...formatIssues(decision.error, 'decision'));
  if (!evaluator.success) issues.push(...formatIssues(evaluator.error, 'evaluator'));
  if (!decision.success || !evaluator.success) {
    throw new ConfigError(issues);
  }

  return {
    server: {
      nodeEnv: env.NODE_ENV,
      host: env.HOST,
      port: env.PORT,
      logLevel: env.LOG_LEVEL,
      corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    },
    refresh: {
      intervalMs: env.REFRESH_INTERVAL_MS,
      sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
      historyCapacity: env.HISTORY_CAPACITY,
    },
    decision: decision.data,
    evaluator: evaluator.data,
    sources: {
      wallBandPct: env.WALL_BAND_PCT,
      proxyUrl: env.HTTPS_PROXY_URL,
      lexiconPath: env.SENTIMENT_LEXICON_PATH,
    },
    maxSharePrice: env.MAX_SHARE_PRICE,
  };
}
