/**
 * Loads the sentiment lexicon (keywords + word polarity) from JSON.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../../../common/errors.js';
import { errorMessage } from '../../../common/logger.js';

export const DEFAULT_LEXICON_PATH = 'backend/data/sentiment-lexicon.json';

export const sentimentLexiconSchema = z.object({
  bullishKeywords: z.array(z.string().min(1)),
  bearishKeywords: z.array(z.string().min(1)),
  polarity: z.record(z.number().min(-1).max(1)),
});

export type SentimentLexicon = z.infer<typeof sentimentLexiconSchema>;

/**
 * Read and validate the lexicon. Relative paths resolve from the working
 * directory.
 * @throws ConfigError when the file is missing or invalid
 */
export function loadSentimentLexicon(path: string = DEFAULT_LEXICON_PATH): SentimentLexicon {
  const fullPath = resolve(path);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf8'));
  } catch (err) {
    throw new ConfigError([`SENTIMENT_LEXICON_PATH: cannot read ${fullPath} (${errorMessage(err)})`]);
  }

  const parsed = sentimentLexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `SENTIMENT_LEXICON_PATH: ${issue.path.join('.')} ${issue.message}`)
    );
  }
  return parsed.data;
}
