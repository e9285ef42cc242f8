/**
 * HEADLINE SENTIMENT
 * ==================
 *
 * Lexicon-based scoring for news headlines:
 *
 *   polarity      = mean lexicon score of the title's words (0 when none match)
 *   keywordScore  = (bullish hits − bearish hits) × 0.2, over title + first 200 body chars
 *   score         = clamp(polarity + keywordScore, −1, 1)
 *
 * Keywords match whole words or phrases only ("sec" never matches "second").
 */

import type {
  Headline,
  HeadlineSentiment,
  NewsPayload,
  SentimentLabel,
} from '../../signal/contracts/source.types.js';
import type { SentimentLexicon } from './lexicon.loader.js';

const KEYWORD_WEIGHT = 0.2;
const LABEL_BAND = 0.1;
const BODY_CHARS = 200;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function labelFor(score: number): SentimentLabel {
  if (score > LABEL_BAND) return 'bullish';
  if (score < -LABEL_BAND) return 'bearish';
  return 'neutral';
}

export class SentimentAnalyzer {
  private readonly bullish: RegExp[];
  private readonly bearish: RegExp[];
  private readonly polarity: ReadonlyMap<string, number>;

  constructor(lexicon: SentimentLexicon) {
    const toPattern = (keyword: string) =>
      new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?:$|[^a-z0-9])`);
    this.bullish = lexicon.bullishKeywords.map(toPattern);
    this.bearish = lexicon.bearishKeywords.map(toPattern);
    this.polarity = new Map(Object.entries(lexicon.polarity).map(([word, score]) => [word.toLowerCase(), score]));
  }

  analyze(title: string, body = ''): HeadlineSentiment {
    const text = `${title} ${body.slice(0, BODY_CHARS)}`.toLowerCase();

    const bullishKeywords = this.bullish.filter((re) => re.test(text)).length;
    const bearishKeywords = this.bearish.filter((re) => re.test(text)).length;

    const polarity = this.titlePolarity(title);
    const combined = polarity + (bullishKeywords - bearishKeywords) * KEYWORD_WEIGHT;
    const score = Math.max(-1, Math.min(1, combined));

    return {
      score: round3(score),
      label: labelFor(score),
      polarity: round3(polarity),
      bullishKeywords,
      bearishKeywords,
    };
  }

  private titlePolarity(title: string): number {
    const words = title.toLowerCase().match(/[a-z][a-z'-]*/g) ?? [];
    let sum = 0;
    let hits = 0;
    for (const word of words) {
      const value = this.polarity.get(word);
      if (value !== undefined) {
        sum += value;
        hits++;
      }
    }
    return hits > 0 ? sum / hits : 0;
  }
}

/**
 * Aggregate scored headlines. Caller guarantees at least one headline.
 */
export function summarizeHeadlines(headlines: Headline[]): NewsPayload {
  let total = 0;
  let bullishCount = 0;
  let bearishCount = 0;
  let neutralCount = 0;

  for (const headline of headlines) {
    total += headline.sentiment.score;
    if (headline.sentiment.label === 'bullish') bullishCount++;
    else if (headline.sentiment.label === 'bearish') bearishCount++;
    else neutralCount++;
  }

  const avg = headlines.length > 0 ? total / headlines.length : 0;

  return {
    overallSentiment: labelFor(avg),
    avgScore: round3(avg),
    bullishCount,
    bearishCount,
    neutralCount,
    headlines,
  };
}
