import { Injectable } from '@nestjs/common';
import { LONG_BODY_THRESHOLD, MIN_SCORE } from '../config/news.constants';
import relevanceDictionary from '../config/relevance-keywords.json';

const KEYWORD_WEIGHTS: Array<[string, number]> = Object.entries(
  relevanceDictionary.keywords,
).map(([keyword, weight]) => [keyword.toLowerCase(), weight]);
const HIGH_SIGNAL_SUBSTRINGS = relevanceDictionary.highSignalSubstrings.map(
  (value) => value.toLowerCase(),
);
const LONG_BODY_BONUS = 1;
const HIGH_SIGNAL_BONUS = 2;

export interface ScoreBreakdown {
  score: number;
  matchedKeywords: string[];
  longBody: boolean;
  highSignal: boolean;
}

@Injectable()
export class RelevanceScoringService {
  score(title: string, body: string): number {
    return this.explain(title, body).score;
  }

  explain(title: string, body: string): ScoreBreakdown {
    const text = `${title || ''} ${body || ''}`.toLowerCase();
    const matchedKeywords: string[] = [];
    let score = 0;

    for (const [keyword, weight] of KEYWORD_WEIGHTS) {
      if (text.includes(keyword)) {
        matchedKeywords.push(keyword);
        score += weight;
      }
    }

    const longBody = (body || '').length > LONG_BODY_THRESHOLD;
    if (longBody) {
      score += LONG_BODY_BONUS;
    }

    const highSignal = HIGH_SIGNAL_SUBSTRINGS.some((value) =>
      text.includes(value),
    );
    if (highSignal) {
      score += HIGH_SIGNAL_BONUS;
    }

    return { score, matchedKeywords, longBody, highSignal };
  }

  isEligible(score: number, minScore: number = MIN_SCORE): boolean {
    return score >= minScore;
  }
}
