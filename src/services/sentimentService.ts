import lexicon from '../data/sentiment-lexicon.json';
import type { SentimentResult, WellbeingLevel } from '../types';

const WORD_SCORES = new Map<string, number>(Object.entries(lexicon.words));
const NEGATORS = new Set<string>(lexicon.negators);
const INTENSIFIERS = new Map<string, number>(Object.entries(lexicon.intensifiers));

// Negation looks back this many tokens.
const NEGATION_WINDOW = 2;

function clamp(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

/** Exactly -0.6 is very sad, exactly -0.2 and 0.2 are normal, exactly 0.6 is very happy. */
export function levelForPolarity(polarity: number): WellbeingLevel {
  if (polarity <= -0.6) {
    return 'very sad';
  }
  if (polarity < -0.2) {
    return 'sad';
  }
  if (polarity <= 0.2) {
    return 'normal';
  }
  if (polarity < 0.6) {
    return 'happy';
  }
  return 'very happy';
}

export class SentimentService {
  classify(text: string): SentimentResult {
    const polarity = this.score(text);
    return { level: levelForPolarity(polarity), polarity };
  }

  score(text: string): number {
    const tokens = text.toLowerCase().match(/[a-z']+/g) ?? [];
    const contributions: number[] = [];

    tokens.forEach((token, index) => {
      const base = WORD_SCORES.get(token);
      if (base === undefined) {
        return;
      }
      let value = base;
      const factor = index > 0 ? INTENSIFIERS.get(tokens[index - 1]) : undefined;
      if (factor !== undefined) {
        value *= factor;
      }
      if (this.isNegated(tokens, index)) {
        value *= -0.5;
      }
      contributions.push(clamp(value));
    });

    if (contributions.length === 0) {
      return 0;
    }
    const mean = contributions.reduce((sum, value) => sum + value, 0) / contributions.length;
    return Number(clamp(mean).toFixed(4));
  }

  private isNegated(tokens: string[], index: number): boolean {
    for (let offset = 1; offset <= NEGATION_WINDOW && index - offset >= 0; offset += 1) {
      if (NEGATORS.has(tokens[index - offset])) {
        return true;
      }
    }
    return false;
  }
}
