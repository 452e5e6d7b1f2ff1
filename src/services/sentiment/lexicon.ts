/**
 * Sentiment lexicon - word polarity/subjectivity table, intensity modifiers
 * and negation words. The table itself lives in data/lexicon.json.
 */

import lexiconData from './data/lexicon.json';
import type { Lexicon, LexiconEntry } from './types';

export interface LexiconData {
  /** word -> [polarity, subjectivity] */
  words: Record<string, number[]>;
  /** modifier word -> intensity multiplier */
  modifiers: Record<string, number>;
  negations: string[];
}

export function createLexicon(data: LexiconData): Lexicon {
  const words = new Map<string, LexiconEntry>();
  for (const [word, values] of Object.entries(data.words)) {
    const [polarity, subjectivity] = values;
    if (values.length !== 2 || polarity === undefined || subjectivity === undefined) {
      throw new Error(`Lexicon entry for "${word}" must be [polarity, subjectivity]`);
    }
    words.set(word, { polarity, subjectivity });
  }
  const modifiers = new Map(Object.entries(data.modifiers));
  const negations = new Set(data.negations);

  return {
    lookup: (word) => words.get(word),
    intensity: (word) => modifiers.get(word),
    isNegation: (word) => negations.has(word),
  };
}

let defaultLexicon: Lexicon | null = null;

/** The bundled English lexicon, built on first use */
export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = createLexicon(lexiconData);
  }
  return defaultLexicon;
}
