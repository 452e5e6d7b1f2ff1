/**
 * Sentiment pipeline - public surface
 */

export type {
  Emotion,
  EmotionClassification,
  HeuristicScorer,
  Lexicon,
  PolarityScores,
  SentimentProvider,
  SentimentResolver,
} from './types';
export { createHeuristicScorer, labelFromPolarity, scorePolarity, tokenize } from './heuristic';
export { createLexicon, getDefaultLexicon } from './lexicon';
export { createHuggingFaceProvider, type HuggingFaceProviderOptions } from './remote';
export { createSentimentResolver } from './resolver';
export { analyzeEmotions, classifyEmotion, EMOTION_RULES, EMOTION_SAMPLE_SIZE } from './emotion';
