/**
 * Emotion Classifier Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { analyzeEmotions, classifyEmotion, excerpt } from '../../src/services/sentiment/emotion';
import type { HeuristicScorer } from '../../src/services/sentiment/types';
import type { LabeledRecord } from '../../src/types';

describe('classifyEmotion', () => {
  it('maps each region of the score plane', () => {
    assert.equal(classifyEmotion(0.8, 0.9), 'Joy');
    assert.equal(classifyEmotion(-0.8, 0.9), 'Anger');
    assert.equal(classifyEmotion(-0.4, 0.2), 'Sadness');
    assert.equal(classifyEmotion(0.4, 0.1), 'Trust');
    assert.equal(classifyEmotion(0, 0.9), 'Surprise');
    assert.equal(classifyEmotion(0, 0), 'Neutral');
  });

  it('matches the reference table', () => {
    assert.equal(classifyEmotion(0.6, 0.6), 'Joy');
    assert.equal(classifyEmotion(-0.6, 0.6), 'Anger');
    assert.equal(classifyEmotion(-0.4, 0.2), 'Sadness');
    assert.equal(classifyEmotion(0.4, 0.2), 'Trust');
    assert.equal(classifyEmotion(0.0, 0.8), 'Surprise');
    assert.equal(classifyEmotion(0.0, 0.2), 'Neutral');
  });

  it('applies the first matching rule', () => {
    assert.equal(classifyEmotion(0.6, 0.8), 'Joy');
    assert.equal(classifyEmotion(-0.6, 0.8), 'Anger');
  });

  it('uses strict bounds', () => {
    assert.equal(classifyEmotion(0.5, 0.9), 'Surprise');
    assert.equal(classifyEmotion(-0.3, 0.2), 'Neutral');
    assert.equal(classifyEmotion(0.4, 0.3), 'Neutral');
    assert.equal(classifyEmotion(0.2, 0.7), 'Neutral');
  });
});

describe('excerpt', () => {
  it('keeps the first 100 characters and always appends an ellipsis', () => {
    assert.equal(excerpt('short'), 'short...');
    assert.equal(excerpt('x'.repeat(150)), `${'x'.repeat(100)}...`);
  });

  it('counts characters, so an emoji at the cut is kept whole', () => {
    const text = `${'a'.repeat(99)}😀 rest`;

    assert.equal(excerpt(text), `${'a'.repeat(99)}😀...`);
    assert.equal(excerpt('😀'.repeat(120)), `${'😀'.repeat(100)}...`);
  });
});

describe('analyzeEmotions', () => {
  it('re-scores each record and keeps its timestamp', () => {
    const scorer: HeuristicScorer = {
      score: (text) => (text === 'yay' ? { polarity: 0.9, subjectivity: 0.9 } : { polarity: -0.9, subjectivity: 0.9 }),
      analyze: () => ({ label: 'NEUTRAL', score: 0.5, method: 'TextBlob' }),
    };
    const timestamp = new Date('2024-03-01T10:00:00Z');
    const records: LabeledRecord[] = [
      {
        id: 'a',
        text: 'yay',
        sentiment_label: 'POSITIVE',
        sentiment_score: 0.9,
        analysis_method: 'HuggingFace',
        timestamp,
        brand: 'default',
      },
      {
        id: 'b',
        text: 'ugh',
        sentiment_label: 'NEGATIVE',
        sentiment_score: 0.9,
        analysis_method: 'HuggingFace',
        timestamp,
        brand: 'default',
      },
    ];

    assert.deepEqual(analyzeEmotions(records, scorer), [
      { text: 'yay...', emotion: 'Joy', polarity: 0.9, subjectivity: 0.9, timestamp },
      { text: 'ugh...', emotion: 'Anger', polarity: -0.9, subjectivity: 0.9, timestamp },
    ]);
  });
});
