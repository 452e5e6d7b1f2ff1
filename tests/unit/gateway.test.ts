/**
 * Gateway HTTP Tests
 *
 * Starts the Express app on an ephemeral port with an in-memory store and no
 * remote providers, then talks to it over fetch.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createGateway, type Gateway } from '../../src/gateway';
import { DEFAULT_CONFIG } from '../../src/utils/config';
import type { Config, NewLabeledRecord, SentimentLabel } from '../../src/types';

// ============================================================================
// HELPERS
// ============================================================================

const testConfig: Config = {
  ...DEFAULT_CONFIG,
  gateway: { port: 0, host: '127.0.0.1' },
  storage: { path: null },
};

function makeRecord(text: string, sentiment_label: SentimentLabel, brand: string, iso: string): NewLabeledRecord {
  return {
    text,
    sentiment_label,
    sentiment_score: 0.5,
    analysis_method: 'TextBlob',
    timestamp: new Date(iso),
    brand,
  };
}

/** Response body without the keys whose values vary between runs */
function withoutKeys(value: unknown, keys: string[]): Record<string, unknown> {
  assert.ok(typeof value === 'object' && value !== null, 'expected a JSON object');
  return Object.fromEntries(Object.entries(value).filter(([key]) => !keys.includes(key)));
}

function asList(value: unknown): unknown[] {
  assert.ok(Array.isArray(value), 'expected a JSON array');
  return value;
}

describe('gateway', () => {
  let gateway: Gateway;
  let baseUrl: string;

  beforeEach(async () => {
    gateway = await createGateway(testConfig, { providers: [] });
    await gateway.start();
    const address = gateway.server.address();
    assert.ok(address, 'server should be listening');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await gateway.stop();
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  // ── /health ─────────────────────────────────────────────────────────────

  it('reports health with the record count', async () => {
    gateway.context.store.insertOne(makeRecord('hello', 'NEUTRAL', 'default', '2024-03-01T00:00:00Z'));

    const res = await fetch(`${baseUrl}/health`);

    assert.equal(res.status, 200);
    assert.deepEqual(withoutKeys(await res.json(), ['timestamp']), {
      status: 'ok',
      records: 1,
      providers: { huggingface: false },
    });
  });

  // ── POST /add_tweet ─────────────────────────────────────────────────────

  it('classifies, stores and returns a tweet', async () => {
    const res = await post('/add_tweet', { text: 'This product is great', brand: 'acme' });
    const body: unknown = await res.json();

    assert.equal(res.status, 200);
    assert.deepEqual(withoutKeys(body, ['id', 'timestamp']), {
      text: 'This product is great',
      sentiment_label: 'POSITIVE',
      sentiment_score: 0.8,
      analysis_method: 'TextBlob',
      brand: 'acme',
    });
    const [stored] = gateway.context.store.find();
    assert.deepEqual(withoutKeys(body, ['text', 'sentiment_label', 'sentiment_score', 'analysis_method', 'brand']), {
      id: stored?.id,
      timestamp: stored?.timestamp.toISOString(),
    });
  });

  it('defaults a missing or blank brand', async () => {
    const res = await post('/add_tweet', { text: 'meh', brand: '  ' });

    assert.equal(res.status, 200);
    assert.deepEqual(withoutKeys(await res.json(), ['id', 'timestamp']), {
      text: 'meh',
      sentiment_label: 'NEUTRAL',
      sentiment_score: 0.5,
      analysis_method: 'TextBlob',
      brand: 'default',
    });
  });

  it('stores a brand exactly as sent so comparisons find it', async () => {
    const res = await post('/add_tweet', { text: 'meh', brand: ' Acme ' });
    assert.equal(res.status, 200);
    assert.equal(gateway.context.store.find()[0]?.brand, ' Acme ');

    const compared = await post('/api/comparative_analysis', { brands: [' Acme '] });
    assert.deepEqual(await compared.json(), [{ brand: ' Acme ', sentiment: 'NEUTRAL', count: 1, avg_score: 0.5 }]);
  });

  it('rejects a missing or blank text without storing anything', async () => {
    for (const payload of [{}, { text: '   ' }, { text: 42 }]) {
      const res = await post('/add_tweet', payload);
      assert.equal(res.status, 400);
      assert.deepEqual(await res.json(), { error: 'Tweet text is required' });
    }
    assert.equal(gateway.context.store.count(), 0);
  });

  it('rejects a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/add_tweet`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text": ',
    });

    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { error: 'Invalid request body' });
  });

  // ── GET /api/tweets ─────────────────────────────────────────────────────

  it('lists tweets newest first with pagination', async () => {
    const store = gateway.context.store;
    store.insertOne(makeRecord('first', 'NEUTRAL', 'default', '2024-03-01T00:00:00Z'));
    store.insertOne(makeRecord('second', 'NEUTRAL', 'default', '2024-03-02T00:00:00Z'));
    store.insertOne(makeRecord('third', 'NEUTRAL', 'default', '2024-03-03T00:00:00Z'));

    const res = await fetch(`${baseUrl}/api/tweets?page=2&limit=2`);

    assert.equal(res.status, 200);
    assert.deepEqual(
      asList(await res.json()).map((r) => withoutKeys(r, ['id'])),
      [
        {
          text: 'first',
          sentiment_label: 'NEUTRAL',
          sentiment_score: 0.5,
          analysis_method: 'TextBlob',
          timestamp: '2024-03-01T00:00:00.000Z',
          brand: 'default',
        },
      ],
    );

    const invalid = await fetch(`${baseUrl}/api/tweets?page=0`);
    assert.equal(invalid.status, 400);
  });

  it('rejects pages and limits beyond the integer range', async () => {
    const huge = await fetch(`${baseUrl}/api/tweets?page=99999999999999999999`);
    assert.equal(huge.status, 400);
    assert.deepEqual(await huge.json(), { error: 'page and limit must be positive integers' });

    const overflow = await fetch(`${baseUrl}/api/tweets?page=9007199254740991&limit=10`);
    assert.equal(overflow.status, 400);
    assert.deepEqual(await overflow.json(), { error: 'page is out of range' });
  });

  // ── Analytics ───────────────────────────────────────────────────────────

  it('serves the aggregate views', async () => {
    const store = gateway.context.store;
    store.insertOne(makeRecord('Great phone', 'POSITIVE', 'acme', '2024-03-01T09:15:00Z'));
    store.insertOne(makeRecord('Terrible battery', 'NEGATIVE', 'acme', '2024-03-03T18:40:00Z'));

    const stats = await (await fetch(`${baseUrl}/api/sentiment_stats`)).json();
    assert.deepEqual(stats, [
      { sentiment: 'NEGATIVE', count: 1, avg_score: 0.5 },
      { sentiment: 'POSITIVE', count: 1, avg_score: 0.5 },
    ]);

    const brands = await (await fetch(`${baseUrl}/api/brand_stats`)).json();
    assert.deepEqual(brands, [
      {
        brand: 'acme',
        sentiments: [
          { sentiment: 'NEGATIVE', count: 1, avg_score: 0.5 },
          { sentiment: 'POSITIVE', count: 1, avg_score: 0.5 },
        ],
        total: 2,
      },
    ]);

    const timeline = await (await fetch(`${baseUrl}/api/sentiment_timeline`)).json();
    assert.deepEqual(timeline, [
      { date: '2024-03-01', sentiment: 'POSITIVE', count: 1 },
      { date: '2024-03-03', sentiment: 'NEGATIVE', count: 1 },
    ]);

    const heatmap = asList(await (await fetch(`${baseUrl}/api/sentiment_heatmap`)).json());
    assert.equal(heatmap.length, 2);

    const keywords = await (await fetch(`${baseUrl}/api/keyword_analysis`)).json();
    assert.deepEqual(keywords, {
      positive_keywords: [
        ['great', 1],
        ['phone', 1],
      ],
      negative_keywords: [
        ['terrible', 1],
        ['battery', 1],
      ],
    });

    const emotions = asList(await (await fetch(`${baseUrl}/api/emotion_analysis`)).json());
    assert.deepEqual(
      emotions.map((e) => withoutKeys(e, ['polarity', 'subjectivity'])),
      [
        { text: 'Great phone...', emotion: 'Joy', timestamp: '2024-03-01T09:15:00.000Z' },
        { text: 'Terrible battery...', emotion: 'Anger', timestamp: '2024-03-03T18:40:00.000Z' },
      ],
    );
  });

  it('compares brands and rejects an empty list', async () => {
    gateway.context.store.insertOne(makeRecord('Great phone', 'POSITIVE', 'acme', '2024-03-01T09:15:00Z'));
    gateway.context.store.insertOne(makeRecord('Fine', 'NEUTRAL', 'globex', '2024-03-01T09:15:00Z'));

    const res = await post('/api/comparative_analysis', { brands: ['acme'] });
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), [{ brand: 'acme', sentiment: 'POSITIVE', count: 1, avg_score: 0.5 }]);

    const empty = await post('/api/comparative_analysis', { brands: [] });
    assert.equal(empty.status, 400);
    assert.deepEqual(await empty.json(), { error: 'No brands provided' });
  });
});
