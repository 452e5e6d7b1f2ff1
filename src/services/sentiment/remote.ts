/**
 * Hugging Face Provider - remote binary sentiment classification
 *
 * Calls the Inference API for a POSITIVE/NEGATIVE text-classification model.
 * Every failure mode (no key, network error, timeout, non-2xx, bad payload)
 * yields null so the resolver can fall back; nothing is thrown or retried.
 */

import { logger } from '../../utils/logger';
import type { SentimentResult } from '../../types';
import type { SentimentProvider } from './types';

const DEFAULT_BASE_URL = 'https://api-inference.huggingface.co/models';
const DEFAULT_MODEL = 'distilbert-base-uncased-finetuned-sst-2-english';
const DEFAULT_TIMEOUT_MS = 5_000;

export interface HuggingFaceProviderOptions {
  apiKey: string | undefined;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

interface Candidate {
  label: string;
  score: number;
}

function isCandidate(value: unknown): value is Candidate {
  return (
    typeof value === 'object' &&
    value !== null &&
    'label' in value &&
    typeof value.label === 'string' &&
    'score' in value &&
    typeof value.score === 'number' &&
    Number.isFinite(value.score)
  );
}

/**
 * The API answers either [[{label, score}, ...]] (one ranked list per input)
 * or a flat [{label, score}, ...]. Returns null for anything else.
 */
export function parseCandidates(payload: unknown): Candidate[] | null {
  if (!Array.isArray(payload) || payload.length === 0) return null;
  const first: unknown = payload[0];
  const list: unknown[] = Array.isArray(first) ? first : payload;
  if (list.length === 0) return null;
  if (!list.every(isCandidate)) return null;
  return list;
}

/** Highest-scoring candidate; the earliest wins a tie */
export function pickBest(candidates: Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best;
}

export function createHuggingFaceProvider(options: HuggingFaceProviderOptions): SentimentProvider {
  const apiKey = options.apiKey?.trim();
  const url = `${(options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/${options.model ?? DEFAULT_MODEL}`;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  async function classify(text: string): Promise<SentimentResult | null> {
    if (!apiKey) {
      logger.debug('[huggingface] No API key configured, skipping remote classification');
      return null;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetchImpl(url, {
        method: 'POST',
        signal: controller.signal,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs: text }),
      });

      if (!res.ok) {
        logger.debug({ status: res.status }, '[huggingface] Classification request failed');
        return null;
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch {
        logger.debug('[huggingface] Invalid JSON response');
        return null;
      }

      const candidates = parseCandidates(payload);
      const best = candidates ? pickBest(candidates) : null;
      if (!best || best.score < 0 || best.score > 1) {
        logger.debug({ payload }, '[huggingface] Unexpected response shape');
        return null;
      }

      // The model only emits POSITIVE/NEGATIVE; anything else is collapsed to NEGATIVE
      if (best.label !== 'POSITIVE' && best.label !== 'NEGATIVE') {
        logger.warn({ label: best.label }, '[huggingface] Unknown label mapped to NEGATIVE');
      }

      return {
        label: best.label === 'POSITIVE' ? 'POSITIVE' : 'NEGATIVE',
        score: best.score,
        method: 'HuggingFace',
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        logger.debug({ timeoutMs }, '[huggingface] Classification timed out');
      } else {
        logger.debug({ error }, '[huggingface] Classification request errored');
      }
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }

  return { method: 'HuggingFace', classify };
}
