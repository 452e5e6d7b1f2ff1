/**
 * Configuration loading and management
 *
 * Order of precedence (last wins): defaults, JSON5 config file, environment shortcuts.
 * String values in the file may reference the environment with ${VAR_NAME}.
 */

import 'dotenv/config';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import JSON5 from 'json5';
import { logger } from './logger';
import type { Config } from '../types';

export const CONFIG_FILE_NAME = 'sentiment-analytics.json';

export const DEFAULT_CONFIG: Config = {
  gateway: {
    port: 5000,
    host: '127.0.0.1',
  },
  storage: {
    path: null,
  },
  huggingface: {
    enabled: true,
    apiKey: '',
    model: 'distilbert-base-uncased-finetuned-sst-2-english',
    baseUrl: 'https://api-inference.huggingface.co/models',
    timeoutMs: 5000,
  },
  analytics: {
    emotionSampleSize: 50,
    keywordLimit: 10,
  },
};

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Config file path */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SENTIMENT_CONFIG_PATH?.trim();
  if (override) return override;
  return join(process.cwd(), CONFIG_FILE_NAME);
}

/**
 * Substitute environment variables in config values
 * Supports ${VAR_NAME} syntax
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] || '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: Section = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = substituteEnvVars(child, env);
    }
    return result;
  }
  return value;
}

function section(parent: Section, key: string): Section {
  const child = parent[key];
  if (child === undefined) return {};
  if (!isRecord(child)) {
    throw new Error(`Config: "${key}" must be an object`);
  }
  return child;
}

function readNumber(source: Section, key: string, fallback: number): number {
  const value = source[key];
  if (value === undefined) return fallback;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new Error(`Config: "${key}" must be a number`);
  }
  return parsed;
}

function readString(source: Section, key: string, fallback: string): string {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`Config: "${key}" must be a string`);
  }
  return value;
}

function readBoolean(source: Section, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`Config: "${key}" must be a boolean`);
  }
  return value;
}

function readPositiveInteger(source: Section, key: string, fallback: number): number {
  const value = readNumber(source, key, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Config: "${key}" must be a positive integer`);
  }
  return value;
}

function readStoragePath(source: Section, fallback: string | null): string | null {
  const value = source.path;
  if (value === undefined) return fallback;
  if (value === null) return null;
  if (typeof value !== 'string') {
    throw new Error('Config: "path" must be a string or null');
  }
  return value.trim() || null;
}

/**
 * Build a typed Config from an untyped (file) value, layered over the defaults.
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const root = isRecord(raw) ? raw : {};
  const gateway = section(root, 'gateway');
  const storage = section(root, 'storage');
  const huggingface = section(root, 'huggingface');
  const analytics = section(root, 'analytics');
  const defaults = DEFAULT_CONFIG;

  const config: Config = {
    gateway: {
      port: readPositiveInteger(gateway, 'port', defaults.gateway.port),
      host: readString(gateway, 'host', defaults.gateway.host),
    },
    storage: {
      path: readStoragePath(storage, defaults.storage.path),
    },
    huggingface: {
      enabled: readBoolean(huggingface, 'enabled', defaults.huggingface.enabled),
      apiKey: readString(huggingface, 'apiKey', defaults.huggingface.apiKey),
      model: readString(huggingface, 'model', defaults.huggingface.model),
      baseUrl: readString(huggingface, 'baseUrl', defaults.huggingface.baseUrl),
      timeoutMs: readPositiveInteger(huggingface, 'timeoutMs', defaults.huggingface.timeoutMs),
    },
    analytics: {
      emotionSampleSize: readPositiveInteger(analytics, 'emotionSampleSize', defaults.analytics.emotionSampleSize),
      keywordLimit: readPositiveInteger(analytics, 'keywordLimit', defaults.analytics.keywordLimit),
    },
  };

  // Environment shortcuts
  if (env.PORT?.trim()) {
    config.gateway.port = readPositiveInteger({ port: env.PORT.trim() }, 'port', config.gateway.port);
  }
  if (env.DATABASE_PATH !== undefined) {
    config.storage.path = env.DATABASE_PATH.trim() || null;
  }
  if (env.HUGGINGFACE_API_KEY?.trim()) {
    config.huggingface.apiKey = env.HUGGINGFACE_API_KEY.trim();
  }

  return config;
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  let fileConfig: unknown = {};

  const configPath = customPath || resolveConfigPath(env);
  if (existsSync(configPath)) {
    try {
      const content = readFileSync(configPath, 'utf-8');
      fileConfig = JSON5.parse(content);
    } catch (err) {
      logger.warn({ err, configPath }, '[config] Failed to parse config file, using defaults');
    }
  }

  return resolveConfig(substituteEnvVars(fileConfig, env), env);
}
