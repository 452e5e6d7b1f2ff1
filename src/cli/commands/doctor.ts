/**
 * Doctor Command - system diagnostics
 *
 * Checks:
 * - Node version
 * - Config file
 * - Hugging Face API key
 * - Storage opens and answers a ping
 * - Heuristic scorer on a sample sentence
 */

import * as fs from 'fs';
import { loadConfig, resolveConfigPath } from '../../utils/config';
import { toErrorMessage } from '../../utils/errors';
import { initDatabase } from '../../db';
import { createHeuristicScorer } from '../../services/sentiment';
import type { Config } from '../../types';

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export const SAMPLE_SENTENCE = 'I love this product!';

function checkNodeVersion(): CheckResult {
  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0] ?? '0', 10);
  if (majorVersion >= 20) {
    return { name: 'Node.js version', status: 'pass', message: `${nodeVersion} (>= 20 required)` };
  }
  return {
    name: 'Node.js version',
    status: 'fail',
    message: `${nodeVersion} (too old)`,
    fix: 'Upgrade to Node.js 20 LTS',
  };
}

function checkApiKey(config: Config): CheckResult {
  const apiKey = config.huggingface.apiKey;
  if (!config.huggingface.enabled) {
    return { name: 'Hugging Face API key', status: 'pass', message: 'Remote classification disabled' };
  }
  if (apiKey) {
    const masked = apiKey.length > 8 ? `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}` : '***';
    return { name: 'Hugging Face API key', status: 'pass', message: `Set (${masked})` };
  }
  return {
    name: 'Hugging Face API key',
    status: 'warn',
    message: 'Not set, only the local scorer will be used',
    fix: 'Set HUGGINGFACE_API_KEY environment variable',
  };
}

async function checkStorage(config: Config): Promise<CheckResult> {
  const path = config.storage.path;
  if (path && !fs.existsSync(path)) {
    return {
      name: 'Storage',
      status: 'warn',
      message: `${path} does not exist yet`,
      fix: 'It is created on first start; if records were expected there, check DATABASE_PATH',
    };
  }

  const location = path ?? 'in-memory';
  try {
    // Read-only: the file may belong to a running service
    const store = await initDatabase({ path, readOnly: true });
    try {
      if (!store.ping()) {
        return { name: 'Storage', status: 'fail', message: `${location} did not answer a ping` };
      }
      return { name: 'Storage', status: 'pass', message: `${location} (${store.count()} records)` };
    } finally {
      store.close();
    }
  } catch (err) {
    return {
      name: 'Storage',
      status: 'fail',
      message: `${location}: ${toErrorMessage(err)}`,
      fix: 'Check DATABASE_PATH points to a readable sql.js database file',
    };
  }
}

function checkScorer(): CheckResult {
  const scorer = createHeuristicScorer();
  const { polarity } = scorer.score(SAMPLE_SENTENCE);
  const result = scorer.analyze(SAMPLE_SENTENCE);
  if (result.label !== 'POSITIVE') {
    return {
      name: 'Heuristic scorer',
      status: 'fail',
      message: `"${SAMPLE_SENTENCE}" classified as ${result.label}`,
      fix: 'Check the lexicon data file is intact',
    };
  }
  return { name: 'Heuristic scorer', status: 'pass', message: `polarity ${polarity.toFixed(3)}` };
}

export async function runDoctor(options: DoctorOptions = {}): Promise<CheckResult[]> {
  const env = options.env ?? process.env;
  const results: CheckResult[] = [checkNodeVersion()];

  const configPath = options.configPath || resolveConfigPath(env);
  if (fs.existsSync(configPath)) {
    results.push({ name: 'Config file', status: 'pass', message: configPath });
  } else {
    results.push({
      name: 'Config file',
      status: 'warn',
      message: 'No config file found, using defaults',
      fix: `Create ${configPath} or set SENTIMENT_CONFIG_PATH`,
    });
  }

  let config: Config;
  try {
    config = await loadConfig(configPath, env);
  } catch (err) {
    results.push({ name: 'Config', status: 'fail', message: toErrorMessage(err) });
    return results;
  }

  results.push(checkApiKey(config));
  results.push(await checkStorage(config));
  results.push(checkScorer());

  return results;
}

const STATUS_LABELS: Record<CheckStatus, string> = { pass: 'ok', warn: 'warn', fail: 'FAIL' };
const STATUS_COLORS: Record<CheckStatus, number> = { pass: 32, warn: 33, fail: 31 };

function statusMark(status: CheckStatus, color: boolean): string {
  const label = STATUS_LABELS[status].padEnd(4);
  return color ? `\x1b[${STATUS_COLORS[status]}m${label}\x1b[0m` : label;
}

/** One aligned line per check, its fix indented under it, then the tally */
export function formatDoctorResults(results: readonly CheckResult[], options: { color?: boolean } = {}): string {
  const color = options.color ?? true;
  const width = Math.max(0, ...results.map((r) => r.name.length));
  const tally = (status: CheckStatus) => results.filter((r) => r.status === status).length;

  const body = results.flatMap((r) => {
    const line = `${statusMark(r.status, color)} ${r.name.padEnd(width)}  ${r.message}`;
    return r.fix ? [line, `     fix: ${r.fix}`] : [line];
  });

  return [
    'Sentiment analytics diagnostics',
    '',
    ...body,
    '',
    `${tally('pass')} passed, ${tally('warn')} warnings, ${tally('fail')} failed`,
  ].join('\n');
}

export async function doctor(configPath?: string): Promise<void> {
  const results = await runDoctor({ configPath });
  console.log(formatDoctorResults(results, { color: process.stdout.isTTY }));

  if (results.some((r) => r.status === 'fail')) {
    process.exit(1);
  }
}
