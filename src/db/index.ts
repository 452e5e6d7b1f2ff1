/**
 * Database - SQLite (sql.js WASM) tweet store
 *
 * Insert-once record store plus the grouping queries the analytics engine runs.
 * Every aggregation scans the full matching set at call time; the indexes on
 * brand, timestamp and sentiment_label keep those scans tractable.
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { randomUUID } from 'crypto';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { logger } from '../utils/logger';
import {
  SENTIMENT_LABELS,
  type AnalysisMethod,
  type LabeledRecord,
  type NewLabeledRecord,
  type SentimentLabel,
} from '../types';
import type {
  BrandSentimentCell,
  HeatmapCell,
  SentimentTotal,
  TimelinePoint,
} from '../services/analytics/types';

export interface FindOptions {
  /** 'newest' = timestamp descending, 'insertion' = storage order */
  sort?: 'newest' | 'insertion';
  skip?: number;
  limit?: number;
}

export interface TweetStore {
  insertOne(record: NewLabeledRecord): LabeledRecord;
  find(options?: FindOptions): LabeledRecord[];
  count(): number;

  // Grouping queries
  sentimentTotals(): SentimentTotal[];
  /** Grouped by (brand, sentiment). Restricted to `brands` when given. */
  brandSentimentCells(brands?: readonly string[]): BrandSentimentCell[];
  dailySentimentCounts(): TimelinePoint[];
  hourlySentimentCounts(): HeatmapCell[];

  ping(): boolean;
  close(): void;
}

export interface DatabaseOptions {
  /** File to load from and save to. null keeps the database in memory. */
  path: string | null;
  /** Open an existing file without ever writing it back; inserts are refused */
  readOnly?: boolean;
}

type Row = Record<string, SqlValue>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tweets (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    text TEXT NOT NULL,
    sentiment_label TEXT NOT NULL CHECK (sentiment_label IN ('POSITIVE', 'NEGATIVE', 'NEUTRAL')),
    sentiment_score REAL NOT NULL CHECK (sentiment_score >= 0 AND sentiment_score <= 1),
    analysis_method TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    brand TEXT NOT NULL DEFAULT 'default'
  );

  CREATE INDEX IF NOT EXISTS idx_tweets_brand ON tweets(brand);
  CREATE INDEX IF NOT EXISTS idx_tweets_timestamp ON tweets(timestamp);
  CREATE INDEX IF NOT EXISTS idx_tweets_sentiment ON tweets(sentiment_label);
`;

// timestamp is stored as epoch milliseconds; SQLite date functions take seconds
const EPOCH_SECONDS = `timestamp / 1000, 'unixepoch'`;

const RECORD_COLUMNS = 'id, text, sentiment_label, sentiment_score, analysis_method, timestamp, brand';

function toSentimentLabel(value: SqlValue): SentimentLabel {
  const label = SENTIMENT_LABELS.find((candidate) => candidate === value);
  if (!label) {
    throw new Error(`Unexpected sentiment label in storage: ${String(value)}`);
  }
  return label;
}

function toAnalysisMethod(value: SqlValue): AnalysisMethod {
  if (value === 'HuggingFace' || value === 'TextBlob') return value;
  throw new Error(`Unexpected analysis method in storage: ${String(value)}`);
}

function parseRecord(row: Row): LabeledRecord {
  return {
    id: String(row.id),
    text: String(row.text),
    sentiment_label: toSentimentLabel(row.sentiment_label),
    sentiment_score: Number(row.sentiment_score),
    analysis_method: toAnalysisMethod(row.analysis_method),
    timestamp: new Date(Number(row.timestamp)),
    brand: String(row.brand),
  };
}

export async function initDatabase(options: DatabaseOptions): Promise<TweetStore> {
  const dbFile = options.path;
  const readOnly = options.readOnly ?? false;

  if (readOnly && dbFile && !existsSync(dbFile)) {
    throw new Error(`Database file not found: ${dbFile}`);
  }

  // Initialize sql.js
  const SQL = await initSqlJs();

  let db: SqlJsDatabase;
  if (dbFile && existsSync(dbFile)) {
    logger.info({ path: dbFile }, '[db] Opening database');
    db = new SQL.Database(readFileSync(dbFile));
  } else {
    if (dbFile) {
      mkdirSync(dirname(dbFile), { recursive: true });
      logger.info({ path: dbFile }, '[db] Creating database');
    } else {
      logger.debug('[db] Using in-memory database');
    }
    db = new SQL.Database();
  }

  db.run(SCHEMA);
  saveDb();

  function saveDb(): void {
    if (!dbFile || readOnly) return;
    writeFileSync(dbFile, Buffer.from(db.export()));
  }

  // Helper to query multiple rows
  function query(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const results: Row[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  function insertOne(record: NewLabeledRecord): LabeledRecord {
    if (readOnly) {
      throw new Error('Database was opened read-only');
    }
    const id = randomUUID();
    db.run(
      `INSERT INTO tweets (id, text, sentiment_label, sentiment_score, analysis_method, timestamp, brand)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        id,
        record.text,
        record.sentiment_label,
        record.sentiment_score,
        record.analysis_method,
        record.timestamp.getTime(),
        record.brand,
      ],
    );
    saveDb();
    return { id, ...record };
  }

  function find(findOptions: FindOptions = {}): LabeledRecord[] {
    const order = findOptions.sort === 'newest' ? 'timestamp DESC, seq DESC' : 'seq ASC';
    // LIMIT -1 means no limit in SQLite
    const limit = findOptions.limit ?? -1;
    const skip = findOptions.skip ?? 0;
    return query(
      `SELECT ${RECORD_COLUMNS} FROM tweets ORDER BY ${order} LIMIT ? OFFSET ?`,
      [limit, skip],
    ).map(parseRecord);
  }

  function count(): number {
    const [row] = query('SELECT COUNT(*) AS count FROM tweets');
    return row ? Number(row.count) : 0;
  }

  function sentimentTotals(): SentimentTotal[] {
    return query(
      `SELECT sentiment_label AS sentiment, COUNT(*) AS count, AVG(sentiment_score) AS avg_score
       FROM tweets
       GROUP BY sentiment_label
       ORDER BY sentiment_label`,
    ).map((row) => ({
      sentiment: toSentimentLabel(row.sentiment),
      count: Number(row.count),
      avg_score: Number(row.avg_score),
    }));
  }

  function brandSentimentCells(brands?: readonly string[]): BrandSentimentCell[] {
    const filter = brands ? `WHERE brand IN (${brands.map(() => '?').join(', ')})` : '';
    return query(
      `SELECT brand, sentiment_label AS sentiment, COUNT(*) AS count, AVG(sentiment_score) AS avg_score
       FROM tweets
       ${filter}
       GROUP BY brand, sentiment_label
       ORDER BY brand, sentiment_label`,
      brands ? [...brands] : [],
    ).map((row) => ({
      brand: String(row.brand),
      sentiment: toSentimentLabel(row.sentiment),
      count: Number(row.count),
      avg_score: Number(row.avg_score),
    }));
  }

  function dailySentimentCounts(): TimelinePoint[] {
    return query(
      `SELECT strftime('%Y-%m-%d', ${EPOCH_SECONDS}) AS date, sentiment_label AS sentiment, COUNT(*) AS count
       FROM tweets
       GROUP BY date, sentiment_label
       ORDER BY date ASC, sentiment_label`,
    ).map((row) => ({
      date: String(row.date),
      sentiment: toSentimentLabel(row.sentiment),
      count: Number(row.count),
    }));
  }

  function hourlySentimentCounts(): HeatmapCell[] {
    // %w is 0 (Sunday) to 6; shifted to 1-7
    return query(
      `SELECT CAST(strftime('%H', ${EPOCH_SECONDS}) AS INTEGER) AS hour,
              CAST(strftime('%w', ${EPOCH_SECONDS}) AS INTEGER) + 1 AS day,
              sentiment_label AS sentiment,
              COUNT(*) AS count
       FROM tweets
       GROUP BY hour, day, sentiment_label`,
    ).map((row) => ({
      hour: Number(row.hour),
      day: Number(row.day),
      sentiment: toSentimentLabel(row.sentiment),
      count: Number(row.count),
    }));
  }

  function ping(): boolean {
    const [row] = query('SELECT 1 AS ok');
    return row?.ok === 1;
  }

  function close(): void {
    saveDb();
    db.close();
    logger.debug('[db] Database closed');
  }

  return {
    insertOne,
    find,
    count,
    sentimentTotals,
    brandSentimentCells,
    dailySentimentCounts,
    hourlySentimentCounts,
    ping,
    close,
  };
}
