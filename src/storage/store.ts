/**
 * SQLite Storage Implementation
 *
 * Append-only usage ledger. Enabled by `MODELGATE_USAGE_DB`.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import { nanoid } from 'nanoid';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { SCHEMA_SQL } from './schema.js';
import type { UsageRecord, UsageSink } from '../types.js';

export const IN_MEMORY = ':memory:';

const DAY_MS = 24 * 60 * 60 * 1000;

const SummaryRowSchema = z.object({
  model: z.string().nullable(),
  requests: z.number(),
  completed: z.number(),
  failed: z.number(),
  aborted: z.number(),
  tokensPrompt: z.number(),
  tokensResponse: z.number(),
  avgLatencyMs: z.number().nullable(),
});

export interface UsageSummaryRow {
  /** null groups requests that never named a valid body (auth or parse failures). */
  model: string | null;
  requests: number;
  completed: number;
  failed: number;
  aborted: number;
  tokensPrompt: number;
  tokensResponse: number;
  avgLatencyMs: number;
}

export interface SummaryOptions {
  /** Look-back window; defaults to 7. */
  days?: number;
  /** Reference time for the window, in ms since epoch. */
  now?: number;
}

const CountSchema = z.object({ count: z.number() });

/**
 * SQLite storage for usage records.
 */
export class UsageStore implements UsageSink {
  private db: Database.Database;
  private readonly dbPath: string;
  private readonly insert: Database.Statement;

  /**
   * @param dbPath - SQLite file, or `:memory:`
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath;

    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(this.dbPath);

    // Enable WAL mode for better concurrent access
    if (dbPath !== IN_MEMORY) this.db.pragma('journal_mode = WAL');

    this.db.exec(SCHEMA_SQL);

    this.insert = this.db.prepare(`
      INSERT INTO usage (id, request_id, model, principal, stream, outcome, status, error_kind, tokens_prompt, tokens_response, latency_ms, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  close(): void {
    this.db.close();
  }

  getDbPath(): string {
    return this.dbPath;
  }

  emit(record: UsageRecord): void {
    this.record(record);
  }

  /**
   * Append one record. Returns the row id.
   */
  record(record: UsageRecord): string {
    const id = nanoid();
    this.insert.run(
      id,
      record.requestId,
      record.model,
      record.principal,
      record.stream ? 1 : 0,
      record.outcome,
      record.status,
      record.errorKind,
      record.tokensPrompt,
      record.tokensResponse,
      Math.round(record.latencyMs),
      record.timestamp,
    );
    return id;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM usage').get();
    return CountSchema.parse(row).count;
  }

  /**
   * Per-model totals over the last `days` days, busiest model first.
   */
  summary(options: SummaryOptions = {}): UsageSummaryRow[] {
    const days = options.days ?? 7;
    const since = new Date((options.now ?? Date.now()) - days * DAY_MS).toISOString();

    const rows = this.db
      .prepare(`
        SELECT
          model,
          COUNT(*) as requests,
          SUM(CASE WHEN outcome = 'completed' THEN 1 ELSE 0 END) as completed,
          SUM(CASE WHEN outcome = 'failed' THEN 1 ELSE 0 END) as failed,
          SUM(CASE WHEN outcome = 'aborted' THEN 1 ELSE 0 END) as aborted,
          SUM(tokens_prompt) as tokensPrompt,
          SUM(tokens_response) as tokensResponse,
          AVG(latency_ms) as avgLatencyMs
        FROM usage
        WHERE created_at >= ?
        GROUP BY model
        ORDER BY requests DESC, model ASC
      `)
      .all(since);

    return z
      .array(SummaryRowSchema)
      .parse(rows)
      .map((row) => ({ ...row, avgLatencyMs: Math.round(row.avgLatencyMs ?? 0) }));
  }
}
