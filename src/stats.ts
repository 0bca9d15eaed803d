/**
 * Stats Collector for modelgate
 *
 * Tracks per-request metrics with a rolling 1-hour window.
 * No external dependencies.
 *
 * @packageDocumentation
 */

import type { RequestOutcome, UsageRecord, UsageSink } from './types.js';

interface StatsEntry {
  timestamp: number;
  model: string | null;
  outcome: RequestOutcome;
  latencyMs: number;
  tokens: number;
}

export interface StatsSnapshot {
  totalRequests: number;
  completedRequests: number;
  failedRequests: number;
  abortedRequests: number;
  /** Completed requests per model name. */
  byModel: Record<string, number>;
  tokens: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector implements UsageSink {
  private entries: StatsEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  emit(record: UsageRecord): void {
    this.entries.push({
      timestamp: this.now(),
      model: record.model,
      outcome: record.outcome,
      latencyMs: record.latencyMs,
      tokens: record.tokensPrompt + record.tokensResponse,
    });
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const entries = this.entries;
    const completed = entries.filter(e => e.outcome === 'completed');

    const byModel: Record<string, number> = {};
    for (const e of completed) {
      if (e.model !== null) byModel[e.model] = (byModel[e.model] ?? 0) + 1;
    }

    const latencies = completed.map(e => e.latencyMs).sort((a, b) => a - b);

    return {
      totalRequests: entries.length,
      completedRequests: completed.length,
      failedRequests: entries.filter(e => e.outcome === 'failed').length,
      abortedRequests: entries.filter(e => e.outcome === 'aborted').length,
      byModel,
      tokens: entries.reduce((sum, e) => sum + e.tokens, 0),
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
    };
  }

  private prune(): void {
    const cutoff = this.now() - ROLLING_WINDOW_MS;
    this.entries = this.entries.filter(e => e.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
