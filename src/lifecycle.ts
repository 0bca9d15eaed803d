/**
 * Per-request state machine.
 *
 *   received → authenticated → dispatched → upstream_open → relaying → completed
 *                                                         ↘ completed (buffered)
 *   any non-terminal state → failed
 *
 * Reaching a terminal state emits the request's single UsageRecord.
 *
 * @packageDocumentation
 */

import { ClientDisconnected, type GatewayError } from './errors.js';
import type { Principal, TokenUsage, UsageRecord, UsageSink } from './types.js';

export type RequestState =
  | 'received'
  | 'authenticated'
  | 'dispatched'
  | 'upstream_open'
  | 'relaying'
  | 'completed'
  | 'failed';

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  received: ['authenticated', 'failed'],
  authenticated: ['dispatched', 'failed'],
  dispatched: ['upstream_open', 'failed'],
  upstream_open: ['relaying', 'completed', 'failed'],
  relaying: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const NO_TOKENS: TokenUsage = { prompt: 0, response: 0 };

export class RequestLifecycle {
  private current: RequestState = 'received';
  private readonly startedAt: number;
  private model: string | null = null;
  private principal: string | null = null;
  private stream = false;
  private record: UsageRecord | null = null;

  constructor(
    readonly requestId: string,
    private readonly sink: UsageSink,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  get state(): RequestState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current === 'completed' || this.current === 'failed';
  }

  /** The emitted record, once the request has finished. */
  get usage(): UsageRecord | null {
    return this.record;
  }

  authenticated(principal: Principal): void {
    this.principal = principal.displayName;
    this.advance('authenticated');
  }

  describe(model: string, stream: boolean): void {
    this.model = model;
    this.stream = stream;
  }

  dispatched(): void {
    this.advance('dispatched');
  }

  upstreamOpen(): void {
    this.advance('upstream_open');
  }

  relaying(): void {
    this.advance('relaying');
  }

  complete(status: number, tokens: TokenUsage): UsageRecord {
    this.advance('completed');
    return this.emit({ outcome: 'completed', status, errorKind: null, tokens });
  }

  /**
   * Fail the request. ClientDisconnected is recorded as `aborted` with no status.
   *
   * @param sentStatus - status already on the wire, when the failure came mid-stream
   */
  fail(error: GatewayError, tokens: TokenUsage = NO_TOKENS, sentStatus?: number): UsageRecord {
    this.advance('failed');
    const abortedByClient = error instanceof ClientDisconnected;
    return this.emit({
      outcome: abortedByClient ? 'aborted' : 'failed',
      status: abortedByClient ? null : sentStatus ?? error.status,
      errorKind: error.kind,
      tokens,
    });
  }

  private advance(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal request transition ${this.current} → ${next}`);
    }
    this.current = next;
  }

  private emit(result: {
    outcome: UsageRecord['outcome'];
    status: number | null;
    errorKind: string | null;
    tokens: TokenUsage;
  }): UsageRecord {
    const record: UsageRecord = {
      timestamp: new Date().toISOString(),
      requestId: this.requestId,
      model: this.model,
      principal: this.principal,
      stream: this.stream,
      outcome: result.outcome,
      status: result.status,
      errorKind: result.errorKind,
      tokensPrompt: result.tokens.prompt,
      tokensResponse: result.tokens.response,
      latencyMs: Math.max(0, this.now() - this.startedAt),
    };
    this.record = record;
    this.sink.emit(record);
    return record;
  }
}
