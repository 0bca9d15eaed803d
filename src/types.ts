/**
 * modelgate Core Types
 *
 * @packageDocumentation
 */

import type { ChatCompletionRequest } from './protocol/openai.js';

// ============================================================================
// Registry / Auth
// ============================================================================

/**
 * A backend that serves one model name.
 */
export interface ModelEntry {
  /** Name clients put in the `model` field. Case-sensitive. */
  readonly name: string;
  readonly host: string;
  readonly port: number;
  /** Model id the backend itself knows (defaults to `name`). */
  readonly backendModel: string;
  readonly defaultQuant?: string;
  /** Buffered-mode deadline and streaming idle timeout. */
  readonly timeoutMs: number;
}

export type Quota = 'unlimited';

/**
 * The identity a validated API key resolves to.
 */
export interface Principal {
  readonly key: string;
  readonly displayName: string;
  readonly quota: Quota;
}

// ============================================================================
// Requests
// ============================================================================

export type RelayMode = 'buffered' | 'streaming';

/**
 * A parsed inbound chat request. One per HTTP call, never shared.
 */
export interface InboundRequest {
  readonly id: string;
  readonly body: ChatCompletionRequest;
  readonly rawBody: Buffer;
}

export interface DispatchResult {
  backend: ModelEntry;
  mode: RelayMode;
}

export interface TokenUsage {
  prompt: number;
  response: number;
}

// ============================================================================
// Usage
// ============================================================================

export type RequestOutcome = 'completed' | 'failed' | 'aborted';

/**
 * Accounting record emitted exactly once per request.
 */
export interface UsageRecord {
  timestamp: string;
  requestId: string;
  model: string | null;
  principal: string | null;
  stream: boolean;
  outcome: RequestOutcome;
  /** HTTP status sent to the client; null when the client went away. */
  status: number | null;
  errorKind: string | null;
  tokensPrompt: number;
  tokensResponse: number;
  latencyMs: number;
}

export interface UsageSink {
  emit(record: UsageRecord): void;
}
