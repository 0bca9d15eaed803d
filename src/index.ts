/**
 * modelgate
 *
 * OpenAI-compatible chat-completion gateway for local inference backends.
 *
 * @example
 * ```typescript
 * import { GatewayServer, buildRegistry, loadGatewayConfig, toKeyEntries } from 'modelgate';
 *
 * const config = loadGatewayConfig('config/gateway.json');
 * const server = new GatewayServer({
 *   registry: buildRegistry(config),
 *   keys: toKeyEntries(config),
 *   port: 8000,
 * });
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Server
export { GatewayServer, type GatewayServerConfig } from './server.js';
export { RequestHandler, type RequestHandlerDeps } from './handler.js';
export { RequestLifecycle, type RequestState } from './lifecycle.js';

// Components
export { ModelRegistry } from './registry.js';
export { AuthGuard, fingerprint, parseBearer, type KeyEntry } from './auth.js';
export { Dispatcher } from './dispatcher.js';
export {
  UpstreamClient,
  UpstreamSession,
  type StreamChunk,
  type UpstreamHandle,
  type BufferedHandle,
  type StreamingHandle,
  type OpenOptions,
} from './upstream.js';
export {
  StreamRelay,
  ResponseSink,
  DONE_FRAME,
  SSE_HEADERS,
  encodeDataFrame,
  encodeErrorFrame,
  type FrameSink,
  type RelayResult,
  type RelayOutcome,
} from './relay.js';

// Protocol
export * from './protocol/openai.js';
export * from './protocol/ollama.js';

// Usage
export { LoggingUsageSink, fanOut } from './usage.js';
export { StatsCollector, type StatsSnapshot } from './stats.js';
export { UsageStore, type UsageSummaryRow, type SummaryOptions } from './storage/index.js';
export { handleHealthRequest, probeHealth, type HealthReport, type ProbeResult } from './health.js';

// Config
export {
  ConfigError,
  loadSettings,
  loadGatewayConfig,
  parseGatewayConfig,
  buildRegistry,
  toModelEntries,
  toKeyEntries,
  writeExampleConfig,
  type Settings,
  type GatewayConfig,
  type ModelConfig,
  type KeyConfig,
} from './config.js';

// Errors
export * from './errors.js';

// Logging
export { createLogger, defaultLogger, silentLogger, type Logger, type LogLevel, type LogFormat } from './logger.js';

// Types
export type * from './types.js';
