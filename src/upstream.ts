/**
 * Upstream Client
 *
 * Opens exactly one backend connection per request (no keep-alive agent) and
 * exposes the response either as one decoded payload or as a lazy sequence of
 * events. The connection is released on every exit path: sequence exhausted,
 * consumer stopped iterating, timeout, backend failure or caller abort.
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import {
  ClientDisconnected,
  GatewayError,
  StreamTruncated,
  UpstreamError,
  UpstreamTimeout,
  errorMessage,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  CHAT_PATH,
  parseOllamaLine,
  type OllamaChatEvent,
  type OllamaChatRequest,
} from './protocol/ollama.js';
import type { ModelEntry, RelayMode } from './types.js';

const MAX_ERROR_BODY_BYTES = 64 * 1024;

/** Longest NDJSON line accepted from a backend, in characters. */
export const MAX_LINE_LENGTH = 1024 * 1024;

/**
 * One item of an upstream stream. A sequence ends after a `done` event
 * (clean end) or after exactly one `error` chunk (anything else).
 */
export type StreamChunk<T> =
  | { type: 'data'; payload: T }
  | { type: 'error'; error: GatewayError };

export interface BufferedHandle {
  mode: 'buffered';
  session: UpstreamSession;
  payload: OllamaChatEvent;
}

export interface StreamingHandle {
  mode: 'streaming';
  session: UpstreamSession;
  /** Single-use; iterating a second time yields nothing. */
  chunks: AsyncGenerator<StreamChunk<OllamaChatEvent>, void, undefined>;
}

export type UpstreamHandle = BufferedHandle | StreamingHandle;

export interface OpenOptions {
  /** Aborting releases the connection and ends the request with ClientDisconnected. */
  signal?: AbortSignal;
}

/**
 * One backend connection, owned by the call that opened it.
 */
export class UpstreamSession {
  readonly startedAt = Date.now();
  private failure: GatewayError | null = null;
  private released = false;

  constructor(
    readonly backend: ModelEntry,
    private readonly req: http.ClientRequest,
    private readonly signal: AbortSignal | undefined,
  ) {}

  get closed(): boolean {
    return this.released;
  }

  /** Tear the connection down, recording why. The first reason wins. */
  fail(error: GatewayError): void {
    this.failure ??= error;
    this.req.destroy(error);
  }

  /**
   * Map a low-level error to the reason the session actually ended.
   */
  classify(err: unknown, fallback: (message: string) => GatewayError): GatewayError {
    if (this.failure) return this.failure;
    if (this.signal?.aborted) return new ClientDisconnected();
    if (err instanceof GatewayError) return err;
    return fallback(errorMessage(err));
  }

  close(): void {
    if (this.released) return;
    this.released = true;
    this.req.destroy();
  }
}

export class UpstreamClient {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Send `body` to the backend and wait until it has committed to a response.
   *
   * @throws UpstreamTimeout when the backend is unreachable or misses its deadline
   * @throws UpstreamError when the backend answers with a non-2xx status or an undecodable body
   * @throws ClientDisconnected when `options.signal` aborts first
   */
  async open(
    backend: ModelEntry,
    body: OllamaChatRequest,
    mode: RelayMode,
    options: OpenOptions = {},
  ): Promise<UpstreamHandle> {
    if (options.signal?.aborted) throw new ClientDisconnected();

    const payload = JSON.stringify({ ...body, stream: mode === 'streaming' });
    const req = http.request({
      host: backend.host,
      port: backend.port,
      path: CHAT_PATH,
      method: 'POST',
      agent: false,
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(payload),
      },
      signal: options.signal,
    });
    const session = new UpstreamSession(backend, req, options.signal);

    this.logger.debug('Upstream request', { model: backend.name, mode });

    // Bounds connect + time to first byte in both modes, and the whole exchange in buffered mode.
    const deadline = setTimeout(() => {
      session.fail(new UpstreamTimeout(`Backend for model '${backend.name}' did not respond within ${backend.timeoutMs}ms`));
    }, backend.timeoutMs);
    deadline.unref();

    let handedOff = false;
    try {
      const res = await this.awaitResponse(req, payload);
      const status = res.statusCode ?? 0;

      if (status < 200 || status >= 300) {
        const text = await readText(res, MAX_ERROR_BODY_BYTES);
        this.logger.warn('Upstream returned error status', { model: backend.name, status, body: text });
        throw new UpstreamError(`Backend returned status ${status} for model '${backend.name}'`, status, text);
      }

      if (mode === 'buffered') {
        const text = await readText(res);
        return { mode: 'buffered', session, payload: decodeBuffered(text, backend) };
      }

      handedOff = true;
      return { mode: 'streaming', session, chunks: this.readEvents(res, session) };
    } catch (err) {
      // Connection errors name the backend address; keep that in the log only.
      const error = session.classify(err, () =>
        new UpstreamTimeout(`Backend for model '${backend.name}' is unreachable`),
      );
      if (!(error instanceof ClientDisconnected)) {
        this.logger.error('Upstream request failed', { model: backend.name, kind: error.kind, cause: errorMessage(err) });
      }
      throw error;
    } finally {
      clearTimeout(deadline);
      if (!handedOff) session.close();
    }
  }

  private awaitResponse(req: http.ClientRequest, payload: string): Promise<http.IncomingMessage> {
    return new Promise((resolve, reject) => {
      // Stays attached: failures after the response has started also reach the
      // response stream, where the reader classifies them.
      req.on('error', reject);
      req.once('response', resolve);
      req.end(payload);
    });
  }

  /**
   * Turns the backend's NDJSON body into one chunk per event, preserving the
   * backend's event boundaries. Waiting longer than the model's timeout for the
   * next event ends the sequence with UpstreamTimeout.
   */
  private async *readEvents(
    res: http.IncomingMessage,
    session: UpstreamSession,
  ): AsyncGenerator<StreamChunk<OllamaChatEvent>, void, undefined> {
    const { backend } = session;
    const idleMs = backend.timeoutMs;
    res.setEncoding('utf-8');
    const iterator: AsyncIterator<unknown> = res[Symbol.asyncIterator]();
    let buffer = '';

    const nextEvents = function* (final: boolean): Generator<string> {
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (line) yield line;
        newline = buffer.indexOf('\n');
      }
      if (final && buffer.trim()) {
        const line = buffer.trim();
        buffer = '';
        yield line;
      }
    };

    try {
      let ended = false;
      while (!ended) {
        const idle = setTimeout(() => {
          session.fail(new UpstreamTimeout(`Backend for model '${backend.name}' sent nothing for ${idleMs}ms`));
        }, idleMs);
        let step: IteratorResult<unknown>;
        try {
          step = await iterator.next();
        } finally {
          clearTimeout(idle);
        }

        if (step.done) {
          ended = true;
        } else {
          buffer += String(step.value);
        }

        for (const line of nextEvents(ended)) {
          const parsed = parseOllamaLine(line);
          if (parsed.kind === 'invalid') {
            this.logger.warn('Skipping undecodable upstream line', { model: backend.name, line: line.slice(0, 200) });
            continue;
          }
          if (parsed.kind === 'error') {
            yield {
              type: 'error',
              error: new UpstreamError(`Backend reported an error for model '${backend.name}'`, 200, parsed.message),
            };
            return;
          }
          yield { type: 'data', payload: parsed.event };
          if (parsed.event.done) return;
        }

        if (buffer.length > MAX_LINE_LENGTH) {
          this.logger.warn('Upstream line too long', { model: backend.name, length: buffer.length });
          yield {
            type: 'error',
            error: new UpstreamError(
              `Backend sent a line longer than ${MAX_LINE_LENGTH} characters for model '${backend.name}'`,
              200,
              buffer.slice(0, 200),
            ),
          };
          return;
        }
      }

      yield { type: 'error', error: new StreamTruncated() };
    } catch (err) {
      const error = session.classify(err, () => new StreamTruncated());
      if (!(error instanceof ClientDisconnected)) {
        this.logger.warn('Upstream stream failed', { model: backend.name, kind: error.kind, cause: errorMessage(err) });
      }
      yield { type: 'error', error };
    } finally {
      await iterator.return?.();
      session.close();
    }
  }
}

function decodeBuffered(text: string, backend: ModelEntry): OllamaChatEvent {
  const parsed = parseOllamaLine(text);
  if (parsed.kind === 'event') return parsed.event;
  if (parsed.kind === 'error') {
    throw new UpstreamError(`Backend reported an error for model '${backend.name}'`, 200, parsed.message);
  }
  throw new UpstreamError(`Backend sent an undecodable response for model '${backend.name}'`, 200, truncateBytes(text, MAX_ERROR_BODY_BYTES));
}

async function readText(res: http.IncomingMessage, limitBytes = Number.POSITIVE_INFINITY): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of res) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(buf);
    size += buf.byteLength;
    if (size >= limitBytes) {
      res.destroy();
      return Buffer.concat(chunks).subarray(0, limitBytes).toString('utf-8');
    }
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function truncateBytes(text: string, limitBytes: number): string {
  const buf = Buffer.from(text, 'utf-8');
  return buf.byteLength <= limitBytes ? text : buf.subarray(0, limitBytes).toString('utf-8');
}
