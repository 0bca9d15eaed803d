/**
 * Stream Relay
 *
 * Re-frames a chunk sequence as server-sent events. One chunk becomes one
 * `data:` frame, in arrival order. A successful stream ends with a single
 * `data: [DONE]` frame; a failed one ends with a single `event: error` frame.
 * The next chunk is not pulled until the previous frame has been accepted by
 * the sink, so a slow client holds the upstream back instead of growing a buffer.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import { ClientDisconnected, GatewayError, toGatewayError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { StreamChunk } from './upstream.js';

export const DONE_FRAME = 'data: [DONE]\n\n';

export function encodeDataFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function encodeErrorFrame(error: GatewayError): string {
  return `event: error\ndata: ${JSON.stringify(error.toBody())}\n\n`;
}

/**
 * Outbound side of a relay.
 */
export interface FrameSink {
  /** Resolves once the frame is accepted; rejects with ClientDisconnected if the client is gone. */
  write(frame: string): Promise<void>;
  end(): void;
  /** Answer with a plain error response instead of a stream. Only valid before the first write. */
  reject(error: GatewayError): void;
}

export type RelayOutcome = 'completed' | 'failed' | 'aborted';

export interface RelayResult {
  outcome: RelayOutcome;
  /** Data frames written (terminal frame not counted). */
  frames: number;
  error: GatewayError | null;
}

export interface RelayOptions {
  signal?: AbortSignal;
}

export class StreamRelay {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async relay<T>(
    chunks: AsyncIterable<StreamChunk<T>>,
    sink: FrameSink,
    options: RelayOptions = {},
  ): Promise<RelayResult> {
    const { signal } = options;
    let frames = 0;

    try {
      // Leaving this loop early (return/throw) calls the sequence's return(), which releases the upstream.
      for await (const chunk of chunks) {
        if (signal?.aborted) return aborted(frames);

        if (chunk.type === 'error') {
          if (chunk.error instanceof ClientDisconnected) return aborted(frames);
          return await this.terminateWithError(sink, chunk.error, frames);
        }

        await sink.write(encodeDataFrame(chunk.payload));
        frames++;
      }

      if (signal?.aborted) return aborted(frames);
      await sink.write(DONE_FRAME);
      sink.end();
      return { outcome: 'completed', frames, error: null };
    } catch (err) {
      const error = toGatewayError(err);
      if (error instanceof ClientDisconnected || signal?.aborted) return aborted(frames);
      this.logger.error('Relay failed', { frames, kind: error.kind });
      return this.terminateWithError(sink, error, frames).catch(() => aborted(frames));
    }
  }

  private async terminateWithError(sink: FrameSink, error: GatewayError, frames: number): Promise<RelayResult> {
    if (frames === 0) {
      sink.reject(error);
    } else {
      await sink.write(encodeErrorFrame(error));
      sink.end();
    }
    return { outcome: 'failed', frames, error };
  }
}

function aborted(frames: number): RelayResult {
  return { outcome: 'aborted', frames, error: new ClientDisconnected() };
}

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
};

/**
 * FrameSink over a Node response. Headers go out with the first frame, and a
 * `false` from `write()` parks the relay until `drain`.
 */
export class ResponseSink implements FrameSink {
  constructor(
    private readonly res: http.ServerResponse,
    private readonly onReject: (error: GatewayError) => void,
    private readonly headers: Record<string, string> = {},
  ) {}

  async write(frame: string): Promise<void> {
    const { res } = this;
    if (res.destroyed || res.writableEnded) throw new ClientDisconnected();
    if (!res.headersSent) {
      res.writeHead(200, { ...SSE_HEADERS, ...this.headers });
    }
    if (!res.write(frame)) {
      await waitForDrain(res);
    }
  }

  end(): void {
    if (!this.res.writableEnded) this.res.end();
  }

  reject(error: GatewayError): void {
    this.onReject(error);
  }

  get started(): boolean {
    return this.res.headersSent;
  }
}

function waitForDrain(res: http.ServerResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    const onDrain = (): void => {
      res.off('close', onClose);
      resolve();
    };
    const onClose = (): void => {
      res.off('drain', onDrain);
      reject(new ClientDisconnected());
    };
    res.once('drain', onDrain);
    res.once('close', onClose);
  });
}
