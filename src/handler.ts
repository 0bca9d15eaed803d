/**
 * Request Handler
 *
 * Runs one chat-completion request end to end: authenticate, parse, dispatch,
 * open the backend, answer or relay, and emit one usage record however the
 * request ends.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { AuthGuard } from './auth.js';
import type { Dispatcher } from './dispatcher.js';
import { ClientDisconnected, GatewayError, InternalError, errorMessage, toGatewayError } from './errors.js';
import { readBody, sendError, sendJson } from './http.js';
import { RequestLifecycle } from './lifecycle.js';
import { silentLogger, type Logger } from './logger.js';
import { completionId, parseChatRequest, type ChatCompletionChunk } from './protocol/openai.js';
import {
  ChunkTranslator,
  toChatCompletion,
  toOllamaRequest,
  type CompletionContext,
  type OllamaChatEvent,
} from './protocol/ollama.js';
import { ResponseSink, type StreamRelay } from './relay.js';
import type { InboundRequest, TokenUsage, UsageRecord, UsageSink } from './types.js';
import type { StreamChunk, UpstreamClient, UpstreamHandle } from './upstream.js';

export interface RequestHandlerDeps {
  auth: AuthGuard;
  dispatcher: Dispatcher;
  upstream: UpstreamClient;
  relay: StreamRelay;
  usage: UsageSink;
  logger?: Logger;
  /** Clock for latency; injectable for tests. */
  now?: () => number;
  maxBodySize?: number;
}

export class RequestHandler {
  private readonly deps: RequestHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: RequestHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Handle `POST /v1/chat/completions`. Never rejects: every failure is answered
   * (when the client is still there) and recorded.
   */
  async handle(req: http.IncomingMessage, res: http.ServerResponse, requestId: string): Promise<UsageRecord> {
    const { auth, dispatcher, upstream, relay, usage } = this.deps;
    const lifecycle = new RequestLifecycle(requestId, usage, this.deps.now);

    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) controller.abort();
    };
    res.on('close', onClose);

    let handle: UpstreamHandle | null = null;
    try {
      const principal = auth.authenticate(req.headers.authorization);
      lifecycle.authenticated(principal);

      const rawBody = await readBody(req, this.deps.maxBodySize);
      const body = parseChatRequest(rawBody);
      lifecycle.describe(body.model, body.stream);
      const inbound: InboundRequest = { id: requestId, body, rawBody };

      const { backend, mode } = dispatcher.dispatch(inbound, principal);
      lifecycle.dispatched();
      this.logger.debug('Dispatched', { requestId, model: backend.name, mode });

      handle = await upstream.open(backend, toOllamaRequest(body, backend), mode, { signal: controller.signal });
      lifecycle.upstreamOpen();

      const ctx: CompletionContext = {
        id: completionId(requestId),
        model: body.model,
        created: Math.floor(Date.now() / 1000),
      };

      if (handle.mode === 'buffered') {
        const completion = toChatCompletion(handle.payload, ctx);
        if (res.destroyed) throw new ClientDisconnected();
        sendJson(res, 200, completion);
        return lifecycle.complete(200, {
          prompt: completion.usage.prompt_tokens,
          response: completion.usage.completion_tokens,
        });
      }

      lifecycle.relaying();
      const translator = new ChunkTranslator(ctx);
      const sink = new ResponseSink(res, (error) => sendError(res, error));
      const result = await relay.relay(translate(handle.chunks, translator), sink, { signal: controller.signal });

      if (result.outcome === 'completed') return lifecycle.complete(200, translator.usage);
      return this.fail(lifecycle, result.error ?? new InternalError(), translator.usage, result.frames > 0 ? 200 : undefined);
    } catch (err) {
      if (!(err instanceof GatewayError)) {
        this.logger.error('Unexpected error handling request', { requestId, cause: errorMessage(err) });
      }
      const error = controller.signal.aborted ? new ClientDisconnected() : toGatewayError(err);
      if (!(error instanceof ClientDisconnected)) sendError(res, error);
      return this.fail(lifecycle, error);
    } finally {
      res.off('close', onClose);
      handle?.session.close();
    }
  }

  private fail(lifecycle: RequestLifecycle, error: GatewayError, tokens?: TokenUsage, sentStatus?: number): UsageRecord {
    if (lifecycle.terminal) {
      // Already recorded; a failure after completion only needs logging.
      this.logger.warn('Error after request finished', { requestId: lifecycle.requestId, kind: error.kind });
      const record = lifecycle.usage;
      if (record) return record;
    }
    return lifecycle.fail(error, tokens, sentStatus);
  }
}

async function* translate(
  chunks: AsyncIterable<StreamChunk<OllamaChatEvent>>,
  translator: ChunkTranslator,
): AsyncGenerator<StreamChunk<ChatCompletionChunk>, void, undefined> {
  for await (const chunk of chunks) {
    yield chunk.type === 'data' ? { type: 'data', payload: translator.translate(chunk.payload) } : chunk;
  }
}
