/**
 * End-to-end: client → gateway → stand-in backend, all in process.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import * as http from 'node:http';
import { silentLogger } from '../src/logger.js';
import { ModelRegistry } from '../src/registry.js';
import { GatewayServer } from '../src/server.js';
import {
  RecordingSink,
  closeServer,
  contentEvent,
  createMockServer,
  doneEvent,
  httpRequest,
  modelEntry,
  ndjson,
  readRequestJson,
  sseFrames,
  waitFor,
  type MockServer,
} from './helpers.js';

const AUTH = { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' };

function chatBody(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ model: 'llama3', messages: [{ role: 'user', content: 'hello' }], stream: false, ...overrides });
}

function parseFrame(frame: string | undefined): unknown {
  if (!frame?.startsWith('data: ')) throw new Error(`not a data frame: ${frame ?? '(none)'}`);
  return JSON.parse(frame.slice('data: '.length));
}

describe('GatewayServer', () => {
  let backend: MockServer;
  let behavior: http.RequestListener = (_req, res) => res.end();
  let upstreamCalls = 0;
  let registry: ModelRegistry;
  let gateway: GatewayServer;
  let sink: RecordingSink;

  beforeAll(async () => {
    backend = await createMockServer((req, res) => {
      upstreamCalls++;
      behavior(req, res);
    });
    registry = new ModelRegistry([modelEntry(backend.port, { timeoutMs: 1000 })]);
    sink = new RecordingSink();
    gateway = new GatewayServer({
      registry,
      keys: [{ key: 'test-secret', displayName: 'alice', quota: 'unlimited', enabled: true }],
      host: '127.0.0.1',
      port: 0,
      logger: silentLogger,
      usageSinks: [sink],
      maxBodySize: 4096,
    });
    await gateway.start();
  });

  afterAll(async () => {
    await gateway.stop();
    await closeServer(backend.server);
  });

  beforeEach(() => {
    upstreamCalls = 0;
    sink.records.length = 0;
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // Scenarios
  // ==========================================================================

  it('buffered request returns one completion with the backend content', async () => {
    let forwarded: unknown = null;
    behavior = async (req, res) => {
      forwarded = await readRequestJson(req);
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ ...doneEvent(5, 3), message: { role: 'assistant', content: 'Hi there' } }));
    };

    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, body: chatBody() });
    expect(resp.status).toBe(200);
    const requestId = resp.headers['x-request-id'];
    expect(typeof requestId).toBe('string');

    expect(JSON.parse(resp.body)).toMatchObject({
      id: `chatcmpl-${String(requestId)}`,
      object: 'chat.completion',
      model: 'llama3',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hi there' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 5, completion_tokens: 3, total_tokens: 8 },
    });
    expect(forwarded).toEqual({ model: 'llama3:8b', messages: [{ role: 'user', content: 'hello' }], stream: false });

    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({
      requestId,
      model: 'llama3',
      principal: 'alice',
      stream: false,
      outcome: 'completed',
      status: 200,
      tokensPrompt: 5,
      tokensResponse: 3,
    });
    expect(sink.records[0]?.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('streaming request relays 3 chunks then one terminal frame, in order', async () => {
    behavior = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/x-ndjson' });
      res.write(ndjson([contentEvent('Hel')]));
      setTimeout(() => {
        res.write(ndjson([contentEvent('lo')]));
        setTimeout(() => res.end(ndjson([doneEvent(4, 2)])), 10);
      }, 10);
    };

    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: AUTH,
      body: chatBody({ stream: true }),
    });
    expect(resp.status).toBe(200);
    expect(resp.headers['content-type']).toBe('text/event-stream');

    const frames = sseFrames(resp.body);
    expect(frames).toHaveLength(4);
    expect(parseFrame(frames[0])).toMatchObject({
      object: 'chat.completion.chunk',
      model: 'llama3',
      choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' }, finish_reason: null }],
    });
    expect(parseFrame(frames[1])).toMatchObject({ choices: [{ delta: { content: 'lo' }, finish_reason: null }] });
    expect(parseFrame(frames[2])).toMatchObject({ choices: [{ delta: {}, finish_reason: 'stop' }] });
    expect(frames[3]).toBe('data: [DONE]');

    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ stream: true, outcome: 'completed', status: 200, tokensPrompt: 4, tokensResponse: 2 });
  });

  it('unknown model fails immediately with no upstream call', async () => {
    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: AUTH,
      body: chatBody({ model: 'unknown-model' }),
    });

    expect(resp.status).toBe(404);
    expect(JSON.parse(resp.body)).toEqual({
      error: { message: "Model 'unknown-model' not found", type: 'unknown_model', code: 'model_not_found' },
    });
    expect(upstreamCalls).toBe(0);
    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ model: 'unknown-model', outcome: 'failed', status: 404, errorKind: 'unknown_model' });
  });

  it('missing Authorization fails before any model resolution', async () => {
    const resolve = vi.spyOn(registry, 'resolve');
    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: chatBody(),
    });

    expect(resp.status).toBe(401);
    expect(resp.headers['www-authenticate']).toBe('Bearer');
    expect(JSON.parse(resp.body)).toEqual({
      error: { message: 'Authorization header required', type: 'unauthorized', code: 'invalid_api_key' },
    });
    expect(upstreamCalls).toBe(0);
    expect(resolve).not.toHaveBeenCalled();
    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ model: null, principal: null, outcome: 'failed', status: 401 });
  });

  it('backend drop after chunk 2 yields 2 data frames then an error frame', async () => {
    behavior = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/x-ndjson' });
      res.write(ndjson([contentEvent('a'), contentEvent('b')]));
      setTimeout(() => res.destroy(), 30);
    };

    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: AUTH,
      body: chatBody({ stream: true }),
    });

    expect(resp.status).toBe(200);
    const frames = sseFrames(resp.body);
    expect(frames).toHaveLength(3);
    expect(parseFrame(frames[0])).toMatchObject({ choices: [{ delta: { content: 'a' } }] });
    expect(parseFrame(frames[1])).toMatchObject({ choices: [{ delta: { content: 'b' } }] });
    expect(frames[2]).toBe(
      'event: error\ndata: {"error":{"message":"Backend stream ended before completion","type":"stream_truncated","code":"stream_truncated"}}',
    );
    expect(resp.body).not.toContain('[DONE]');

    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({
      outcome: 'failed',
      status: 200,
      errorKind: 'stream_truncated',
      tokensPrompt: 0,
      tokensResponse: 2,
    });
  });

  it('client disconnect mid-stream closes the backend connection', async () => {
    let backendClosed = false;
    let backendWrites = 0;
    behavior = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/x-ndjson' });
      const tick = (): void => {
        backendWrites++;
        res.write(ndjson([contentEvent(`t${backendWrites}`)]));
      };
      tick();
      const timer = setInterval(tick, 20);
      res.on('close', () => {
        backendClosed = true;
        clearInterval(timer);
      });
    };

    await new Promise<void>((resolve, reject) => {
      const req = http.request(
        `${gateway.url}/v1/chat/completions`,
        { method: 'POST', headers: AUTH, agent: false },
        (res) => {
          res.once('data', () => {
            req.destroy();
            resolve();
          });
        },
      );
      req.on('error', (err) => {
        if (!req.destroyed) reject(err);
      });
      req.end(chatBody({ stream: true }));
    });

    await waitFor(() => backendClosed, 1000);
    const writesAtClose = backendWrites;
    await new Promise((r) => setTimeout(r, 60));
    expect(backendWrites).toBe(writesAtClose);

    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ outcome: 'aborted', status: null, errorKind: 'client_disconnected', stream: true });
  });

  it('client disconnect while a buffered request waits closes the backend connection', async () => {
    let backendClosed = false;
    behavior = (_req, res) => {
      res.on('close', () => {
        backendClosed = true;
      });
    };

    const clientErrors: Error[] = [];
    const req = http.request(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, agent: false });
    req.on('error', (err) => clientErrors.push(err));
    req.end(chatBody());

    await waitFor(() => upstreamCalls === 1);
    req.destroy();

    // Well inside the model's 1000ms deadline, so only the disconnect can have closed it.
    await waitFor(() => backendClosed, 500);
    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ outcome: 'aborted', status: null, errorKind: 'client_disconnected', stream: false });
  });

  it('a client that stops reading holds the backend back', async () => {
    const total = 500;
    const event = ndjson([contentEvent('x'.repeat(64 * 1024))]);
    let backendWrites = 0;
    let backendClosed = false;
    behavior = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/x-ndjson' });
      res.on('close', () => {
        backendClosed = true;
      });
      const pump = (): void => {
        while (backendWrites < total && !res.destroyed) {
          backendWrites++;
          if (!res.write(event)) {
            res.once('drain', pump);
            return;
          }
        }
        if (backendWrites >= total) res.end(ndjson([doneEvent(1, total)]));
      };
      pump();
    };

    const clientErrors: Error[] = [];
    const req = http.request(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, agent: false }, (res) => {
      res.pause();
    });
    req.on('error', (err) => clientErrors.push(err));
    req.end(chatBody({ stream: true }));

    await new Promise((r) => setTimeout(r, 1000));
    expect(backendWrites).toBeGreaterThan(0);
    expect(backendWrites).toBeLessThan(total);
    expect(sink.records).toHaveLength(0);

    req.destroy();
    await waitFor(() => backendClosed, 1000);
    await waitFor(() => sink.records.length === 1);
    expect(sink.records[0]).toMatchObject({ outcome: 'aborted', status: null, errorKind: 'client_disconnected', stream: true });
  });

  // ==========================================================================
  // Failure mapping
  // ==========================================================================

  it('answers a pre-stream backend failure as a plain JSON error', async () => {
    behavior = (_req, res) => {
      res.writeHead(500);
      res.end('boom');
    };

    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: AUTH,
      body: chatBody({ stream: true }),
    });
    expect(resp.status).toBe(502);
    expect(resp.headers['content-type']).toBe('application/json');
    expect(JSON.parse(resp.body)).toEqual({
      error: { message: "Backend returned status 500 for model 'llama3'", type: 'upstream_error', code: 'backend_error' },
    });
  });

  it('maps a buffered timeout to 503 without backend details', async () => {
    behavior = () => {};

    const resp = await httpRequest(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, body: chatBody() });
    expect(resp.status).toBe(503);
    expect(JSON.parse(resp.body)).toEqual({
      error: {
        message: "Backend for model 'llama3' did not respond within 1000ms",
        type: 'upstream_timeout',
        code: 'backend_unavailable',
      },
    });
    expect(resp.body).not.toContain(String(backend.port));
  });

  it('rejects malformed and oversized bodies', async () => {
    const bad = await httpRequest(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, body: '{nope' });
    expect(bad.status).toBe(400);
    expect(JSON.parse(bad.body)).toEqual({
      error: { message: 'Invalid JSON in request body', type: 'invalid_request', code: 'invalid_body' },
    });

    const big = await httpRequest(`${gateway.url}/v1/chat/completions`, {
      method: 'POST',
      headers: AUTH,
      body: chatBody({ messages: [{ role: 'user', content: 'x'.repeat(5000) }] }),
    });
    expect(big.status).toBe(413);
    expect(JSON.parse(big.body)).toEqual({
      error: { message: 'Request body exceeds 4096 bytes', type: 'invalid_request', code: 'body_too_large' },
    });
    expect(upstreamCalls).toBe(0);
  });

  it('emits exactly one record per request under concurrency', async () => {
    behavior = (_req, res) => {
      setTimeout(() => {
        res.writeHead(200);
        res.end(JSON.stringify(doneEvent(1, 1)));
      }, 20);
    };

    const responses = await Promise.all(
      Array.from({ length: 5 }, () =>
        httpRequest(`${gateway.url}/v1/chat/completions`, { method: 'POST', headers: AUTH, body: chatBody() }),
      ),
    );
    expect(responses.map((r) => r.status)).toEqual([200, 200, 200, 200, 200]);
    await waitFor(() => sink.records.length === 5);
    const ids = new Set(sink.records.map((r) => r.requestId));
    expect(ids.size).toBe(5);
    expect(upstreamCalls).toBe(5);
  });

  // ==========================================================================
  // Other routes
  // ==========================================================================

  it('lists models for authenticated callers', async () => {
    const resp = await httpRequest(`${gateway.url}/v1/models`, { headers: AUTH });
    expect(resp.status).toBe(200);
    const list: unknown = JSON.parse(resp.body);
    expect(list).toMatchObject({ object: 'list', data: [{ id: 'llama3', object: 'model', owned_by: 'modelgate' }] });
    expect(resp.body).not.toContain(String(backend.port));

    const anon = await httpRequest(`${gateway.url}/v1/models`);
    expect(anon.status).toBe(401);
  });

  it('reports health without auth', async () => {
    const resp = await httpRequest(`${gateway.url}/healthz`);
    expect(resp.status).toBe(200);
    expect(JSON.parse(resp.body)).toMatchObject({ status: 'healthy', models: ['llama3'] });
    expect(resp.headers['x-request-id']).toBeTruthy();
  });

  it('answers CORS preflight and unknown routes', async () => {
    const preflight = await httpRequest(`${gateway.url}/v1/chat/completions`, { method: 'OPTIONS' });
    expect(preflight.status).toBe(204);
    expect(preflight.headers['access-control-allow-origin']).toBe('*');

    const missing = await httpRequest(`${gateway.url}/v1/completions`, { method: 'POST' });
    expect(missing.status).toBe(404);
    expect(JSON.parse(missing.body)).toEqual({
      error: { message: 'Unknown endpoint: /v1/completions', type: 'not_found', code: 'not_found' },
    });
    expect(missing.headers['x-request-id']).toBeTruthy();
  });
});

describe('GatewayServer CORS allow-list', () => {
  it('echoes only allowed origins', async () => {
    const gateway = new GatewayServer({
      registry: new ModelRegistry([]),
      keys: [],
      host: '127.0.0.1',
      port: 0,
      logger: silentLogger,
      corsOrigins: ['http://app.test'],
    });
    await gateway.start();
    try {
      const allowed = await httpRequest(`${gateway.url}/health`, { headers: { Origin: 'http://app.test' } });
      expect(allowed.headers['access-control-allow-origin']).toBe('http://app.test');

      const other = await httpRequest(`${gateway.url}/health`, { headers: { Origin: 'http://evil.test' } });
      expect(other.headers['access-control-allow-origin']).toBeUndefined();
    } finally {
      await gateway.stop();
    }
  });
});
