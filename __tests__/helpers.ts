/**
 * Shared fixtures: in-process stand-in backends and a tiny HTTP client.
 */
import * as http from 'node:http';
import type { ModelEntry, UsageRecord, UsageSink } from '../src/types.js';

export interface MockServer {
  server: http.Server;
  port: number;
  url: string;
}

// Helper: create a simple HTTP server
export function createMockServer(handler: http.RequestListener): Promise<MockServer> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(handler);
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (!addr || typeof addr === 'string') {
        reject(new Error('server has no port'));
        return;
      }
      resolve({ server, port: addr.port, url: `http://127.0.0.1:${addr.port}` });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

export function readRequestJson(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf-8');
    req.on('data', (c: string) => (body += c));
    req.on('end', () => {
      try {
        resolve(JSON.parse(body));
      } catch (err) {
        reject(err);
      }
    });
    req.on('error', reject);
  });
}

export interface HttpResult {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function httpRequest(
  url: string,
  options: { method?: string; headers?: Record<string, string>; body?: string } = {},
): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = http.request(url, { method: options.method ?? 'GET', headers: options.headers, agent: false }, (res) => {
      let body = '';
      res.setEncoding('utf-8');
      res.on('data', (c: string) => (body += c));
      res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body }));
      res.on('error', reject);
    });
    req.on('error', reject);
    req.end(options.body);
  });
}

export function ndjson(events: unknown[]): string {
  return events.map((e) => JSON.stringify(e) + '\n').join('');
}

/** Split an SSE body into its frames (without the trailing blank line). */
export function sseFrames(body: string): string[] {
  return body.split('\n\n').filter((f) => f.length > 0);
}

export function modelEntry(port: number, overrides: Partial<ModelEntry> = {}): ModelEntry {
  return {
    name: 'llama3',
    host: '127.0.0.1',
    port,
    backendModel: 'llama3:8b',
    timeoutMs: 2000,
    ...overrides,
  };
}

export function contentEvent(content: string): Record<string, unknown> {
  return { model: 'llama3:8b', message: { role: 'assistant', content }, done: false };
}

export function doneEvent(promptTokens: number, evalTokens: number, doneReason = 'stop'): Record<string, unknown> {
  return {
    model: 'llama3:8b',
    message: { role: 'assistant', content: '' },
    done: true,
    done_reason: doneReason,
    prompt_eval_count: promptTokens,
    eval_count: evalTokens,
  };
}

export class RecordingSink implements UsageSink {
  readonly records: UsageRecord[] = [];

  emit(record: UsageRecord): void {
    this.records.push(record);
  }
}

export async function waitFor(check: () => boolean, timeoutMs = 2000, intervalMs = 10): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((r) => setTimeout(r, intervalMs));
  }
}
