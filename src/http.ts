/**
 * HTTP plumbing shared by the server and the request handler.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import { ClientDisconnected, InvalidRequest, Unauthorized, type GatewayError } from './errors.js';

export const MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB max request body

/**
 * Read the full request body. Past the limit the rest is drained, not
 * buffered, so the 413 can still be written.
 *
 * @throws InvalidRequest (413) past MAX_BODY_SIZE
 * @throws ClientDisconnected when the client goes away mid-body
 */
export function readBody(req: http.IncomingMessage, limit = MAX_BODY_SIZE): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        reject(new InvalidRequest(`Request body exceeds ${limit} bytes`, 413));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', () => reject(new ClientDisconnected()));
    req.on('close', () => {
      if (!req.complete) reject(new ClientDisconnected());
    });
  });
}

export function sendJson(res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    ...headers,
    'Content-Type': 'application/json',
    'Content-Length': String(Buffer.byteLength(payload)),
  });
  res.end(payload);
}

/**
 * Answer with the error's JSON body. A response that has already started
 * streaming is just closed.
 */
export function sendError(res: http.ServerResponse, error: GatewayError): void {
  if (res.writableEnded || res.destroyed) return;
  if (res.headersSent) {
    res.end();
    return;
  }
  const headers: Record<string, string> = error instanceof Unauthorized ? { 'WWW-Authenticate': 'Bearer' } : {};
  sendJson(res, error.status, error.toBody(), headers);
}
