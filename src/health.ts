/**
 * Health endpoint handler + active health probe.
 * @packageDocumentation
 */

import * as http from 'node:http';
import { z } from 'zod';
import { sendJson } from './http.js';
import type { StatsSnapshot } from './stats.js';

export interface HealthReport {
  status: 'healthy';
  version: string;
  models: string[];
  /** Seconds since the server started. */
  uptime: number;
  stats: StatsSnapshot;
}

/**
 * Handle GET /health on the gateway.
 */
export function handleHealthRequest(res: http.ServerResponse, report: HealthReport): void {
  sendJson(res, 200, report);
}

const HealthBodySchema = z.object({
  status: z.literal('healthy'),
  version: z.string(),
  models: z.array(z.string()),
  uptime: z.number(),
});

export type ProbeResult =
  | { ok: true; version: string; models: string[]; uptime: number }
  | { ok: false; reason: string };

/**
 * Probe a gateway's /health endpoint.
 * Never rejects; failures come back as `{ ok: false, reason }`.
 */
export function probeHealth(gatewayUrl: string, timeoutMs = 2000): Promise<ProbeResult> {
  const url = new URL('/health', gatewayUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.setEncoding('utf-8');
      res.on('data', (c: string) => (data += c));
      res.on('end', () => {
        if (res.statusCode !== 200) {
          resolve({ ok: false, reason: `status ${res.statusCode ?? 'unknown'}` });
          return;
        }
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch {
          resolve({ ok: false, reason: 'invalid JSON' });
          return;
        }
        const parsed = HealthBodySchema.safeParse(json);
        if (!parsed.success) {
          resolve({ ok: false, reason: 'unexpected body' });
          return;
        }
        const { version, models, uptime } = parsed.data;
        resolve({ ok: true, version, models, uptime });
      });
      res.on('error', (err) => resolve({ ok: false, reason: err.message }));
    });
    req.on('error', (err) => resolve({ ok: false, reason: err.message }));
    req.on('timeout', () => {
      req.destroy();
      resolve({ ok: false, reason: 'timeout' });
    });
  });
}
