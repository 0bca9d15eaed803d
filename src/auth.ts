/**
 * Auth Guard
 *
 * Validates bearer API keys against the configured key table.
 *
 * @packageDocumentation
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { Unauthorized } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { Principal } from './types.js';

export interface KeyEntry extends Principal {
  enabled: boolean;
}

/**
 * Short, non-reversible key fingerprint for logs.
 */
export function fingerprint(key: string): string {
  return createHash('sha256').update(key).digest('hex').slice(0, 12);
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 * Returns null when the header is absent or not a bearer credential.
 */
export function parseBearer(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer[ \t]+(\S+)[ \t]*$/i.exec(header);
  return match?.[1] ?? null;
}

interface StoredKey {
  digest: Buffer;
  entry: KeyEntry;
}

export class AuthGuard {
  private readonly keys: ReadonlyMap<string, StoredKey>;
  private readonly logger: Logger;

  constructor(keys: Iterable<KeyEntry>, logger: Logger = silentLogger) {
    const map = new Map<string, StoredKey>();
    for (const entry of keys) {
      const digest = createHash('sha256').update(entry.key).digest();
      map.set(digest.toString('hex'), { digest, entry: Object.freeze({ ...entry }) });
    }
    this.keys = map;
    this.logger = logger;
  }

  /**
   * Authenticate the raw `Authorization` header value.
   *
   * Keys are looked up by SHA-256 digest and the digests compared with
   * `timingSafeEqual`, so lookup time does not depend on how much of a key matched.
   *
   * @throws Unauthorized when the header is missing, malformed, unknown or disabled
   */
  authenticate(authorization: string | undefined): Principal {
    if (!authorization) {
      this.logger.warn('Authentication failed', { reason: 'missing authorization header' });
      throw new Unauthorized('Authorization header required');
    }

    const token = parseBearer(authorization);
    if (!token) {
      this.logger.warn('Authentication failed', { reason: 'malformed authorization header' });
      throw new Unauthorized('Authorization header must use the Bearer scheme');
    }

    const digest = createHash('sha256').update(token).digest();
    const stored = this.keys.get(digest.toString('hex'));
    if (!stored || !timingSafeEqual(stored.digest, digest)) {
      this.logger.warn('Authentication failed', { reason: 'unknown key', key: fingerprint(token) });
      throw new Unauthorized();
    }

    if (!stored.entry.enabled) {
      this.logger.warn('Authentication failed', { reason: 'key disabled', key: fingerprint(token) });
      throw new Unauthorized('API key is disabled');
    }

    this.logger.debug('Authentication successful', { key: fingerprint(token), name: stored.entry.displayName });
    const { key, displayName, quota } = stored.entry;
    return { key, displayName, quota };
  }

  get size(): number {
    return this.keys.size;
  }
}
