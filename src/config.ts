/**
 * Configuration Management
 *
 * Process settings come from `MODELGATE_*` environment variables; models and
 * API keys come from a JSON file. Both are validated once at startup.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { KeyEntry } from './auth.js';
import type { LogFormat, LogLevel } from './logger.js';
import { ModelRegistry } from './registry.js';
import type { ModelEntry } from './types.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string,
  ) {
    super(`${source}: ${message}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Settings
// ============================================================================

const SettingsSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  configPath: z.string().min(1).default('config/gateway.json'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['json', 'console']).default('json'),
  corsOrigins: z
    .string()
    .default('*')
    .transform((s) => s.split(',').map((o) => o.trim()).filter(Boolean)),
  usageDb: z.string().min(1).optional(),
});

export interface Settings {
  readonly host: string;
  readonly port: number;
  readonly configPath: string;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly corsOrigins: readonly string[];
  readonly usageDb?: string;
}

export type SettingsOverrides = { -readonly [K in 'host' | 'port' | 'configPath' | 'logLevel']?: Settings[K] };

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read settings from the environment. `overrides` (CLI flags) win.
 *
 * @throws ConfigError on an invalid value
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, overrides: SettingsOverrides = {}): Settings {
  const result = SettingsSchema.safeParse({
    host: blankToUndefined(env['MODELGATE_HOST']),
    port: blankToUndefined(env['MODELGATE_PORT']),
    configPath: blankToUndefined(env['MODELGATE_CONFIG']),
    logLevel: blankToUndefined(env['MODELGATE_LOG_LEVEL'])?.toLowerCase(),
    logFormat: blankToUndefined(env['MODELGATE_LOG_FORMAT'])?.toLowerCase(),
    corsOrigins: blankToUndefined(env['MODELGATE_CORS_ORIGINS']),
    usageDb: blankToUndefined(env['MODELGATE_USAGE_DB']),
  });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), 'environment');
  }
  return Object.freeze({ ...result.data, ...definedOnly(overrides) });
}

function definedOnly(overrides: SettingsOverrides): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (overrides.host !== undefined) out.host = overrides.host;
  if (overrides.port !== undefined) out.port = overrides.port;
  if (overrides.configPath !== undefined) out.configPath = overrides.configPath;
  if (overrides.logLevel !== undefined) out.logLevel = overrides.logLevel;
  return out;
}

// ============================================================================
// Gateway config (models + keys)
// ============================================================================

const ModelConfigSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535),
  model: z.string().min(1).optional(),
  quant: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30_000),
});

const KeyConfigSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  quota: z.literal('unlimited').default('unlimited'),
  enabled: z.boolean().default(true),
});

export const GatewayConfigSchema = z
  .object({
    models: z.array(ModelConfigSchema),
    keys: z.array(KeyConfigSchema),
  })
  .superRefine((config, ctx) => {
    const names = new Set<string>();
    config.models.forEach((m, i) => {
      if (names.has(m.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['models', i, 'name'], message: `duplicate model name '${m.name}'` });
      }
      names.add(m.name);
    });
    const keys = new Set<string>();
    config.keys.forEach((k, i) => {
      // The key itself stays out of the message.
      if (keys.has(k.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['keys', i, 'key'], message: `duplicate key (entry '${k.name}')` });
      }
      keys.add(k.key);
    });
  });

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type KeyConfig = z.infer<typeof KeyConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an already-parsed config document.
 *
 * @throws ConfigError
 */
export function parseGatewayConfig(raw: unknown, source = 'config'): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(raw);
  if (!result.success) throw new ConfigError(formatIssues(result.error), source);
  return result.data;
}

/**
 * Load and validate the gateway config file. There is no default fallback.
 *
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export function loadGatewayConfig(configPath: string): GatewayConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error && 'code' in err && err.code === 'ENOENT' ? 'file not found' : String(err);
    throw new ConfigError(reason, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`JSON parse error: ${err instanceof Error ? err.message : String(err)}`, configPath);
  }
  return parseGatewayConfig(raw, configPath);
}

export function toModelEntries(config: GatewayConfig): ModelEntry[] {
  return config.models.map((m) => {
    const entry: ModelEntry = {
      name: m.name,
      host: m.host,
      port: m.port,
      backendModel: m.model ?? m.name,
      timeoutMs: m.timeoutMs,
      ...(m.quant !== undefined ? { defaultQuant: m.quant } : {}),
    };
    return entry;
  });
}

export function toKeyEntries(config: GatewayConfig): KeyEntry[] {
  return config.keys.map((k) => ({ key: k.key, displayName: k.name, quota: k.quota, enabled: k.enabled }));
}

export function buildRegistry(config: GatewayConfig): ModelRegistry {
  return new ModelRegistry(toModelEntries(config));
}

export const EXAMPLE_CONFIG: GatewayConfig = {
  models: [
    { name: 'llama3', host: 'localhost', port: 11434, model: 'llama3:8b', quant: 'q4_0', timeoutMs: 30_000 },
    { name: 'mistral', host: 'localhost', port: 11435, timeoutMs: 30_000 },
  ],
  keys: [{ key: 'change-me', name: 'local-dev', quota: 'unlimited', enabled: true }],
};

/**
 * Write a starter config file. Returns false when one already exists.
 */
export function writeExampleConfig(configPath: string): boolean {
  if (fs.existsSync(configPath)) return false;
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(EXAMPLE_CONFIG, null, 2) + '\n', 'utf-8');
  return true;
}
