/**
 * CLI commands. `cli.ts` is only the process entry point; everything here takes
 * its argv, environment and output stream as parameters.
 *
 * @packageDocumentation
 */

import {
  ConfigError,
  buildRegistry,
  loadGatewayConfig,
  loadSettings,
  toKeyEntries,
  writeExampleConfig,
  type Settings,
  type SettingsOverrides,
} from './config.js';
import { probeHealth } from './health.js';
import { createLogger } from './logger.js';
import { GatewayServer } from './server.js';
import { UsageStore, type UsageSummaryRow } from './storage/index.js';
import type { ModelEntry, UsageSink } from './types.js';
import { VERSION } from './version.js';

export type Command = 'start' | 'init' | 'models' | 'usage' | 'status';

const COMMANDS: readonly Command[] = ['start', 'init', 'models', 'usage', 'status'];

export interface CliArgs {
  command: Command;
  help: boolean;
  version: boolean;
  verbose: boolean;
  port?: number;
  host?: string;
  configPath?: string;
  days?: number;
  url?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function positiveInt(flag: string, value: string | undefined, max = Number.MAX_SAFE_INTEGER): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 1 || n > max) {
    throw new UsageError(`Invalid value for ${flag}: ${value ?? '(missing)'}`);
  }
  return n;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) throw new UsageError(`Missing value for ${flag}`);
  return value;
}

/**
 * @throws UsageError on an unknown command or flag
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'start', help: false, version: false, verbose: false };
  let i = 0;

  const first = argv[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) throw new UsageError(`Unknown command: ${first}`);
    args.command = first;
    i = 1;
  }

  for (; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--version':
        args.version = true;
        break;
      case '-v':
      case '--verbose':
        args.verbose = true;
        break;
      case '--port':
        args.port = positiveInt('--port', next, 65535);
        i++;
        break;
      case '--host':
        args.host = requireValue('--host', next);
        i++;
        break;
      case '--config':
        args.configPath = requireValue('--config', next);
        i++;
        break;
      case '--days':
        args.days = positiveInt('--days', next);
        i++;
        break;
      case '--url':
        args.url = requireValue('--url', next);
        i++;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg ?? ''}`);
    }
  }
  return args;
}

export const HELP = `
modelgate - OpenAI-compatible gateway for local model backends

Usage:
  modelgate [command] [options]

Commands:
  start (default)        Start the gateway
  init                   Write an example gateway config
  models                 List configured models
  usage [--days N]       Summarize the usage ledger (needs MODELGATE_USAGE_DB)
  status [--url URL]     Probe a running gateway's /health

Options:
  --port <number>    Port to listen on (default: 8000)
  --host <string>    Host to bind to (default: 0.0.0.0)
  --config <path>    Gateway config file (default: config/gateway.json)
  -v, --verbose      Enable debug logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  MODELGATE_HOST, MODELGATE_PORT, MODELGATE_CONFIG
  MODELGATE_LOG_LEVEL    debug | info | warn | error
  MODELGATE_LOG_FORMAT   json | console
  MODELGATE_CORS_ORIGINS comma-separated origins, or *
  MODELGATE_USAGE_DB     SQLite usage ledger path
`;

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Resolves when the process is asked to shut down. */
  shutdownSignal?: () => Promise<void>;
}

function settingsFor(args: CliArgs, env: NodeJS.ProcessEnv): Settings {
  const overrides: SettingsOverrides = {};
  if (args.port !== undefined) overrides.port = args.port;
  if (args.host !== undefined) overrides.host = args.host;
  if (args.configPath !== undefined) overrides.configPath = args.configPath;
  if (args.verbose) overrides.logLevel = 'debug';
  return loadSettings(env, overrides);
}

export function formatModels(models: readonly ModelEntry[]): string[] {
  if (models.length === 0) return ['No models configured'];
  return models.map((m) => {
    const quant = m.defaultQuant ? ` quant=${m.defaultQuant}` : '';
    return `${m.name}  backend=${m.backendModel}${quant} timeout=${m.timeoutMs}ms`;
  });
}

export function formatUsage(rows: readonly UsageSummaryRow[], days: number): string[] {
  if (rows.length === 0) return [`No requests in the last ${days} day(s)`];
  const lines = [`Usage, last ${days} day(s):`];
  for (const row of rows) {
    lines.push(
      `  ${row.model ?? '(none)'}: ${row.requests} requests ` +
        `(${row.completed} completed, ${row.failed} failed, ${row.aborted} aborted), ` +
        `tokens ${row.tokensPrompt}/${row.tokensResponse}, avg ${row.avgLatencyMs}ms`,
    );
  }
  return lines;
}

async function runStart(settings: Settings, ctx: CommandContext): Promise<number> {
  const logger = createLogger({ level: settings.logLevel, format: settings.logFormat });
  const config = loadGatewayConfig(settings.configPath);

  const sinks: UsageSink[] = [];
  const store = settings.usageDb ? new UsageStore(settings.usageDb) : null;
  if (store) sinks.push(store);

  const server = new GatewayServer({
    registry: buildRegistry(config),
    keys: toKeyEntries(config),
    host: settings.host,
    port: settings.port,
    corsOrigins: settings.corsOrigins,
    usageSinks: sinks,
    logger,
  });

  await server.start();
  try {
    await (ctx.shutdownSignal ?? waitForSignal)();
    logger.info('Shutting down');
  } finally {
    await server.stop();
    store?.close();
  }
  return 0;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

/**
 * Run one CLI invocation. Resolves to the process exit code.
 */
export async function run(argv: readonly string[], ctx: CommandContext): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.err(`Error: ${err.message}`);
      ctx.err('Run with --help for usage.');
      return 2;
    }
    throw err;
  }

  if (args.help) {
    ctx.out(HELP);
    return 0;
  }
  if (args.version) {
    ctx.out(`modelgate v${VERSION}`);
    return 0;
  }

  try {
    const settings = settingsFor(args, ctx.env);

    switch (args.command) {
      case 'start':
        return await runStart(settings, ctx);

      case 'init': {
        const created = writeExampleConfig(settings.configPath);
        ctx.out(created ? `Created ${settings.configPath}` : `${settings.configPath} already exists; left unchanged`);
        return 0;
      }

      case 'models': {
        const registry = buildRegistry(loadGatewayConfig(settings.configPath));
        for (const line of formatModels(registry.list())) ctx.out(line);
        return 0;
      }

      case 'usage': {
        if (!settings.usageDb) {
          ctx.err('Error: MODELGATE_USAGE_DB is not set');
          return 1;
        }
        const days = args.days ?? 7;
        const store = new UsageStore(settings.usageDb);
        try {
          for (const line of formatUsage(store.summary({ days }), days)) ctx.out(line);
        } finally {
          store.close();
        }
        return 0;
      }

      case 'status': {
        const url = args.url ?? `http://127.0.0.1:${settings.port}`;
        const probe = await probeHealth(url);
        if (!probe.ok) {
          ctx.err(`Gateway at ${url} is not healthy: ${probe.reason}`);
          return 1;
        }
        ctx.out(`Gateway at ${url} is healthy (v${probe.version}, up ${probe.uptime}s)`);
        ctx.out(`Models: ${probe.models.length ? probe.models.join(', ') : '(none)'}`);
        return 0;
      }
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      ctx.err(`Config error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
