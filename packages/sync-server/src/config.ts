/**
 * Server configuration from command-line flags and environment variables
 */

import { DEFAULT_SYNC_CONFIG } from '@companion/sync';
import { z } from 'zod';
import type { SyncServerConfig } from './types.js';
import { DEFAULT_SERVER_CONFIG } from './types.js';

export type ParsedArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments. `--key value` and `-k value` take a value,
 * a flag followed by another flag (or nothing) is `true`.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) continue;

    const key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
    const nextArg = args[i + 1];

    if (nextArg !== undefined && !nextArg.startsWith('-')) {
      result[key] = nextArg;
      i++;
    } else {
      result[key] = true;
    }
  }

  return result;
}

export const ENV_PREFIX = 'COMPANION_SYNC_';

const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_SERVER_CONFIG.port),
  host: z.string().min(1).default(DEFAULT_SERVER_CONFIG.host),
  path: z.string().startsWith('/').default(DEFAULT_SERVER_CONFIG.path),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  offlineQueueLimit: z.coerce.number().int().positive().default(DEFAULT_SERVER_CONFIG.offlineQueueLimit),
  clientTimeout: z.coerce.number().int().positive().default(DEFAULT_SERVER_CONFIG.clientTimeout),
  maxClockSkewMs: z.coerce.number().int().nonnegative().default(DEFAULT_SYNC_CONFIG.maxClockSkewMs),
});

export type ServerSettings = z.infer<typeof serverConfigSchema>;

export type LoadConfigResult = { ok: true; settings: ServerSettings } | { ok: false; error: string };

function stringArg(args: ParsedArgs, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = args[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Resolve settings: flags win over environment variables, which win over
 * defaults.
 */
export function loadServerConfig(args: ParsedArgs, env: NodeJS.ProcessEnv = {}): LoadConfigResult {
  const raw = {
    port: stringArg(args, 'port', 'p') ?? envValue(env, 'PORT'),
    host: stringArg(args, 'host', 'h') ?? envValue(env, 'HOST'),
    path: stringArg(args, 'path') ?? envValue(env, 'PATH'),
    logLevel: args.debug === true ? 'debug' : (stringArg(args, 'log-level') ?? envValue(env, 'LOG_LEVEL')),
    offlineQueueLimit: stringArg(args, 'offline-queue-limit') ?? envValue(env, 'OFFLINE_QUEUE_LIMIT'),
    clientTimeout: stringArg(args, 'client-timeout') ?? envValue(env, 'CLIENT_TIMEOUT'),
    maxClockSkewMs: stringArg(args, 'max-clock-skew') ?? envValue(env, 'MAX_CLOCK_SKEW'),
  };

  const result = serverConfigSchema.safeParse(raw);
  if (!result.success) {
    const error = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return { ok: false, error };
  }

  return { ok: true, settings: result.data };
}

/**
 * Map resolved settings onto a server configuration
 */
export function toServerConfig(settings: ServerSettings): SyncServerConfig {
  return {
    port: settings.port,
    host: settings.host,
    path: settings.path,
    logging: settings.logLevel,
    offlineQueueLimit: settings.offlineQueueLimit,
    clientTimeout: settings.clientTimeout,
    sync: { maxClockSkewMs: settings.maxClockSkewMs },
  };
}
