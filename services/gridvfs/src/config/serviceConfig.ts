import { z } from 'zod';
import { parseIdentityMap } from '../identity/directory';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nonnegative(),
  logLevel: z.custom<LogLevel>((value) =>
    value === 'fatal' ||
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug' ||
    value === 'trace'
  ),
  metricsEnabled: z.boolean(),
  backend: z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('local'),
      directory: z.string().min(1)
    }),
    z.object({
      kind: z.literal('memory')
    })
  ]),
  rootPath: z.string().min(1).startsWith('/'),
  zone: z.string().min(1),
  defaultOwner: z.string().min(1),
  identities: z.object({
    mode: z.union([z.literal('static'), z.literal('passthrough')]),
    entries: z.record(z.string().regex(/^\d+$/))
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

let cachedConfig: ServiceConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
      return normalized;
    default:
      return 'info';
  }
}

function resolveBackend(env: NodeJS.ProcessEnv): ServiceConfig['backend'] {
  const kind = (env.GRIDVFS_BACKEND || 'memory').trim().toLowerCase();
  switch (kind) {
    case 'local': {
      const directory = env.GRIDVFS_LOCAL_DIRECTORY?.trim();
      if (!directory) {
        throw new Error('Set GRIDVFS_LOCAL_DIRECTORY when GRIDVFS_BACKEND=local');
      }
      return { kind: 'local', directory };
    }
    case 'memory':
      return { kind: 'memory' };
    default:
      throw new Error(`Unsupported GRIDVFS_BACKEND: ${kind}`);
  }
}

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const host = env.GRIDVFS_HOST || env.HOST || '127.0.0.1';
  const port = parseNumber(env.GRIDVFS_PORT || env.PORT, 4400);
  const logLevel = resolveLogLevel(env.GRIDVFS_LOG_LEVEL);
  const metricsEnabled = parseBoolean(env.GRIDVFS_METRICS_ENABLED, true);
  const backend = resolveBackend(env);
  const zone = env.GRIDVFS_ZONE || 'tempZone';
  const defaultOwner = env.GRIDVFS_DEFAULT_OWNER || 'rods';
  const rootPath = env.GRIDVFS_ROOT_PATH || (backend.kind === 'local' ? '/' : `/${zone}/home/${defaultOwner}`);
  const identityModeEnv = (env.GRIDVFS_IDENTITY_MODE || '').trim().toLowerCase();
  const identityMode: 'static' | 'passthrough' =
    identityModeEnv === 'static'
      ? 'static'
      : identityModeEnv === 'passthrough'
        ? 'passthrough'
        : backend.kind === 'local'
          ? 'passthrough'
          : 'static';
  const identityEntries = env.GRIDVFS_IDENTITY_MAP
    ? parseIdentityMap(env.GRIDVFS_IDENTITY_MAP)
    : { [`${defaultOwner}#${zone}`]: '10000' };

  const candidateConfig: ServiceConfig = {
    host,
    port,
    logLevel,
    metricsEnabled,
    backend,
    rootPath,
    zone,
    defaultOwner,
    identities: {
      mode: identityMode,
      entries: identityEntries
    }
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
