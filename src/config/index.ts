import {
  DEFAULT_API_BASE_URL,
  DEFAULT_BODY_LIMIT,
  DEFAULT_DATA_DIR,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT_PER_MINUTE,
  DEFAULT_REQUEST_TIMEOUT_MS
} from '../protocol/constants';
import { DecodePolicy, OracleConfig, TokenStoreKind } from '../types';

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: ${raw} (expected an integer >= ${min})`);
  }
  return value;
}

function parseStoreKind(raw: string | undefined): TokenStoreKind {
  if (raw === undefined || raw === '') return 'file';
  if (raw === 'memory' || raw === 'file') return raw;
  throw new Error(`Invalid ORACLE_STORE: ${raw} (expected "memory" or "file")`);
}

function parseDecodePolicy(raw: string | undefined): DecodePolicy {
  if (raw === undefined || raw === '') return 'lenient';
  const normalized = raw.toLowerCase();
  if (normalized === '1' || normalized === 'true') return 'strict';
  if (normalized === '0' || normalized === 'false') return 'lenient';
  throw new Error(`Invalid ORACLE_STRICT_DECODING: ${raw} (expected true or false)`);
}

/**
 * Resolve server configuration. Explicit overrides (CLI flags) win over the
 * environment, which wins over defaults.
 */
export function loadConfig(overrides: Partial<OracleConfig> = {}, env: Env = process.env): OracleConfig {
  const fromEnv: OracleConfig = {
    port: parseInteger('ORACLE_PORT', env.ORACLE_PORT, DEFAULT_PORT, 1),
    host: env.ORACLE_HOST || DEFAULT_HOST,
    apiKey: env.ORACLE_API_KEY || undefined,
    cors: true,
    store: parseStoreKind(env.ORACLE_STORE),
    dataDir: env.ORACLE_DATA_DIR || DEFAULT_DATA_DIR,
    decodePolicy: parseDecodePolicy(env.ORACLE_STRICT_DECODING),
    rateLimitPerMinute: parseInteger('ORACLE_RATE_LIMIT', env.ORACLE_RATE_LIMIT, DEFAULT_RATE_LIMIT_PER_MINUTE),
    apiBaseUrl: env.SPOTIFY_API_BASE || DEFAULT_API_BASE_URL,
    requestTimeoutMs: parseInteger('ORACLE_REQUEST_TIMEOUT_MS', env.ORACLE_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS, 1),
    bodyLimit: DEFAULT_BODY_LIMIT
  };

  const merged: OracleConfig = { ...fromEnv };
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [name]: value });
  }

  if (!Number.isInteger(merged.port) || merged.port < 1 || merged.port > 65535) {
    throw new Error(`Invalid port: ${merged.port}`);
  }
  if (!Number.isInteger(merged.rateLimitPerMinute) || merged.rateLimitPerMinute < 0) {
    throw new Error(`Invalid rate limit: ${merged.rateLimitPerMinute}`);
  }
  return merged;
}
