import { CLAIM_FUNCTIONS, RPC_METHODS } from '../protocol/constants';

/** One field element as the proving system serializes it: `0x` + hex digits. */
export type WireScalar = string;

export type ClaimFunction = typeof CLAIM_FUNCTIONS[number];
export type RpcMethod = typeof RPC_METHODS[number];

export type TimeRange = 'short_term' | 'medium_term' | 'long_term';

/**
 * 'lenient' maps malformed scalars to a sentinel (0 or "\0").
 * 'strict' fails the call instead.
 */
export type DecodePolicy = 'lenient' | 'strict';

export type TokenStoreKind = 'memory' | 'file';

/**
 * The four positional input arrays of a foreign call, still undecoded.
 * `rangeA` is the time range (or "after" timestamp), `rangeB` the list range.
 */
export interface ForeignCallInputs {
  key: unknown[];
  track: unknown[];
  rangeA: unknown[];
  rangeB: unknown[];
}

export interface TopListClaim {
  key: string;
  track: string;
  timeRange: TimeRange;
  listRange: number;
}

export interface RecentlyPlayedClaim {
  key: string;
  track: string;
  after: bigint;
  listRange: number;
}

export interface ForeignCallResult {
  values: [boolean];
}

export interface OracleConfig {
  port: number;
  host: string;
  apiKey?: string;
  cors: boolean;
  store: TokenStoreKind;
  dataDir: string;
  decodePolicy: DecodePolicy;
  rateLimitPerMinute: number;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  bodyLimit: string;
}

export interface ServeOptions {
  port?: number;
  host?: string;
  apiKey?: string;
  cors?: boolean;
  bodyLimit?: string;
  rateLimitPerMinute?: number;
}
