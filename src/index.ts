export { JsonRpcServer, createOracleRpc, callsAdminMethod, OracleDependencies } from './server/JsonRpcServer';
export { resolveForeignCall, parseClaimFunction } from './oracle/ClaimDispatcher';
export {
  ClaimContext,
  handleCanClaimTopTracks,
  handleCanClaimTopArtist,
  handleCanClaimRecentlyPlayedTrack
} from './oracle/ClaimHandlers';
export { extractInputs } from './oracle/InputExtractor';
export { FieldDecoder, FieldDecodeError, hexToU8, hexToU64, hexToChar, encodeString } from './oracle/FieldDecoder';
export { storeKey, deleteKey } from './oracle/TokenAdmin';
export { invalidParams, invalidParamsWithDetails } from './oracle/errors';
export { TokenStore, MemoryTokenStore, FileTokenStore, TokenNotFoundError } from './core/TokenStore';
export {
  ClaimEvaluator,
  SpotifyClaimEvaluator,
  SpotifyClaimEvaluatorOptions,
  ClaimEvaluationError,
  FetchLike
} from './core/ClaimEvaluator';
export { timeRangeFromNumber, TimeRangeError } from './core/TimeRange';
export { RateLimiter } from './core/RateLimiter';
export { loadConfig } from './config';
export { formatKey, errorMessage, log, logWarn, logError } from './utils';
export * from './protocol/constants';
export {
  WireScalar,
  ClaimFunction,
  RpcMethod,
  TimeRange,
  DecodePolicy,
  TokenStoreKind,
  ForeignCallInputs,
  TopListClaim,
  RecentlyPlayedClaim,
  ForeignCallResult,
  OracleConfig,
  ServeOptions
} from './types';
