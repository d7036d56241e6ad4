/**
 * Oracle wire constants.
 *
 * The `function` discriminators are matched byte-for-byte against what the
 * calling circuit sends. Changing a spelling breaks every deployed prover.
 */

// ── RPC method table ─────────────────────────────────────────────────
export const RESOLVE_FOREIGN_CALL = 'resolve_foreign_call';
export const STORE_KEY = 'store_key';
export const DELETE_KEY = 'delete_key';
export const RPC_METHODS = [RESOLVE_FOREIGN_CALL, STORE_KEY, DELETE_KEY] as const;
export const ADMIN_METHODS: readonly string[] = [STORE_KEY, DELETE_KEY];

// ── Claim discriminators (priority order) ────────────────────────────
export const CAN_CLAIM_TOP_TRACKS = 'can_claim_top_tracks';
export const CAN_CLAIM_TOP_ARTISTS = 'can_claim_top_artists';
export const CAN_CLAIM_RECENTLY_PLAYED_TRACK = 'can_claim_recently_played_track';
export const CLAIM_FUNCTIONS = [
  CAN_CLAIM_TOP_TRACKS,
  CAN_CLAIM_TOP_ARTISTS,
  CAN_CLAIM_RECENTLY_PLAYED_TRACK
] as const;

// ── Foreign call inputs ──────────────────────────────────────────────
export const FOREIGN_CALL_INPUT_COUNT = 4;
export const WIRE_SCALAR_PREFIX = '0x';

// ── Listening history API ────────────────────────────────────────────
export const DEFAULT_API_BASE_URL = 'https://api.spotify.com/v1';
export const MIN_LIST_RANGE = 1;
export const MAX_LIST_RANGE = 50;                      // API rejects larger page sizes
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const ERROR_BODY_EXCERPT_CHARS = 200;

// ── Server defaults ──────────────────────────────────────────────────
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = 'localhost';
export const DEFAULT_DATA_DIR = 'data';
export const DEFAULT_BODY_LIMIT = '64kb';
export const DEFAULT_RATE_LIMIT_PER_MINUTE = 120;
export const RATE_LIMIT_WINDOW_MS = 60 * 1000;
export const TOKEN_FILE_NAME = 'tokens.json';
