import {
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  ERROR_BODY_EXCERPT_CHARS,
  MAX_LIST_RANGE,
  MIN_LIST_RANGE
} from '../protocol/constants';
import { TimeRange } from '../types';
import { isRecord } from '../utils';

export class ClaimEvaluationError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ClaimEvaluationError';
  }
}

/**
 * Answers claims about one user's listening history.
 * `token` authorizes the lookup; `limit` is how many top (or recent) entries to consider.
 */
export interface ClaimEvaluator {
  canClaimTopTracks(token: string, trackId: string, timeRange: TimeRange, limit: number): Promise<boolean>;
  canClaimTopArtist(token: string, artistId: string, timeRange: TimeRange, limit: number): Promise<boolean>;
  canClaimRecentlyPlayedTrack(token: string, trackId: string, after: bigint, limit: number): Promise<boolean>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface SpotifyClaimEvaluatorOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * ClaimEvaluator over the Spotify Web API.
 * Every claim is one GET of a page of at most `limit` items and an id match on that page.
 */
export class SpotifyClaimEvaluator implements ClaimEvaluator {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: SpotifyClaimEvaluatorOptions = {}) {
    this.baseUrl = (options.baseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async canClaimTopTracks(token: string, trackId: string, timeRange: TimeRange, limit: number): Promise<boolean> {
    const items = await this.getItems(token, '/me/top/tracks', { time_range: timeRange, limit });
    return items.some(item => isRecord(item) && item.id === trackId);
  }

  async canClaimTopArtist(token: string, artistId: string, timeRange: TimeRange, limit: number): Promise<boolean> {
    const items = await this.getItems(token, '/me/top/artists', { time_range: timeRange, limit });
    return items.some(item => isRecord(item) && item.id === artistId);
  }

  async canClaimRecentlyPlayedTrack(token: string, trackId: string, after: bigint, limit: number): Promise<boolean> {
    const items = await this.getItems(token, '/me/player/recently-played', { after: after.toString(), limit });
    return items.some(item => isRecord(item) && isRecord(item.track) && item.track.id === trackId);
  }

  private async getItems(token: string, path: string, query: { limit: number } & Record<string, string | number>): Promise<unknown[]> {
    // The list range byte arrives unchecked from the circuit; the API only serves 1..50.
    if (!Number.isInteger(query.limit) || query.limit < MIN_LIST_RANGE || query.limit > MAX_LIST_RANGE) {
      throw new ClaimEvaluationError(`List range must be between ${MIN_LIST_RANGE} and ${MAX_LIST_RANGE}, got ${query.limit}`);
    }

    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(query)) {
      url.searchParams.set(name, String(value));
    }

    const res = await this.fetchImpl(url.toString(), {
      headers: { Authorization: `Bearer ${token}` },
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!res.ok) {
      const body = await res.text();
      throw new ClaimEvaluationError(
        `Listening history API returned ${res.status}: ${body.slice(0, ERROR_BODY_EXCERPT_CHARS)}`,
        res.status
      );
    }

    const payload: unknown = await res.json();
    if (!isRecord(payload) || !Array.isArray(payload.items)) {
      throw new ClaimEvaluationError('Listening history API returned an unexpected payload');
    }
    return payload.items;
  }
}
