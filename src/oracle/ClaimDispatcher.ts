import {
  CAN_CLAIM_RECENTLY_PLAYED_TRACK,
  CAN_CLAIM_TOP_ARTISTS,
  CAN_CLAIM_TOP_TRACKS,
  CLAIM_FUNCTIONS
} from '../protocol/constants';
import { ClaimFunction, ForeignCallResult } from '../types';
import { isRecord } from '../utils';
import {
  ClaimContext,
  handleCanClaimRecentlyPlayedTrack,
  handleCanClaimTopArtist,
  handleCanClaimTopTracks
} from './ClaimHandlers';
import { invalidParams } from './errors';

/**
 * Exact match against the known discriminators, in priority order.
 * Non-string values never match.
 */
export function parseClaimFunction(value: unknown): ClaimFunction | undefined {
  return CLAIM_FUNCTIONS.find(name => name === value);
}

/**
 * Entry point of `resolve_foreign_call`.
 * `params` is the raw JSON-RPC params value: a single-item array holding
 * `{ function, inputs }`.
 */
export async function resolveForeignCall(params: unknown, ctx: ClaimContext): Promise<ForeignCallResult> {
  if (!Array.isArray(params) || params.length !== 1) {
    throw invalidParams('Invalid params; expected a single-item array');
  }

  const request: unknown = params[0];
  if (!isRecord(request)) {
    throw invalidParams('Invalid params; expected an object');
  }
  if (!('function' in request)) {
    throw invalidParams("Missing 'function' field");
  }

  const fn = parseClaimFunction(request.function);
  if (fn === undefined) {
    throw invalidParams('Invalid method');
  }

  switch (fn) {
    case CAN_CLAIM_TOP_TRACKS:
      return handleCanClaimTopTracks(request, ctx);
    case CAN_CLAIM_TOP_ARTISTS:
      return handleCanClaimTopArtist(request, ctx);
    case CAN_CLAIM_RECENTLY_PLAYED_TRACK:
      return handleCanClaimRecentlyPlayedTrack(request, ctx);
    default: {
      const unreachable: never = fn;
      throw invalidParams(`Invalid method: ${String(unreachable)}`);
    }
  }
}
