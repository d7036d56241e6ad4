import { ClaimEvaluator } from '../core/ClaimEvaluator';
import { timeRangeFromNumber } from '../core/TimeRange';
import { TokenStore } from '../core/TokenStore';
import { ForeignCallResult, RecentlyPlayedClaim, TimeRange, TopListClaim } from '../types';
import { invalidParams, invalidParamsWithDetails } from './errors';
import { FieldDecodeError, FieldDecoder } from './FieldDecoder';
import { extractInputs } from './InputExtractor';

/** Collaborators a claim handler needs. Built once, shared by every call. */
export interface ClaimContext {
  decoder: FieldDecoder;
  tokenStore: TokenStore;
  evaluator: ClaimEvaluator;
}

type TopListEvaluation = (
  evaluator: ClaimEvaluator,
  token: string,
  claim: TopListClaim
) => Promise<boolean>;

function decodeWith<T>(decode: () => T): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof FieldDecodeError) throw invalidParams(err.message);
    throw err;
  }
}

function selectTimeRange(value: number): TimeRange {
  try {
    return timeRangeFromNumber(value);
  } catch (err) {
    throw invalidParamsWithDetails(err);
  }
}

function decodeTopListClaim(request: Record<string, unknown>, decoder: FieldDecoder): TopListClaim {
  const { key, track, rangeA, rangeB } = extractInputs(request);
  const { keyData, trackData, timeRanges, listRanges } = decodeWith(() => ({
    keyData: decoder.decodeString(key),
    trackData: decoder.decodeString(track),
    timeRanges: decoder.decodeBytes(rangeA),
    listRanges: decoder.decodeBytes(rangeB)
  }));

  if (timeRanges.length === 0 || listRanges.length === 0) {
    throw invalidParams('Time range or list range is empty');
  }

  return { key: keyData, track: trackData, timeRange: selectTimeRange(timeRanges[0]), listRange: listRanges[0] };
}

function decodeRecentlyPlayedClaim(request: Record<string, unknown>, decoder: FieldDecoder): RecentlyPlayedClaim {
  const { key, track, rangeA, rangeB } = extractInputs(request);
  const { keyData, trackData, afters, listRanges } = decodeWith(() => ({
    keyData: decoder.decodeString(key),
    trackData: decoder.decodeString(track),
    afters: decoder.decodeU64s(rangeA),
    listRanges: decoder.decodeBytes(rangeB)
  }));

  if (afters.length === 0 || listRanges.length === 0) {
    throw invalidParams('Time range or list range is empty');
  }

  return { key: keyData, track: trackData, after: afters[0], listRange: listRanges[0] };
}

async function fetchToken(tokenStore: TokenStore, key: string): Promise<string> {
  try {
    return await tokenStore.get(key);
  } catch (err) {
    throw invalidParamsWithDetails(err);
  }
}

async function evaluate(run: () => Promise<boolean>): Promise<ForeignCallResult> {
  try {
    return { values: [await run()] };
  } catch (err) {
    throw invalidParamsWithDetails(err);
  }
}

async function handleTopListClaim(
  request: Record<string, unknown>,
  ctx: ClaimContext,
  evaluation: TopListEvaluation
): Promise<ForeignCallResult> {
  const claim = decodeTopListClaim(request, ctx.decoder);
  const token = await fetchToken(ctx.tokenStore, claim.key);
  return evaluate(() => evaluation(ctx.evaluator, token, claim));
}

export function handleCanClaimTopTracks(request: Record<string, unknown>, ctx: ClaimContext): Promise<ForeignCallResult> {
  return handleTopListClaim(request, ctx, (evaluator, token, claim) =>
    evaluator.canClaimTopTracks(token, claim.track, claim.timeRange, claim.listRange));
}

export function handleCanClaimTopArtist(request: Record<string, unknown>, ctx: ClaimContext): Promise<ForeignCallResult> {
  return handleTopListClaim(request, ctx, (evaluator, token, claim) =>
    evaluator.canClaimTopArtist(token, claim.track, claim.timeRange, claim.listRange));
}

/** No selector enumeration here: the first "after" value goes through as-is. */
export async function handleCanClaimRecentlyPlayedTrack(
  request: Record<string, unknown>,
  ctx: ClaimContext
): Promise<ForeignCallResult> {
  const claim = decodeRecentlyPlayedClaim(request, ctx.decoder);
  const token = await fetchToken(ctx.tokenStore, claim.key);
  return evaluate(() => ctx.evaluator.canClaimRecentlyPlayedTrack(token, claim.track, claim.after, claim.listRange));
}
