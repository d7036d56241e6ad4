import * as constants from '../../src/protocol/constants';
import { parseClaimFunction } from '../../src/oracle/ClaimDispatcher';

describe('Oracle constants', () => {
  test('claim discriminators keep their wire spellings', () => {
    expect(constants.CAN_CLAIM_TOP_TRACKS).toBe('can_claim_top_tracks');
    expect(constants.CAN_CLAIM_TOP_ARTISTS).toBe('can_claim_top_artists');
    expect(constants.CAN_CLAIM_RECENTLY_PLAYED_TRACK).toBe('can_claim_recently_played_track');
  });

  test('claim discriminators are listed in routing priority order', () => {
    expect(constants.CLAIM_FUNCTIONS).toEqual([
      'can_claim_top_tracks',
      'can_claim_top_artists',
      'can_claim_recently_played_track'
    ]);
  });

  test('RPC method table', () => {
    expect(constants.RPC_METHODS).toEqual(['resolve_foreign_call', 'store_key', 'delete_key']);
    expect(constants.ADMIN_METHODS).toEqual(['store_key', 'delete_key']);
  });

  test('list range bounds match the API page size', () => {
    expect(constants.MIN_LIST_RANGE).toBe(1);
    expect(constants.MAX_LIST_RANGE).toBe(50);
  });
});

describe('parseClaimFunction', () => {
  test('exact matches only', () => {
    expect(parseClaimFunction('can_claim_top_artists')).toBe('can_claim_top_artists');
    expect(parseClaimFunction(' can_claim_top_artists')).toBeUndefined();
    expect(parseClaimFunction('can_claim_top_artist')).toBeUndefined();
    expect(parseClaimFunction(undefined)).toBeUndefined();
  });
});
