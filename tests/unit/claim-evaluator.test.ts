import { ClaimEvaluationError, FetchLike, SpotifyClaimEvaluator } from '../../src/core/ClaimEvaluator';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('SpotifyClaimEvaluator', () => {
  let fetchMock: jest.Mock<ReturnType<FetchLike>, Parameters<FetchLike>>;
  let evaluator: SpotifyClaimEvaluator;

  beforeEach(() => {
    fetchMock = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
    evaluator = new SpotifyClaimEvaluator({ baseUrl: 'https://api.test/v1/', fetchImpl: fetchMock });
  });

  describe('canClaimTopTracks', () => {
    test('true when the track is on the requested page', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [{ id: 'trk1' }, { id: 'trk2' }] }));
      await expect(evaluator.canClaimTopTracks('test-token', 'trk2', 'short_term', 5)).resolves.toBe(true);
    });

    test('false when the track is absent', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [{ id: 'trk1' }] }));
      await expect(evaluator.canClaimTopTracks('test-token', 'trk9', 'short_term', 5)).resolves.toBe(false);
    });

    test('requests the top tracks page with bearer auth', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [] }));
      await evaluator.canClaimTopTracks('test-token', 'trk1', 'long_term', 10);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.test/v1/me/top/tracks?time_range=long_term&limit=10');
      expect(init.headers).toEqual({ Authorization: 'Bearer test-token' });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe('canClaimTopArtist', () => {
    test('matches on artist id', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [{ id: 'art1', name: 'Someone' }] }));
      await expect(evaluator.canClaimTopArtist('test-token', 'art1', 'medium_term', 1)).resolves.toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.test/v1/me/top/artists?time_range=medium_term&limit=1');
    });
  });

  describe('canClaimRecentlyPlayedTrack', () => {
    test('matches on the nested track id', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        items: [{ track: { id: 'trk1' }, played_at: '2024-01-01T00:00:00Z' }, { track: null }]
      }));
      await expect(
        evaluator.canClaimRecentlyPlayedTrack('test-token', 'trk1', 1_700_000_000_000n, 50)
      ).resolves.toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://api.test/v1/me/player/recently-played?after=1700000000000&limit=50'
      );
    });

    test('a top-level id is not a track match', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [{ id: 'trk1' }] }));
      await expect(evaluator.canClaimRecentlyPlayedTrack('test-token', 'trk1', 0n, 5)).resolves.toBe(false);
    });
  });

  describe('list range', () => {
    test.each([0, 51, 255])('rejects %i before any request', async (limit) => {
      await expect(evaluator.canClaimTopTracks('test-token', 'trk1', 'short_term', limit)).rejects.toThrow(
        `List range must be between 1 and 50, got ${limit}`
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('API failures', () => {
    test('non-2xx responses reject with the status and body excerpt', async () => {
      fetchMock.mockResolvedValue(new Response('The access token expired', { status: 401 }));
      const failure = evaluator.canClaimTopTracks('test-token', 'trk1', 'short_term', 5);
      await expect(failure).rejects.toThrow(ClaimEvaluationError);
      await expect(failure).rejects.toThrow('Listening history API returned 401: The access token expired');
    });

    test('body excerpts are capped', async () => {
      fetchMock.mockResolvedValue(new Response('x'.repeat(500), { status: 500 }));
      await expect(evaluator.canClaimTopTracks('test-token', 'trk1', 'short_term', 5)).rejects.toThrow(
        `Listening history API returned 500: ${'x'.repeat(200)}`
      );
    });

    test('payloads without items are rejected', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: 'nope' }));
      await expect(evaluator.canClaimTopArtist('test-token', 'art1', 'short_term', 5)).rejects.toThrow(
        'Listening history API returned an unexpected payload'
      );
    });

    test('transport errors propagate', async () => {
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));
      await expect(evaluator.canClaimTopTracks('test-token', 'trk1', 'short_term', 5)).rejects.toThrow(
        'connect ECONNREFUSED'
      );
    });
  });
});
