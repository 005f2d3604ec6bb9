import { describe, it, expect } from 'vitest';
import { fixedTokenSource } from '../../auth/token-store.js';
import { ApiError, InaccessiblePlaylist } from '../../errors.js';
import type { Track } from '../../types.js';
import { DeezerClient, type DeezerTrack } from '../deezer.js';
import type { ApiRequest, ApiResponse } from '../http-client.js';
import { recordingSleep, respond, routedSender } from '../../__tests__/fakes/scripted-sender.js';

const deezerTrack = (index: number): DeezerTrack => ({
  id: 1000 + index,
  title: `Song ${index}`,
  duration: 215,
  artist: { id: 7, name: 'Artist X' },
  album: { id: 8, title: 'Album' }
});

function createClient(routes: Record<string, (request: ApiRequest) => ApiResponse>) {
  const { send, requests } = routedSender(routes);
  const client = new DeezerClient({
    tokens: fixedTokenSource('test-token'),
    send,
    sleep: recordingSleep().sleep,
    requestDelayMs: 0
  });
  return { client, requests };
}

async function collect(tracks: AsyncIterable<Track>): Promise<Track[]> {
  const result: Track[] = [];
  for await (const track of tracks) {
    result.push(track);
  }
  return result;
}

describe('DeezerClient', () => {
  describe('listPlaylistTracks', () => {
    it('requests ceil(total / 100) pages through next links', async () => {
      const next = 'https://api.deezer.com/playlist/1234567890/tracks?index=100&limit=100';
      const { client, requests } = createClient({
        'GET /playlist/1234567890/tracks': request =>
          request.url === next
            ? respond(200, { data: Array.from({ length: 20 }, (_, i) => deezerTrack(100 + i)), total: 120 })
            : respond(200, { data: Array.from({ length: 100 }, (_, i) => deezerTrack(i)), total: 120, next })
      });

      const tracks = await collect(client.listPlaylistTracks('1234567890'));

      expect(tracks).toHaveLength(120);
      expect(tracks[119]?.title).toBe('Song 119');
      expect(requests).toHaveLength(2);
      expect(requests[0]?.searchParams).toEqual({ index: 0, limit: 100 });
      expect(requests[1]?.url).toBe(next);
    });

    it('starts again from index 0 on a new listing', async () => {
      const next = 'https://api.deezer.com/playlist/1234567890/tracks?index=100&limit=100';
      const { client, requests } = createClient({
        'GET /playlist/1234567890/tracks': request =>
          request.url === next
            ? respond(200, { data: [deezerTrack(100)], total: 101 })
            : respond(200, { data: Array.from({ length: 100 }, (_, i) => deezerTrack(i)), total: 101, next })
      });
      const first = await collect(client.listPlaylistTracks('1234567890'));
      const second = await collect(client.listPlaylistTracks('1234567890'));

      expect(first).toHaveLength(101);
      expect(second).toEqual(first);
      expect(requests).toHaveLength(4);
      expect(requests[2]?.searchParams).toEqual({ index: 0, limit: 100 });
      expect(requests[3]?.url).toBe(next);
    });

    it('maps tracks without an access token', async () => {
      const { client, requests } = createClient({
        'GET /playlist/42/tracks': () => respond(200, { data: [deezerTrack(1)], total: 1 })
      });

      const tracks = await collect(client.listPlaylistTracks('42'));

      expect(tracks).toEqual([
        {
          title: 'Song 1',
          artist: 'Artist X',
          artists: ['Artist X'],
          album: 'Album',
          durationSeconds: 215,
          ids: { deezer: '1001' }
        }
      ]);
      expect(requests[0]?.searchParams).not.toHaveProperty('access_token');
    });

    it('reports a DataException as an inaccessible playlist', async () => {
      const { client } = createClient({
        'GET /playlist/42/tracks': () => respond(200, { error: { type: 'DataException', message: 'no data', code: 800 } })
      });

      const error = await collect(client.listPlaylistTracks('42')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InaccessiblePlaylist);
      expect(error).toMatchObject({ platform: 'deezer', playlistId: '42' });
    });
  });

  it('searches with the configured limit', async () => {
    const { client, requests } = createClient({
      'GET /search': () => respond(200, { data: [deezerTrack(3)], total: 1 })
    });

    const tracks = await client.searchTrack('artist x song 3');

    expect(tracks.map(track => track.ids?.deezer)).toEqual(['1003']);
    expect(requests[0]?.searchParams).toEqual({ q: 'artist x song 3', limit: 5 });
  });

  it('creates a playlist for the token owner', async () => {
    const { client, requests } = createClient({
      'POST /user/me/playlists': () => respond(200, { id: 987654 })
    });

    await expect(client.createPlaylist('My Mix')).resolves.toBe('987654');
    expect(requests[0]?.form).toEqual({ title: 'My Mix' });
    expect(requests[0]?.searchParams).toEqual({ access_token: 'test-token' });
  });

  it('adds tracks in batches of 50 comma-separated IDs', async () => {
    const { client, requests } = createClient({
      'POST /playlist/555/tracks': () => respond(200, true)
    });
    const ids = Array.from({ length: 120 }, (_, i) => String(i));

    const result = await client.addTracks('555', ids);

    expect(result).toEqual({ added: 120, failed: [] });
    expect(requests.map(request => request.form?.songs.split(',').length)).toEqual([50, 50, 20]);
    expect(requests[2]?.form?.songs).toBe(ids.slice(100).join(','));
  });

  it('records where a failed batch starts in the requested list', async () => {
    let calls = 0;
    const { client } = createClient({
      'POST /playlist/555/tracks': () => {
        calls++;
        return respond(200, calls !== 2);
      }
    });
    const ids = Array.from({ length: 120 }, (_, i) => String(i));

    const result = await client.addTracks('555', ids);

    expect(result.added).toBe(70);
    expect(result.failed.map(batch => [batch.offset, batch.trackIds.length])).toEqual([[50, 50]]);
  });

  it('records a batch Deezer did not accept', async () => {
    const { client } = createClient({
      'POST /playlist/555/tracks': () => respond(200, false)
    });

    const result = await client.addTracks('555', ['1', '2']);

    expect(result.added).toBe(0);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]?.error).toBeInstanceOf(ApiError);
  });

  it('lists playlists created by the current user', async () => {
    const { client } = createClient({
      'GET /user/me': () => respond(200, { id: 42, name: 'Test User' }),
      'GET /user/me/playlists': () =>
        respond(200, {
          data: [
            { id: 1, title: 'Mine', nb_tracks: 3, creator: { id: 42 } },
            { id: 2, title: 'Loved Tracks', nb_tracks: 80, creator: { id: 99 } }
          ],
          total: 2
        })
    });

    await expect(client.listUserPlaylists()).resolves.toEqual([{ id: '1', name: 'Mine', trackCount: 3 }]);
  });
});
