import { ApiError, InaccessiblePlaylist, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { PlatformUser, PlaylistSummary, Track } from '../types.js';
import { addInBatches } from './batches.js';
import { ApiClient, type ApiClientOptions, type ApiRequest, type BodyFailure } from './http-client.js';
import { paginate } from './pagination.js';
import type { AddTracksResult, PlatformClient } from './types.js';

export const DEEZER_API_BASE = 'https://api.deezer.com';

const PLAYLIST_PAGE_SIZE = 100;
const MAX_TRACKS_PER_REQUEST = 50;

// https://developers.deezer.com/api/errors
const QUOTA_EXCEEDED = 4;
const INVALID_TOKEN_CODES = new Set([200, 300]);
const DATA_NOT_FOUND = 800;

export interface DeezerTrack {
  id: number;
  title: string;
  duration: number;
  readable?: boolean;
  artist: {
    id: number;
    name: string;
  };
  album: {
    id: number;
    title: string;
  };
}

interface DeezerPage<T> {
  data: T[];
  total?: number;
  next?: string;
}

interface DeezerPlaylist {
  id: number;
  title: string;
  description?: string;
  nb_tracks: number;
  creator?: {
    id: number;
  };
}

interface DeezerUser {
  id: number;
  name: string;
}

interface DeezerErrorBody {
  error: {
    type?: string;
    message?: string;
    code?: number;
  };
}

export type DeezerClientOptions = Omit<ApiClientOptions, 'platform' | 'authorize' | 'inspectBody'> & {
  searchLimit?: number;
};

const isErrorBody = (body: unknown): body is DeezerErrorBody =>
  typeof body === 'object' &&
  body !== null &&
  'error' in body &&
  typeof body.error === 'object' &&
  body.error !== null;

/**
 * Deezer answers most failures with HTTP 200 and an `error` object
 */
export const inspectDeezerBody = (body: unknown): BodyFailure | null => {
  if (!isErrorBody(body)) {
    return null;
  }

  const { type, message = 'unknown error', code } = body.error;
  if (code === QUOTA_EXCEEDED) {
    return { kind: 'rate_limited' };
  }
  if (type === 'OAuthException' || (code !== undefined && INVALID_TOKEN_CODES.has(code))) {
    return { kind: 'unauthorized' };
  }
  if (code === DATA_NOT_FOUND || type === 'DataException') {
    return { kind: 'not_found', message };
  }
  return { kind: 'error', message: `${type ?? 'Exception'}: ${message}` };
};

const authorizeDeezer = (request: ApiRequest, accessToken: string): ApiRequest => ({
  ...request,
  searchParams: {
    ...request.searchParams,
    access_token: accessToken
  }
});

export const toTrack = (track: DeezerTrack): Track => ({
  title: track.title,
  artist: track.artist.name,
  artists: [track.artist.name],
  album: track.album.title,
  durationSeconds: track.duration,
  ids: { deezer: String(track.id) }
});

const toSummary = (playlist: DeezerPlaylist): PlaylistSummary => ({
  id: String(playlist.id),
  name: playlist.title,
  trackCount: playlist.nb_tracks,
  ...(playlist.description ? { description: playlist.description } : {})
});

/**
 * Deezer API client
 * Playlist reads and search are public; writes and /user/me need an OAuth token
 */
export class DeezerClient implements PlatformClient {
  readonly platform = 'deezer' as const;
  readonly maxTracksPerRequest = MAX_TRACKS_PER_REQUEST;
  private readonly api: ApiClient;
  private readonly searchLimit: number;

  constructor(options: DeezerClientOptions) {
    this.api = new ApiClient({
      ...options,
      platform: 'deezer',
      authorize: authorizeDeezer,
      inspectBody: inspectDeezerBody
    });
    this.searchLimit = options.searchLimit ?? 5;
  }

  async *listPlaylistTracks(playlistId: string): AsyncGenerator<Track, void, undefined> {
    const pages = paginate(
      {
        url: `${DEEZER_API_BASE}/playlist/${encodeURIComponent(playlistId)}/tracks`,
        searchParams: { index: 0, limit: PLAYLIST_PAGE_SIZE }
      },
      request => this.api.get<DeezerPage<DeezerTrack>>(request.url, request.searchParams, { auth: false }),
      page => ({ items: page.data ?? [], next: page.next })
    );

    try {
      for await (const track of pages) {
        yield toTrack(track);
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InaccessiblePlaylist('deezer', playlistId, { cause: error });
      }
      throw error;
    }
  }

  async getPlaylist(playlistId: string): Promise<PlaylistSummary> {
    try {
      const playlist = await this.api.get<DeezerPlaylist>(
        `${DEEZER_API_BASE}/playlist/${encodeURIComponent(playlistId)}`,
        undefined,
        { auth: false }
      );
      return toSummary(playlist);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InaccessiblePlaylist('deezer', playlistId, { cause: error });
      }
      throw error;
    }
  }

  async searchTrack(query: string): Promise<Track[]> {
    if (!query.trim()) {
      return [];
    }

    const response = await this.api.get<DeezerPage<DeezerTrack>>(
      `${DEEZER_API_BASE}/search`,
      { q: query, limit: this.searchLimit },
      { auth: false }
    );

    const tracks = (response.data ?? []).map(toTrack);
    logger.debug({ query, results: tracks.length }, 'deezer search completed');
    return tracks;
  }

  async createPlaylist(name: string): Promise<string> {
    const created = await this.api.request<{ id?: number }>(
      {
        method: 'POST',
        url: `${DEEZER_API_BASE}/user/me/playlists`,
        form: { title: name }
      },
      { auth: true }
    );

    if (created.id === undefined) {
      throw new ApiError('deezer', 200, 'playlist creation returned no id');
    }

    logger.info({ playlistId: created.id, name }, 'created deezer playlist');
    return String(created.id);
  }

  async addTracks(playlistId: string, trackIds: readonly string[]): Promise<AddTracksResult> {
    return addInBatches('deezer', trackIds, this.maxTracksPerRequest, async batch => {
      const accepted = await this.api.request<boolean>(
        {
          method: 'POST',
          url: `${DEEZER_API_BASE}/playlist/${encodeURIComponent(playlistId)}/tracks`,
          form: { songs: batch.join(',') }
        },
        { auth: true }
      );
      if (accepted !== true) {
        throw new ApiError('deezer', 200, 'tracks were not added');
      }
    });
  }

  /**
   * Playlists created by the current user (followed playlists are skipped)
   */
  async listUserPlaylists(): Promise<PlaylistSummary[]> {
    const user = await this.getCurrentUser();
    const playlists: PlaylistSummary[] = [];

    const pages = paginate(
      { url: `${DEEZER_API_BASE}/user/me/playlists`, searchParams: { index: 0, limit: PLAYLIST_PAGE_SIZE } },
      request => this.api.get<DeezerPage<DeezerPlaylist>>(request.url, request.searchParams, { auth: true }),
      page => ({ items: page.data ?? [], next: page.next })
    );

    for await (const playlist of pages) {
      if (!playlist.creator || String(playlist.creator.id) === user.id) {
        playlists.push(toSummary(playlist));
      }
    }

    return playlists;
  }

  async getCurrentUser(): Promise<PlatformUser> {
    const me = await this.api.get<DeezerUser>(`${DEEZER_API_BASE}/user/me`, undefined, { auth: true });
    return { id: String(me.id), name: me.name };
  }
}
