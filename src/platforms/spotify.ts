import { InaccessiblePlaylist, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { PlatformUser, PlaylistSummary, Track } from '../types.js';
import { addInBatches } from './batches.js';
import { ApiClient, type ApiClientOptions, type ApiRequest } from './http-client.js';
import { paginate } from './pagination.js';
import type { AddTracksResult, PlatformClient } from './types.js';

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';

const PLAYLIST_PAGE_SIZE = 100;
const USER_PLAYLISTS_PAGE_SIZE = 50;
const MAX_TRACKS_PER_REQUEST = 100;

interface SpotifyArtist {
  id: string;
  name: string;
}

export interface SpotifyTrack {
  id: string | null;
  type: string;
  name: string;
  duration_ms: number;
  is_local?: boolean;
  artists: SpotifyArtist[];
  album: {
    id: string | null;
    name: string;
  };
}

interface SpotifyPlaylistItem {
  track: SpotifyTrack | null;
}

interface SpotifyPage<T> {
  items: T[];
  next: string | null;
  total: number;
}

interface SpotifyPlaylist {
  id: string;
  name: string;
  description: string | null;
  owner: {
    id: string;
  };
  tracks: {
    total: number;
  };
}

interface SpotifySearchResponse {
  tracks: SpotifyPage<SpotifyTrack>;
}

interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export type SpotifyClientOptions = Omit<ApiClientOptions, 'platform' | 'authorize' | 'inspectBody'> & {
  searchLimit?: number;
};

const authorizeSpotify = (request: ApiRequest, accessToken: string): ApiRequest => ({
  ...request,
  headers: {
    ...request.headers,
    Authorization: `Bearer ${accessToken}`
  }
});

export const toTrack = (track: SpotifyTrack): Track => {
  const artists = track.artists.map(artist => artist.name);
  return {
    title: track.name,
    artist: artists[0] ?? '',
    artists,
    album: track.album.name,
    durationSeconds: Math.floor(track.duration_ms / 1000),
    ids: track.id ? { spotify: track.id } : {}
  };
};

const toSummary = (playlist: SpotifyPlaylist): PlaylistSummary => ({
  id: playlist.id,
  name: playlist.name,
  trackCount: playlist.tracks.total,
  ...(playlist.description ? { description: playlist.description } : {})
});

/**
 * Spotify Web API client
 * Every endpoint used here needs a user token (authorization code flow)
 */
export class SpotifyClient implements PlatformClient {
  readonly platform = 'spotify' as const;
  readonly maxTracksPerRequest = MAX_TRACKS_PER_REQUEST;
  private readonly api: ApiClient;
  private readonly searchLimit: number;

  constructor(options: SpotifyClientOptions) {
    this.api = new ApiClient({ ...options, platform: 'spotify', authorize: authorizeSpotify });
    this.searchLimit = options.searchLimit ?? 5;
  }

  async *listPlaylistTracks(playlistId: string): AsyncGenerator<Track, void, undefined> {
    const pages = paginate(
      {
        url: `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/tracks`,
        searchParams: { limit: PLAYLIST_PAGE_SIZE, offset: 0, additional_types: 'track' }
      },
      request => this.api.get<SpotifyPage<SpotifyPlaylistItem>>(request.url, request.searchParams, { auth: true }),
      page => page
    );

    try {
      for await (const item of pages) {
        // Skip podcast episodes, local files and tracks removed from the catalog
        if (!item.track || item.track.type !== 'track' || !item.track.id || item.track.is_local) {
          continue;
        }
        yield toTrack(item.track);
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InaccessiblePlaylist('spotify', playlistId, { cause: error });
      }
      throw error;
    }
  }

  async getPlaylist(playlistId: string): Promise<PlaylistSummary> {
    try {
      const playlist = await this.api.get<SpotifyPlaylist>(
        `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}`,
        { fields: 'id,name,description,owner(id),tracks(total)' },
        { auth: true }
      );
      return toSummary(playlist);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InaccessiblePlaylist('spotify', playlistId, { cause: error });
      }
      throw error;
    }
  }

  async searchTrack(query: string): Promise<Track[]> {
    if (!query.trim()) {
      return [];
    }

    const response = await this.api.get<SpotifySearchResponse>(
      `${SPOTIFY_API_BASE}/search`,
      { q: query, type: 'track', limit: this.searchLimit },
      { auth: true }
    );

    const tracks = (response.tracks?.items ?? []).filter(track => track.id !== null).map(toTrack);
    logger.debug({ query, results: tracks.length }, 'spotify search completed');
    return tracks;
  }

  async createPlaylist(name: string, description?: string): Promise<string> {
    const user = await this.getCurrentUser();
    const playlist = await this.api.request<SpotifyPlaylist>(
      {
        method: 'POST',
        url: `${SPOTIFY_API_BASE}/users/${encodeURIComponent(user.id)}/playlists`,
        json: { name, public: false, ...(description ? { description } : {}) }
      },
      { auth: true }
    );
    logger.info({ playlistId: playlist.id, name }, 'created spotify playlist');
    return playlist.id;
  }

  async addTracks(playlistId: string, trackIds: readonly string[]): Promise<AddTracksResult> {
    return addInBatches('spotify', trackIds, this.maxTracksPerRequest, async batch => {
      await this.api.request<{ snapshot_id: string }>(
        {
          method: 'POST',
          url: `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/tracks`,
          json: { uris: batch.map(id => `spotify:track:${id}`) }
        },
        { auth: true }
      );
    });
  }

  /**
   * Playlists owned by the current user (followed playlists are skipped)
   */
  async listUserPlaylists(): Promise<PlaylistSummary[]> {
    const user = await this.getCurrentUser();
    const playlists: PlaylistSummary[] = [];

    const pages = paginate(
      { url: `${SPOTIFY_API_BASE}/me/playlists`, searchParams: { limit: USER_PLAYLISTS_PAGE_SIZE, offset: 0 } },
      request => this.api.get<SpotifyPage<SpotifyPlaylist | null>>(request.url, request.searchParams, { auth: true }),
      page => page
    );

    for await (const playlist of pages) {
      if (playlist && playlist.owner.id === user.id) {
        playlists.push(toSummary(playlist));
      }
    }

    return playlists;
  }

  async getCurrentUser(): Promise<PlatformUser> {
    const me = await this.api.get<SpotifyUser>(`${SPOTIFY_API_BASE}/me`, undefined, { auth: true });
    return { id: me.id, name: me.display_name ?? me.id };
  }
}
