import type { Platform, PlatformUser, PlaylistSummary, Track } from '../types.js';

export interface FailedBatch {
  /** Position of the batch's first ID in the requested list */
  offset: number;
  trackIds: string[];
  error: Error;
}

export interface AddTracksResult {
  added: number;
  failed: FailedBatch[];
}

/**
 * Operations the converter needs from a streaming platform
 */
export interface PlatformClient {
  readonly platform: Platform;
  /** Largest number of track IDs accepted by one add request */
  readonly maxTracksPerRequest: number;

  /**
   * Lazily page through a playlist's tracks in playlist order
   * Each call starts again from the first page
   */
  listPlaylistTracks(playlistId: string): AsyncIterable<Track>;
  getPlaylist(playlistId: string): Promise<PlaylistSummary>;
  /** Candidates in the platform's relevance order, best first */
  searchTrack(query: string): Promise<Track[]>;
  createPlaylist(name: string, description?: string): Promise<string>;
  /**
   * Add tracks in batches of maxTracksPerRequest
   * A failing batch is reported in the result; auth failures propagate
   */
  addTracks(playlistId: string, trackIds: readonly string[]): Promise<AddTracksResult>;
  listUserPlaylists(): Promise<PlaylistSummary[]>;
  getCurrentUser(): Promise<PlatformUser>;
}
