import { format } from 'date-fns';

import { InvalidPlaylistReference } from '../errors.js';
import { logger } from '../logger.js';
import { TrackMatcher } from '../matching/track-matcher.js';
import type { PlatformClient } from '../platforms/types.js';
import {
  otherPlatform,
  PLATFORM_LABELS,
  type MatchConfidence,
  type MatchResult,
  type Platform,
  type PlaylistReference,
  type Track
} from '../types.js';
import { isValidPlaylistId } from './url-parser.js';

export type ConversionState =
  | 'idle'
  | 'fetching'
  | 'matching'
  | 'creating-destination'
  | 'adding-tracks'
  | 'done'
  | 'failed';

// 'failed' is reachable from every state and handled separately
const TRANSITIONS: Record<ConversionState, readonly ConversionState[]> = {
  idle: ['fetching'],
  fetching: ['matching', 'done'],
  matching: ['creating-destination', 'done'],
  'creating-destination': ['adding-tracks'],
  'adding-tracks': ['done'],
  done: [],
  failed: []
};

export type ConversionEvent =
  | { type: 'state'; from: ConversionState; to: ConversionState }
  | { type: 'fetched'; name: string; count: number }
  | { type: 'matched'; index: number; total: number; result: MatchResult }
  | { type: 'playlist-created'; playlistId: string; name: string }
  | { type: 'batch-retry'; trackIds: string[] };

export interface ConversionReport {
  state: 'done' | 'failed';
  source: PlaylistReference;
  destinationPlatform: Platform;
  /** Absent when nothing was created (empty source, no matches, or failure before creation) */
  destinationPlaylistId?: string;
  destinationPlaylistName?: string;
  /** One entry per source track, in source order */
  matches: MatchResult[];
  /** Source tracks with confidence 'none' */
  unmatched: Track[];
  /** Matched source tracks whose add batch failed twice */
  failedToAdd: Track[];
  added: number;
  counts: Record<MatchConfidence, number>;
  durationMs: number;
  error?: Error;
}

export interface ConvertOptions {
  /** Destination playlist name; defaults to "From {Platform} - {date}" */
  name?: string;
}

export interface PlaylistConverterOptions {
  clients: Record<Platform, PlatformClient>;
  onEvent?: (event: ConversionEvent) => void;
  now?: () => Date;
}

export const defaultPlaylistName = (source: Platform, date: Date): string =>
  `From ${PLATFORM_LABELS[source]} - ${format(date, 'yyyy-MM-dd HH:mm')}`;

const emptyCounts = (): Record<MatchConfidence, number> => ({ exact: 0, partial: 0, fallback: 0, none: 0 });

/**
 * Converts one playlist to the other platform
 * idle → fetching → matching → creating-destination → adding-tracks → done,
 * with failed reachable from any state on an unrecoverable error.
 * Unmatched tracks and failed add batches never fail the run.
 */
export class PlaylistConverter {
  private readonly clients: Record<Platform, PlatformClient>;
  private readonly onEvent: (event: ConversionEvent) => void;
  private readonly now: () => Date;
  private current: ConversionState = 'idle';

  constructor(options: PlaylistConverterOptions) {
    this.clients = options.clients;
    this.onEvent = options.onEvent ?? (() => undefined);
    this.now = options.now ?? (() => new Date());
  }

  get state(): ConversionState {
    return this.current;
  }

  async convert(source: PlaylistReference, options: ConvertOptions = {}): Promise<ConversionReport> {
    const startedAt = Date.now();
    const destinationPlatform = otherPlatform(source.platform);
    const sourceClient = this.clients[source.platform];
    const destinationClient = this.clients[destinationPlatform];

    this.current = 'idle';
    const report: ConversionReport = {
      state: 'done',
      source,
      destinationPlatform,
      matches: [],
      unmatched: [],
      failedToAdd: [],
      added: 0,
      counts: emptyCounts(),
      durationMs: 0
    };

    const finish = (): ConversionReport => {
      report.durationMs = Date.now() - startedAt;
      return report;
    };

    try {
      if (!isValidPlaylistId(source.platform, source.id)) {
        throw new InvalidPlaylistReference(source.id, `not a valid ${source.platform} playlist ID`);
      }

      logger.info({ source, destination: destinationPlatform }, 'starting playlist conversion');

      this.transition('fetching');
      const summary = await sourceClient.getPlaylist(source.id);
      report.source = { ...source, name: summary.name };

      const tracks: Track[] = [];
      for await (const track of sourceClient.listPlaylistTracks(source.id)) {
        tracks.push(track);
      }
      this.onEvent({ type: 'fetched', name: summary.name, count: tracks.length });
      logger.info({ source: report.source, tracks: tracks.length }, 'source playlist fetched');

      if (tracks.length === 0) {
        this.transition('done');
        return finish();
      }

      this.transition('matching');
      const matcher = new TrackMatcher(destinationClient);
      for (const [index, track] of tracks.entries()) {
        const result = await matcher.match(track);
        report.matches.push(result);
        report.counts[result.confidence]++;
        if (result.confidence === 'none') {
          report.unmatched.push(track);
        }
        this.onEvent({ type: 'matched', index, total: tracks.length, result });
      }

      const toAdd: Array<{ source: Track; id: string }> = [];
      for (const result of report.matches) {
        const id = result.destination?.ids?.[destinationPlatform];
        if (id !== undefined) {
          toAdd.push({ source: result.source, id });
        }
      }

      if (toAdd.length === 0) {
        logger.warn({ source, tracks: tracks.length }, 'no tracks matched, skipping playlist creation');
        this.transition('done');
        return finish();
      }

      this.transition('creating-destination');
      const name = options.name?.trim() || defaultPlaylistName(source.platform, this.now());
      const playlistId = await destinationClient.createPlaylist(
        name,
        `Converted from ${PLATFORM_LABELS[source.platform]} playlist ${source.id}`
      );
      report.destinationPlaylistId = playlistId;
      report.destinationPlaylistName = name;
      this.onEvent({ type: 'playlist-created', playlistId, name });

      this.transition('adding-tracks');
      const failedPositions = await this.addWithRetry(destinationClient, playlistId, toAdd.map(item => item.id), report);
      report.failedToAdd = toAdd.filter((_item, position) => failedPositions.has(position)).map(item => item.source);

      this.transition('done');
      logger.info(
        {
          source,
          destinationPlaylistId: playlistId,
          added: report.added,
          unmatched: report.unmatched.length,
          failedToAdd: report.failedToAdd.length,
          counts: report.counts
        },
        'playlist conversion completed'
      );
      return finish();
    } catch (error) {
      report.state = 'failed';
      report.error = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: error, source, state: this.current }, 'playlist conversion failed');
      this.fail();
      return finish();
    }
  }

  /**
   * Add all IDs; every failed batch is retried once
   * Returns the positions in trackIds that still could not be added;
   * the same ID may appear at several positions
   */
  private async addWithRetry(
    client: PlatformClient,
    playlistId: string,
    trackIds: string[],
    report: ConversionReport
  ): Promise<Set<number>> {
    const first = await client.addTracks(playlistId, trackIds);
    report.added += first.added;

    const stillFailed = new Set<number>();
    for (const batch of first.failed) {
      logger.info({ playlistId, tracks: batch.trackIds.length, error: batch.error.message }, 'retrying failed batch');
      this.onEvent({ type: 'batch-retry', trackIds: batch.trackIds });
      const retry = await client.addTracks(playlistId, batch.trackIds);
      report.added += retry.added;
      for (const failed of retry.failed) {
        for (const position of failed.trackIds.keys()) {
          stillFailed.add(batch.offset + failed.offset + position);
        }
      }
    }
    return stillFailed;
  }

  private transition(to: ConversionState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal conversion state transition ${from} -> ${to}`);
    }
    this.current = to;
    this.onEvent({ type: 'state', from, to });
  }

  private fail(): void {
    const from = this.current;
    this.current = 'failed';
    this.onEvent({ type: 'state', from, to: 'failed' });
  }
}
