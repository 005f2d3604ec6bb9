/**
 * Terminal rendering for the interactive session
 */

import type { ConversionEvent, ConversionReport } from '../playlist/converter.js';
import { PLATFORM_LABELS, type PlaylistSummary, type Track } from '../types.js';
import { calculateTotalDuration, formatDuration } from '../utils/format-duration.js';
import { formatUserError } from '../utils/error-formatter.js';

const UNMATCHED_DISPLAY_LIMIT = 10;

export const describeTrack = (track: Track): string => `${track.title} — ${track.artist}`;

export function formatPlaylistList(playlists: readonly PlaylistSummary[]): string[] {
  return playlists.map(
    (playlist, index) => `${String(index + 1).padStart(2)}. ${playlist.name} (${playlist.trackCount} tracks)`
  );
}

/**
 * Progress lines for converter events; null for events that print nothing
 */
export function formatConversionEvent(event: ConversionEvent): string[] | null {
  switch (event.type) {
    case 'fetched':
      return [`"${event.name}": ${event.count} tracks to convert`];
    case 'matched': {
      const { source, destination, confidence } = event.result;
      const lines = [`(${event.index + 1}/${event.total}) Searching: ${source.artist} - ${source.title}`];
      lines.push(
        destination && confidence !== 'none'
          ? `  found (${confidence}): ${destination.artist} - ${destination.title}`
          : '  not found'
      );
      return lines;
    }
    case 'playlist-created':
      return [`Created playlist "${event.name}" (${event.playlistId})`];
    case 'batch-retry':
      return [`Retrying ${event.trackIds.length} tracks that could not be added`];
    case 'state':
      return null;
  }
}

/**
 * Final report: added count, destination, then up to ten unmatched tracks
 */
export function formatConversionSummary(report: ConversionReport): string[] {
  const destination = PLATFORM_LABELS[report.destinationPlatform];

  if (report.state === 'failed') {
    return ['', `Conversion failed. ${formatUserError(report.error, 'converting the playlist')}`];
  }

  if (report.matches.length === 0) {
    return ['', `No tracks found in the ${PLATFORM_LABELS[report.source.platform]} playlist`];
  }

  if (report.destinationPlaylistId === undefined) {
    return ['', `No track found on ${destination}, no playlist was created`, ...unmatchedLines(report.unmatched)];
  }

  const matchedTracks = report.matches.flatMap(match => (match.destination ? [match.destination] : []));
  const { exact, partial, fallback } = report.counts;

  const lines = [
    '',
    'Conversion finished!',
    `${report.added} tracks added to ${destination} playlist "${report.destinationPlaylistName ?? report.destinationPlaylistId}"`,
    `Matches: ${exact} exact, ${partial} partial, ${fallback} fallback`,
    `Playlist length: ${formatDuration(calculateTotalDuration(matchedTracks))}`
  ];

  if (report.failedToAdd.length > 0) {
    lines.push(`${report.failedToAdd.length} tracks could not be added:`);
    lines.push(...report.failedToAdd.map(track => `  - ${describeTrack(track)}`));
  }

  lines.push(...unmatchedLines(report.unmatched));
  return lines;
}

function unmatchedLines(unmatched: readonly Track[]): string[] {
  if (unmatched.length === 0) {
    return [];
  }
  const lines = [`${unmatched.length} tracks not found:`];
  for (const track of unmatched.slice(0, UNMATCHED_DISPLAY_LIMIT)) {
    lines.push(`  - ${describeTrack(track)}`);
  }
  if (unmatched.length > UNMATCHED_DISPLAY_LIMIT) {
    lines.push(`  ... and ${unmatched.length - UNMATCHED_DISPLAY_LIMIT} more`);
  }
  return lines;
}
