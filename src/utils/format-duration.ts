import type { Track } from '../types.js';

/**
 * Format duration from milliseconds to human-readable format
 * Examples:
 *   - 125000 (2m 5s) → "3m"
 *   - 3665000 (1h 1m 5s) → "1h 2m"
 *   - 12345000 (3h 25m 45s) → "3h 26m"
 */
export function formatDuration(milliseconds: number): string {
  if (!milliseconds || milliseconds <= 0) {
    return '0m';
  }

  const totalSeconds = Math.floor(milliseconds / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.ceil((totalSeconds % 3600) / 60);

  if (hours > 0) {
    // Show hours and minutes (round up minutes for cleaner display)
    if (minutes === 0) {
      return `${hours}h`;
    }
    return `${hours}h ${minutes}m`;
  }

  // Less than an hour, just show minutes
  return `${minutes}m`;
}

/**
 * Total playing time of a list of tracks, in milliseconds
 * Tracks without a known duration count as zero
 */
export function calculateTotalDuration(tracks: readonly Track[]): number {
  return tracks.reduce((sum, track) => sum + (track.durationSeconds ?? 0) * 1000, 0);
}
