import { describe, it, expect } from 'vitest';
import { InaccessiblePlaylist } from '../../errors.js';
import type { ConversionReport } from '../../playlist/converter.js';
import type { Track } from '../../types.js';
import { describeTrack, formatConversionEvent, formatConversionSummary, formatPlaylistList } from '../format.js';

const songA: Track = { title: 'Song A', artist: 'Artist X' };
const deezerSongA: Track = { title: 'Song A', artist: 'Artist X', durationSeconds: 200, ids: { deezer: '111' } };
const ghost: Track = { title: 'Unknown Track', artist: 'Ghost' };

const baseReport = (overrides: Partial<ConversionReport> = {}): ConversionReport => ({
  state: 'done',
  source: { platform: 'spotify', id: 'abcdefghijklmnopqrstuv' },
  destinationPlatform: 'deezer',
  destinationPlaylistId: 'playlist-1',
  destinationPlaylistName: 'My Mix',
  matches: [
    { source: songA, destination: deezerSongA, confidence: 'exact' },
    { source: ghost, confidence: 'none' }
  ],
  unmatched: [ghost],
  failedToAdd: [],
  added: 1,
  counts: { exact: 1, partial: 0, fallback: 0, none: 1 },
  durationMs: 1200,
  ...overrides
});

describe('formatConversionSummary', () => {
  it('reports added and unmatched tracks', () => {
    expect(formatConversionSummary(baseReport())).toEqual([
      '',
      'Conversion finished!',
      '1 tracks added to Deezer playlist "My Mix"',
      'Matches: 1 exact, 0 partial, 0 fallback',
      'Playlist length: 4m',
      '1 tracks not found:',
      '  - Unknown Track — Ghost'
    ]);
  });

  it('shows at most ten unmatched tracks', () => {
    const unmatched = Array.from({ length: 12 }, (_, i): Track => ({ title: `Lost ${i + 1}`, artist: 'Ghost' }));

    const lines = formatConversionSummary(baseReport({ unmatched }));

    const listed = lines.slice(lines.indexOf('12 tracks not found:') + 1);
    expect(listed).toHaveLength(11);
    expect(listed[0]).toBe('  - Lost 1 — Ghost');
    expect(listed[9]).toBe('  - Lost 10 — Ghost');
    expect(listed[10]).toBe('  ... and 2 more');
  });

  it('lists tracks that could not be added', () => {
    const lines = formatConversionSummary(baseReport({ failedToAdd: [songA], added: 0 }));

    expect(lines).toContain('1 tracks could not be added:');
    expect(lines).toContain('  - Song A — Artist X');
  });

  it('says so when no playlist was created', () => {
    const report = baseReport({
      destinationPlaylistId: undefined,
      destinationPlaylistName: undefined,
      matches: [{ source: ghost, confidence: 'none' }],
      added: 0
    });

    expect(formatConversionSummary(report)).toEqual([
      '',
      'No track found on Deezer, no playlist was created',
      '1 tracks not found:',
      '  - Unknown Track — Ghost'
    ]);
  });

  it('reports an empty source playlist', () => {
    const report = baseReport({ destinationPlaylistId: undefined, matches: [], unmatched: [], added: 0 });

    expect(formatConversionSummary(report)).toEqual(['', 'No tracks found in the Spotify playlist']);
  });

  it('formats the failure of a run', () => {
    const report = baseReport({ state: 'failed', error: new InaccessiblePlaylist('spotify', 'abcdefghijklmnopqrstuv') });

    expect(formatConversionSummary(report)).toEqual([
      '',
      'Conversion failed. Spotify playlist abcdefghijklmnopqrstuv is private or does not exist | Suggestion: Make the playlist public or check the link.'
    ]);
  });
});

describe('formatConversionEvent', () => {
  it('shows search progress and outcome', () => {
    expect(
      formatConversionEvent({
        type: 'matched',
        index: 0,
        total: 2,
        result: { source: songA, destination: deezerSongA, confidence: 'exact' }
      })
    ).toEqual(['(1/2) Searching: Artist X - Song A', '  found (exact): Artist X - Song A']);
    expect(
      formatConversionEvent({ type: 'matched', index: 1, total: 2, result: { source: ghost, confidence: 'none' } })
    ).toEqual(['(2/2) Searching: Ghost - Unknown Track', '  not found']);
  });

  it('names the fetched source playlist', () => {
    expect(formatConversionEvent({ type: 'fetched', name: 'Road Trip', count: 2 })).toEqual([
      '"Road Trip": 2 tracks to convert'
    ]);
  });

  it('prints nothing for state changes', () => {
    expect(formatConversionEvent({ type: 'state', from: 'idle', to: 'fetching' })).toBeNull();
  });
});

describe('formatPlaylistList', () => {
  it('numbers playlists from one', () => {
    expect(formatPlaylistList([{ id: 'a', name: 'Road Trip', trackCount: 12 }])).toEqual([' 1. Road Trip (12 tracks)']);
  });
});

describe('describeTrack', () => {
  it('puts the title before the artist', () => {
    expect(describeTrack(ghost)).toBe('Unknown Track — Ghost');
  });
});
