/**
 * Find a source track on the destination platform
 */

import { ConverterError, isFatalForRun, MatchNotFound } from '../errors.js';
import { logger } from '../logger.js';
import type { PlatformClient } from '../platforms/types.js';
import type { MatchResult, Track } from '../types.js';
import { buildSearchQuery, normalizeText, tokenize } from './normalize.js';

interface NormalizedTrack {
  title: string;
  artist: string;
  /** Tokens of every credited artist */
  artistTokens: Set<string>;
}

const normalizeTrack = (track: Track): NormalizedTrack => {
  const names = track.artists && track.artists.length > 0 ? track.artists : [track.artist];
  const artistTokens = new Set<string>();
  for (const name of names) {
    for (const token of tokenize(normalizeText(name))) {
      artistTokens.add(token);
    }
  }
  return { title: normalizeText(track.title), artist: normalizeText(track.artist), artistTokens };
};

const isExactMatch = (source: NormalizedTrack, candidate: NormalizedTrack): boolean =>
  source.title.length > 0 &&
  source.title === candidate.title &&
  source.artist === candidate.artist;

/**
 * Title contains or is contained by the candidate's, and at least one artist
 * token is shared (any nonzero overlap counts)
 */
const isPartialMatch = (source: NormalizedTrack, candidate: NormalizedTrack): boolean => {
  if (!source.title || !candidate.title) {
    return false;
  }
  const titleOverlap = candidate.title.includes(source.title) || source.title.includes(candidate.title);
  if (!titleOverlap) {
    return false;
  }
  for (const token of source.artistTokens) {
    if (candidate.artistTokens.has(token)) {
      return true;
    }
  }
  return false;
};

/**
 * Pure selection over search results, in order of preference:
 * exact > partial > first result (fallback) > none
 * Ties are broken by the search API's result order
 */
export function selectBestCandidate(source: Track, candidates: readonly Track[]): MatchResult {
  if (candidates.length === 0) {
    return { source, confidence: 'none' };
  }

  const normalizedSource = normalizeTrack(source);
  const normalizedCandidates = candidates.map(normalizeTrack);

  const exactIndex = normalizedCandidates.findIndex(candidate => isExactMatch(normalizedSource, candidate));
  if (exactIndex >= 0) {
    return { source, destination: candidates[exactIndex], confidence: 'exact' };
  }

  const partialIndex = normalizedCandidates.findIndex(candidate => isPartialMatch(normalizedSource, candidate));
  if (partialIndex >= 0) {
    return { source, destination: candidates[partialIndex], confidence: 'partial' };
  }

  return { source, destination: candidates[0], confidence: 'fallback' };
}

export class TrackMatcher {
  constructor(private readonly destination: PlatformClient) {}

  /**
   * Search the destination platform and pick a candidate
   * A failed search for a single track (network, API or not-found error)
   * produces confidence 'none'; auth and rate-limit failures propagate
   */
  async match(source: Track): Promise<MatchResult> {
    const query = buildSearchQuery(source.title, source.artist);

    let candidates: Track[];
    try {
      candidates = await this.destination.searchTrack(query);
    } catch (error) {
      if (error instanceof ConverterError && !isFatalForRun(error)) {
        logger.warn({ query, code: error.code, error: error.message }, 'track search failed');
        return {
          source,
          confidence: 'none',
          error: new MatchNotFound(source.title, source.artist, { cause: error })
        };
      }
      throw error;
    }

    // Candidates without an ID on the destination cannot be added
    const usable = candidates.filter(candidate => candidate.ids?.[this.destination.platform] !== undefined);
    const result = selectBestCandidate(source, usable);

    if (result.confidence === 'none') {
      return { ...result, error: new MatchNotFound(source.title, source.artist) };
    }

    logger.debug(
      {
        source: `${source.artist} - ${source.title}`,
        destination: result.destination ? `${result.destination.artist} - ${result.destination.title}` : null,
        confidence: result.confidence
      },
      'track matched'
    );
    return result;
  }
}
