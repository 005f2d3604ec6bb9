import { InvalidPlaylistReference } from '../errors.js';
import { logger } from '../logger.js';
import { createGotSender, type RequestSender } from '../platforms/http-client.js';
import type { Platform, PlaylistReference } from '../types.js';

export const PLAYLIST_ID_PATTERNS: Record<Platform, RegExp> = {
  spotify: /^[A-Za-z0-9]{22}$/,
  deezer: /^\d{1,20}$/
};

const SPOTIFY_URI = /^spotify:(?:user:[^:]+:)?playlist:([^:?#\s]+)$/i;
const SHORT_LINK_HOSTS = new Set(['link.deezer.com', 'deezer.page.link']);

/** Follows a short link and returns the URL it lands on */
export type RedirectResolver = (url: string) => Promise<string>;

export const createRedirectResolver = (send: RequestSender = createGotSender(10000)): RedirectResolver =>
  async url => (await send({ method: 'GET', url })).url;

export const isValidPlaylistId = (platform: Platform, id: string): boolean =>
  PLAYLIST_ID_PATTERNS[platform].test(id);

type ParsedInput =
  | { kind: 'reference'; platform: Platform; id: string }
  | { kind: 'short-link'; url: string };

const segmentAfterPlaylist = (url: URL): string | undefined => {
  const segments = url.pathname.split('/').filter(Boolean);
  const index = segments.indexOf('playlist');
  return index >= 0 ? segments[index + 1] : undefined;
};

const toUrl = (input: string): URL | null => {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`;
  try {
    return new URL(candidate);
  } catch {
    return null;
  }
};

const hostMatches = (host: string, domain: string): boolean =>
  host === domain || host.endsWith(`.${domain}`);

const parseSync = (input: string): ParsedInput => {
  const uri = SPOTIFY_URI.exec(input);
  if (uri) {
    return { kind: 'reference', platform: 'spotify', id: uri[1] };
  }

  if (PLAYLIST_ID_PATTERNS.spotify.test(input)) {
    return { kind: 'reference', platform: 'spotify', id: input };
  }
  if (PLAYLIST_ID_PATTERNS.deezer.test(input)) {
    return { kind: 'reference', platform: 'deezer', id: input };
  }

  const url = toUrl(input);
  if (!url) {
    throw new InvalidPlaylistReference(input, 'not a Spotify or Deezer playlist link');
  }

  const host = url.hostname.toLowerCase();
  if (SHORT_LINK_HOSTS.has(host)) {
    return { kind: 'short-link', url: url.toString() };
  }

  const platform: Platform | null = hostMatches(host, 'spotify.com')
    ? 'spotify'
    : hostMatches(host, 'deezer.com')
      ? 'deezer'
      : null;
  if (!platform) {
    throw new InvalidPlaylistReference(input, 'not a Spotify or Deezer playlist link');
  }

  const id = segmentAfterPlaylist(url);
  if (!id) {
    throw new InvalidPlaylistReference(input, `${platform} link does not point to a playlist`);
  }
  return { kind: 'reference', platform, id };
};

const validated = (input: string, platform: Platform, id: string): PlaylistReference => {
  if (!isValidPlaylistId(platform, id)) {
    throw new InvalidPlaylistReference(input, `"${id}" is not a valid ${platform} playlist ID`);
  }
  return { platform, id };
};

/**
 * Turn user input into a PlaylistReference
 * Accepts canonical links (with or without scheme and locale segment),
 * spotify:playlist: URIs, Deezer short links and bare IDs
 * The ID shape is checked here, before any API request
 */
export async function parsePlaylistInput(
  input: string,
  resolveRedirect: RedirectResolver = createRedirectResolver()
): Promise<PlaylistReference> {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidPlaylistReference(input, 'empty input');
  }

  const parsed = parseSync(trimmed);
  if (parsed.kind === 'reference') {
    return validated(trimmed, parsed.platform, parsed.id);
  }

  let resolved: string;
  try {
    resolved = await resolveRedirect(parsed.url);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    logger.warn({ url: parsed.url, error: errorMsg }, 'short link resolution failed');
    throw new InvalidPlaylistReference(trimmed, 'short link could not be resolved');
  }
  logger.debug({ url: parsed.url, resolved }, 'short link resolved');

  const target = toUrl(resolved);
  const host = target?.hostname.toLowerCase();
  const id = target && host && hostMatches(host, 'deezer.com') ? segmentAfterPlaylist(target) : undefined;
  if (!id) {
    throw new InvalidPlaylistReference(trimmed, 'short link does not lead to a Deezer playlist');
  }
  return validated(trimmed, 'deezer', id);
}
