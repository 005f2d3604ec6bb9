// Trailing " - Remastered 2011", " - Live at Wembley", " - Radio Edit" ...
const VERSION_SUFFIX = /\s+-\s+[^-]*\b(?:remaster(?:ed)?|live|version|edit|mix|mono|stereo|acoustic|demo|single|deluxe)\b.*$/i;

/**
 * Normalize a title or artist name for comparison
 * Lowercases, strips diacritics, drops "(Remastered)"/"[Live]" qualifiers and
 * version suffixes, drops apostrophes, turns other punctuation into spaces
 * and collapses whitespace.
 * normalizeText(normalizeText(s)) === normalizeText(s)
 */
export const normalizeText = (text: string): string =>
  text
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '') // Combining marks left by NFKD
    .toLowerCase()
    .replace(/\([^)]*\)|\[[^\]]*\]/g, ' ')
    .replace(VERSION_SUFFIX, '')
    .replace(/['\u2019]/g, '')
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

export const tokenize = (normalized: string): Set<string> =>
  new Set(normalized.split(' ').filter(token => token.length > 0));

/**
 * Search query for a track: "{artist} {title}" with both fields normalized
 */
export const buildSearchQuery = (title: string, artist: string): string =>
  `${normalizeText(artist)} ${normalizeText(title)}`.trim();
