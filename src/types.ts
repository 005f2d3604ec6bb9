export type Platform = 'spotify' | 'deezer';

export const PLATFORMS: readonly Platform[] = ['spotify', 'deezer'];

export const PLATFORM_LABELS: Record<Platform, string> = {
  spotify: 'Spotify',
  deezer: 'Deezer'
};

export const otherPlatform = (platform: Platform): Platform =>
  platform === 'spotify' ? 'deezer' : 'spotify';

export interface Track {
  readonly title: string;
  /** Primary artist */
  readonly artist: string;
  /** Every credited artist, primary first */
  readonly artists?: readonly string[];
  readonly album?: string;
  readonly durationSeconds?: number;
  readonly ids?: Readonly<Partial<Record<Platform, string>>>;
}

export interface PlaylistReference {
  platform: Platform;
  id: string;
  name?: string;
}

export interface PlaylistSummary {
  id: string;
  name: string;
  trackCount: number;
  description?: string;
}

export interface PlatformUser {
  id: string;
  name: string;
}

export type MatchConfidence = 'exact' | 'partial' | 'fallback' | 'none';

export interface MatchResult {
  source: Track;
  destination?: Track;
  confidence: MatchConfidence;
  /** Set when confidence is 'none' */
  error?: Error;
}

export interface OAuthToken {
  accessToken: string;
  /** Epoch ms; null for tokens that never expire */
  expiresAt: number | null;
  refreshToken?: string;
  scope?: string;
}
