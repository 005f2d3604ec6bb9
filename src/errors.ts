/**
 * Error taxonomy shared by every layer of the converter
 */

import type { Platform } from './types.js';

export type ConverterErrorCode =
  | 'config'
  | 'auth'
  | 'auth_timeout'
  | 'inaccessible_playlist'
  | 'invalid_playlist_reference'
  | 'rate_limited'
  | 'network'
  | 'not_found'
  | 'api'
  | 'match_not_found';

export class ConverterError extends Error {
  readonly code: ConverterErrorCode;

  constructor(code: ConverterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Credentials file missing or invalid */
export class ConfigError extends ConverterError {
  constructor(message: string) {
    super('config', message);
  }
}

/** No usable credential, consent denied, or token rejected twice */
export class AuthError extends ConverterError {
  readonly platform: Platform;

  constructor(platform: Platform, message: string, options?: { cause?: unknown }) {
    super('auth', message, options);
    this.platform = platform;
  }
}

export class AuthTimeout extends ConverterError {
  readonly platform: Platform;
  readonly timeoutMs: number;

  constructor(platform: Platform, timeoutMs: number) {
    super('auth_timeout', `${platform} authorization not completed within ${Math.round(timeoutMs / 1000)}s`);
    this.platform = platform;
    this.timeoutMs = timeoutMs;
  }
}

export class InaccessiblePlaylist extends ConverterError {
  readonly platform: Platform;
  readonly playlistId: string;

  constructor(platform: Platform, playlistId: string, options?: { cause?: unknown }) {
    super('inaccessible_playlist', `${platform} playlist ${playlistId} is private or does not exist`, options);
    this.platform = platform;
    this.playlistId = playlistId;
  }
}

export class InvalidPlaylistReference extends ConverterError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super('invalid_playlist_reference', `unrecognized playlist "${input}": ${reason}`);
    this.input = input;
  }
}

export class RateLimited extends ConverterError {
  readonly platform: Platform;
  readonly attempts: number;

  constructor(platform: Platform, attempts: number) {
    super('rate_limited', `${platform} rate limit still active after ${attempts} attempts`);
    this.platform = platform;
    this.attempts = attempts;
  }
}

export class NetworkError extends ConverterError {
  readonly platform: Platform;
  readonly attempts: number;

  constructor(platform: Platform, attempts: number, message: string, options?: { cause?: unknown }) {
    super('network', `${platform} request failed after ${attempts} attempts: ${message}`, options);
    this.platform = platform;
    this.attempts = attempts;
  }
}

/** HTTP 403/404 or an equivalent API error body */
export class NotFoundError extends ConverterError {
  readonly platform: Platform;
  readonly status: number;

  constructor(platform: Platform, status: number, message: string) {
    super('not_found', message);
    this.platform = platform;
    this.status = status;
  }
}

/** Any other non-2xx response or API error body */
export class ApiError extends ConverterError {
  readonly platform: Platform;
  readonly status: number;

  constructor(platform: Platform, status: number, message: string) {
    super('api', `${platform} API error ${status}: ${message}`);
    this.platform = platform;
    this.status = status;
  }
}

/** Per-track, never fatal: collected into the unmatched report */
export class MatchNotFound extends ConverterError {
  constructor(title: string, artist: string, options?: { cause?: unknown }) {
    super('match_not_found', `no match for "${title}" by ${artist}`, options);
  }
}

/** Errors that end the current conversion instead of being recorded per track */
export const isFatalForRun = (error: unknown): boolean =>
  error instanceof AuthError ||
  error instanceof AuthTimeout ||
  error instanceof RateLimited ||
  error instanceof ConfigError;
