import { existsSync, readFileSync } from 'fs';
import { parse as parseDotenv } from 'dotenv';
import { bool, cleanEnv, makeValidator, num, str, url } from 'envalid';

import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG_FILE = './config/.env';

// Values shipped in config/.env.example
const PLACEHOLDER = /^your_.*_here$/i;

const credential = makeValidator<string>((input: string) => {
  const value = input.trim();
  if (!value || PLACEHOLDER.test(value)) {
    throw new Error('must be set to a real credential');
  }
  return value;
});

const CONFIG_SPEC = {
  SPOTIFY_CLIENT_ID: credential({ desc: 'Spotify application client ID (https://developer.spotify.com/dashboard)' }),
  SPOTIFY_CLIENT_SECRET: credential({ desc: 'Spotify application client secret' }),
  SPOTIFY_REDIRECT_URI: url({ default: 'http://127.0.0.1:8080/callback', desc: 'Redirect URI registered on the Spotify application' }),
  SPOTIFY_SCOPE: str({ default: 'playlist-read-private playlist-modify-public playlist-modify-private' }),
  DEEZER_APP_ID: credential({ desc: 'Deezer application ID (https://developers.deezer.com/myapps)' }),
  DEEZER_APP_SECRET: credential({ desc: 'Deezer application secret key' }),
  DEEZER_REDIRECT_URI: url({ default: 'http://localhost:8080/deezer_callback', desc: 'Redirect URI registered on the Deezer application' }),
  DEEZER_PERMS: str({ default: 'basic_access,email,offline_access,manage_library' }),
  TOKEN_CACHE_PATH: str({ default: './data/tokens.json', desc: 'Where OAuth tokens are cached between runs' }),
  AUTH_TIMEOUT_MS: num({ default: 120000, desc: 'How long to wait for the OAuth callback (default: 2 minutes)' }),
  OPEN_BROWSER: bool({ default: true, desc: 'Open the authorization page in the system browser' }),
  REQUEST_DELAY_MS: num({ default: 100, desc: 'Minimum delay between two API requests to the same platform' }),
  REQUEST_TIMEOUT_MS: num({ default: 10000 }),
  MAX_RATE_LIMIT_RETRIES: num({ default: 5, desc: 'Retries after HTTP 429 before giving up' }),
  MAX_NETWORK_RETRIES: num({ default: 3, desc: 'Retries after a transport failure or HTTP 5xx' }),
  SEARCH_LIMIT: num({ default: 5, desc: 'Candidates requested per track search' })
};

export interface OAuthAppConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  spotify: OAuthAppConfig & { scope: string };
  deezer: OAuthAppConfig & { perms: string };
  auth: {
    tokenCachePath: string;
    timeoutMs: number;
    openBrowser: boolean;
  };
  http: {
    requestDelayMs: number;
    requestTimeoutMs: number;
    maxRateLimitRetries: number;
    maxNetworkRetries: number;
  };
  searchLimit: number;
}

/**
 * Validate raw key/value pairs into an AppConfig
 * Throws ConfigError listing every invalid or missing key
 */
export function parseAppConfig(raw: Record<string, string | undefined>): AppConfig {
  const env = cleanEnv(raw, CONFIG_SPEC, {
    reporter: ({ errors }) => {
      const problems = Object.entries(errors).map(([key, error]) => `${key}: ${error?.message ?? 'invalid'}`);
      if (problems.length > 0) {
        throw new ConfigError(`invalid configuration (${problems.join('; ')})`);
      }
    }
  });

  return {
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID,
      clientSecret: env.SPOTIFY_CLIENT_SECRET,
      redirectUri: env.SPOTIFY_REDIRECT_URI,
      scope: env.SPOTIFY_SCOPE
    },
    deezer: {
      clientId: env.DEEZER_APP_ID,
      clientSecret: env.DEEZER_APP_SECRET,
      redirectUri: env.DEEZER_REDIRECT_URI,
      perms: env.DEEZER_PERMS
    },
    auth: {
      tokenCachePath: env.TOKEN_CACHE_PATH,
      timeoutMs: env.AUTH_TIMEOUT_MS,
      openBrowser: env.OPEN_BROWSER
    },
    http: {
      requestDelayMs: env.REQUEST_DELAY_MS,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      maxRateLimitRetries: env.MAX_RATE_LIMIT_RETRIES,
      maxNetworkRetries: env.MAX_NETWORK_RETRIES
    },
    searchLimit: env.SEARCH_LIMIT
  };
}

/**
 * Load the credentials file (dotenv syntax)
 * Values already present in the process environment win over the file
 */
export function loadAppConfig(filePath: string = DEFAULT_CONFIG_FILE): AppConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(
      `config file not found at ${filePath}. Copy config/.env.example to ${filePath} ` +
      'and fill in your Spotify and Deezer application credentials'
    );
  }

  const fromFile = parseDotenv(readFileSync(filePath, 'utf-8'));
  const overrides: Record<string, string> = {};
  for (const key of Object.keys(CONFIG_SPEC)) {
    const value = process.env[key];
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  return parseAppConfig({ ...fromFile, ...overrides });
}
