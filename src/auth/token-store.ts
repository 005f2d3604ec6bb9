import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';

import { AuthError } from '../errors.js';
import { logger } from '../logger.js';
import type { AccessTokenSource } from '../platforms/http-client.js';
import { PLATFORMS, type OAuthToken, type Platform } from '../types.js';
import type { TokenProvider } from './types.js';

// Treat tokens as expired slightly early so in-flight requests don't race the expiry
const EXPIRY_BUFFER_MS = 60000;

export interface TokenStoreOptions {
  cachePath: string;
  providers: Partial<Record<Platform, TokenProvider>>;
  /** Allow the browser-based flow when no usable token is cached */
  interactive?: boolean;
  now?: () => number;
}

type TokenCache = Partial<Record<Platform, OAuthToken>>;

const isOAuthToken = (value: unknown): value is OAuthToken => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const token: Record<string, unknown> = { ...value };
  return (
    typeof token.accessToken === 'string' &&
    (token.expiresAt === null || typeof token.expiresAt === 'number') &&
    (token.refreshToken === undefined || typeof token.refreshToken === 'string') &&
    (token.scope === undefined || typeof token.scope === 'string')
  );
};

/**
 * Owns every OAuth token of the session
 * - serves cached tokens while valid
 * - refreshes silently when a refresh token exists
 * - falls back to the interactive flow, then caches the result on disk
 */
export class TokenStore implements AccessTokenSource {
  private readonly cachePath: string;
  private readonly providers: Partial<Record<Platform, TokenProvider>>;
  private readonly interactive: boolean;
  private readonly now: () => number;
  private tokens: TokenCache = {};
  private loaded = false;

  constructor(options: TokenStoreOptions) {
    this.cachePath = options.cachePath;
    this.providers = options.providers;
    this.interactive = options.interactive ?? true;
    this.now = options.now ?? Date.now;
  }

  async getValidToken(platform: Platform): Promise<string> {
    await this.load();

    const cached = this.tokens[platform];
    if (cached && this.isValid(cached)) {
      return cached.accessToken;
    }

    const provider = this.providers[platform];

    if (cached?.refreshToken && provider?.refresh) {
      try {
        const refreshed = await provider.refresh(cached);
        await this.save(platform, refreshed);
        logger.debug({ platform }, 'access token refreshed');
        return refreshed.accessToken;
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.warn({ platform, error: errorMsg }, 'token refresh failed, falling back to interactive authorization');
      }
    }

    if (!provider || !this.interactive) {
      throw new AuthError(platform, `no valid ${platform} credential cached and interactive authorization is unavailable`);
    }

    return this.authorize(platform);
  }

  /**
   * Run the interactive flow even when a valid token is cached
   * The cached token is only replaced once the new one is obtained
   */
  async authorize(platform: Platform): Promise<string> {
    await this.load();
    const provider = this.providers[platform];
    if (!provider) {
      throw new AuthError(platform, `no ${platform} authorization provider configured`);
    }

    logger.info({ platform }, 'starting interactive authorization');
    const token = await provider.authorize();
    await this.save(platform, token);
    return token.accessToken;
  }

  /**
   * Mark the cached token as expired so the next request refreshes it
   */
  invalidate(platform: Platform): void {
    const cached = this.tokens[platform];
    if (cached) {
      this.tokens[platform] = { ...cached, expiresAt: 0 };
    }
  }

  async setToken(platform: Platform, token: OAuthToken): Promise<void> {
    await this.load();
    await this.save(platform, token);
  }

  async hasToken(platform: Platform): Promise<boolean> {
    await this.load();
    const cached = this.tokens[platform];
    return cached !== undefined && this.isValid(cached);
  }

  private isValid(token: OAuthToken): boolean {
    return token.expiresAt === null || this.now() < token.expiresAt - EXPIRY_BUFFER_MS;
  }

  private async save(platform: Platform, token: OAuthToken): Promise<void> {
    this.tokens[platform] = token;
    await this.persist();
  }

  private async load(): Promise<void> {
    if (this.loaded) {
      return;
    }
    this.loaded = true;

    if (!existsSync(this.cachePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.cachePath, 'utf-8'));
    } catch (error) {
      logger.warn({ path: this.cachePath, error }, 'ignoring unreadable token cache');
      return;
    }

    if (typeof parsed !== 'object' || parsed === null) {
      logger.warn({ path: this.cachePath }, 'ignoring malformed token cache');
      return;
    }

    const entries: Record<string, unknown> = { ...parsed };
    for (const platform of PLATFORMS) {
      const entry = entries[platform];
      if (entry === undefined) {
        continue;
      }
      if (isOAuthToken(entry)) {
        this.tokens[platform] = entry;
      } else {
        logger.warn({ path: this.cachePath, platform }, 'ignoring malformed cached token');
      }
    }
    logger.debug({ path: this.cachePath, platforms: Object.keys(this.tokens) }, 'token cache loaded');
  }

  private async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.cachePath), { recursive: true });
    await fs.writeFile(this.cachePath, JSON.stringify(this.tokens, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }
}

/**
 * Serves one fixed token, for verifying a manually entered token
 * before it replaces the cached one
 */
export const fixedTokenSource = (accessToken: string): AccessTokenSource => ({
  getValidToken: async () => accessToken,
  invalidate: () => undefined
});
