import { randomBytes } from 'crypto';

import type { OAuthAppConfig } from '../config.js';
import { AuthError } from '../errors.js';
import { logger } from '../logger.js';
import { createGotSender, type RequestSender } from '../platforms/http-client.js';
import type { OAuthToken } from '../types.js';
import { obtainAuthorizationCode } from './oauth-flow.js';
import type { InteractiveAuthOptions, TokenProvider } from './types.js';

const SPOTIFY_AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}

export interface SpotifyAuthOptions extends OAuthAppConfig, Omit<InteractiveAuthOptions, 'redirectUri'> {
  scope: string;
  send?: RequestSender;
  now?: () => number;
  /** Fixed state value, for tests */
  state?: string;
}

const isTokenResponse = (body: unknown): body is SpotifyTokenResponse =>
  typeof body === 'object' &&
  body !== null &&
  'access_token' in body &&
  typeof body.access_token === 'string' &&
  'expires_in' in body &&
  typeof body.expires_in === 'number';

/**
 * Spotify authorization code flow
 * https://developer.spotify.com/documentation/web-api/tutorials/code-flow
 */
export class SpotifyTokenProvider implements TokenProvider {
  readonly platform = 'spotify' as const;
  private readonly options: SpotifyAuthOptions;
  private readonly send: RequestSender;
  private readonly now: () => number;

  constructor(options: SpotifyAuthOptions) {
    this.options = options;
    this.send = options.send ?? createGotSender(10000);
    this.now = options.now ?? Date.now;
  }

  authorizationUrl(state?: string): string {
    const params = new URLSearchParams({
      client_id: this.options.clientId,
      response_type: 'code',
      redirect_uri: this.options.redirectUri,
      scope: this.options.scope,
      ...(state ? { state } : {})
    });
    return `${SPOTIFY_AUTHORIZE_URL}?${params.toString()}`;
  }

  async authorize(): Promise<OAuthToken> {
    const state = this.options.state ?? randomBytes(16).toString('hex');
    const code = await obtainAuthorizationCode('spotify', this.authorizationUrl(state), {
      ...this.options,
      expectedState: state
    });

    const token = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.options.redirectUri
    });
    logger.info({ expiresAt: token.expiresAt }, 'spotify authorization complete');
    return token;
  }

  async refresh(token: OAuthToken): Promise<OAuthToken> {
    if (!token.refreshToken) {
      throw new AuthError('spotify', 'no refresh token cached');
    }

    const refreshed = await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: token.refreshToken
    });

    // Spotify may omit the refresh token; the previous one stays valid then
    return {
      ...refreshed,
      refreshToken: refreshed.refreshToken ?? token.refreshToken
    };
  }

  private async requestToken(form: Record<string, string>): Promise<OAuthToken> {
    const authString = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64');

    let statusCode: number;
    let body: unknown;
    try {
      const response = await this.send({
        method: 'POST',
        url: SPOTIFY_TOKEN_URL,
        form,
        headers: {
          Authorization: `Basic ${authString}`
        }
      });
      statusCode = response.statusCode;
      body = response.body ? JSON.parse(response.body) : undefined;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new AuthError('spotify', `spotify token request failed: ${errorMsg}`, { cause: error });
    }

    if (statusCode !== 200 || !isTokenResponse(body)) {
      throw new AuthError('spotify', `spotify token endpoint answered ${statusCode}: ${JSON.stringify(body)}`);
    }

    return {
      accessToken: body.access_token,
      expiresAt: this.now() + body.expires_in * 1000,
      ...(body.refresh_token ? { refreshToken: body.refresh_token } : {}),
      ...(body.scope ? { scope: body.scope } : {})
    };
  }
}
