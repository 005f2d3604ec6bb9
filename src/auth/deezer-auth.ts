import type { OAuthAppConfig } from '../config.js';
import { AuthError } from '../errors.js';
import { logger } from '../logger.js';
import { createGotSender, type RequestSender } from '../platforms/http-client.js';
import type { OAuthToken } from '../types.js';
import { obtainAuthorizationCode } from './oauth-flow.js';
import type { InteractiveAuthOptions, TokenProvider } from './types.js';

const DEEZER_AUTH_URL = 'https://connect.deezer.com/oauth/auth.php';
const DEEZER_TOKEN_URL = 'https://connect.deezer.com/oauth/access_token.php';

interface DeezerTokenResponse {
  access_token: string;
  /** Seconds; 0 for offline_access tokens that never expire */
  expires: number | string;
}

export interface DeezerAuthOptions extends OAuthAppConfig, Omit<InteractiveAuthOptions, 'redirectUri'> {
  perms: string;
  send?: RequestSender;
  now?: () => number;
}

const parseTokenBody = (text: string): DeezerTokenResponse | null => {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    // Without output=json the endpoint answers access_token=...&expires=...
    const params = new URLSearchParams(text);
    const accessToken = params.get('access_token');
    return accessToken ? { access_token: accessToken, expires: params.get('expires') ?? '0' } : null;
  }

  if (
    typeof body === 'object' &&
    body !== null &&
    'access_token' in body &&
    typeof body.access_token === 'string'
  ) {
    const expires = 'expires' in body && (typeof body.expires === 'number' || typeof body.expires === 'string')
      ? body.expires
      : 0;
    return { access_token: body.access_token, expires };
  }
  return null;
};

/**
 * Deezer server-side OAuth flow
 * https://developers.deezer.com/api/oauth
 * Deezer has no refresh grant: expired tokens go through authorize() again
 */
export class DeezerTokenProvider implements TokenProvider {
  readonly platform = 'deezer' as const;
  private readonly options: DeezerAuthOptions;
  private readonly send: RequestSender;
  private readonly now: () => number;

  constructor(options: DeezerAuthOptions) {
    this.options = options;
    this.send = options.send ?? createGotSender(10000);
    this.now = options.now ?? Date.now;
  }

  authorizationUrl(): string {
    const params = new URLSearchParams({
      app_id: this.options.clientId,
      redirect_uri: this.options.redirectUri,
      perms: this.options.perms,
      response_type: 'code'
    });
    return `${DEEZER_AUTH_URL}?${params.toString()}`;
  }

  async authorize(): Promise<OAuthToken> {
    const code = await obtainAuthorizationCode('deezer', this.authorizationUrl(), this.options);
    const token = await this.exchangeCode(code);
    logger.info({ expiresAt: token.expiresAt }, 'deezer authorization complete');
    return token;
  }

  async exchangeCode(code: string): Promise<OAuthToken> {
    let statusCode: number;
    let text: string;
    try {
      const response = await this.send({
        method: 'GET',
        url: DEEZER_TOKEN_URL,
        searchParams: {
          app_id: this.options.clientId,
          secret: this.options.clientSecret,
          code,
          output: 'json'
        }
      });
      statusCode = response.statusCode;
      text = response.body;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new AuthError('deezer', `deezer token request failed: ${errorMsg}`, { cause: error });
    }

    const body = statusCode === 200 ? parseTokenBody(text) : null;
    if (!body) {
      throw new AuthError('deezer', `deezer token endpoint answered ${statusCode}: ${text.slice(0, 200)}`);
    }

    const expiresIn = Number(body.expires) || 0;
    return {
      accessToken: body.access_token,
      expiresAt: expiresIn > 0 ? this.now() + expiresIn * 1000 : null
    };
  }
}
