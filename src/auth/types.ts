import type { OAuthToken, Platform } from '../types.js';

/**
 * Obtains and renews tokens for one platform
 */
export interface TokenProvider {
  readonly platform: Platform;
  /** URL the user visits to grant access */
  authorizationUrl(state?: string): string;
  /** Interactive flow: listener + browser, blocks until callback or timeout */
  authorize(): Promise<OAuthToken>;
  /** Silent renewal; absent on platforms without a refresh grant */
  refresh?(token: OAuthToken): Promise<OAuthToken>;
}

export interface InteractiveAuthOptions {
  redirectUri: string;
  timeoutMs: number;
  openBrowser: boolean;
  /** Shows the authorization URL to the user */
  prompt?: (url: string) => void;
  /** Browser launcher; defaults to the system browser */
  launch?: (url: string) => void;
}
