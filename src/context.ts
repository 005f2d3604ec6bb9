import type { AppConfig } from './config.js';
import { DeezerTokenProvider } from './auth/deezer-auth.js';
import { SpotifyTokenProvider } from './auth/spotify-auth.js';
import { TokenStore, fixedTokenSource } from './auth/token-store.js';
import type { InteractiveAuthOptions } from './auth/types.js';
import { DeezerClient } from './platforms/deezer.js';
import { createGotSender, type RequestSender } from './platforms/http-client.js';
import { SpotifyClient } from './platforms/spotify.js';
import type { PlatformClient } from './platforms/types.js';
import { createRedirectResolver, type RedirectResolver } from './playlist/url-parser.js';
import type { Platform } from './types.js';

/**
 * Everything a session needs, created once at startup
 */
export interface AppContext {
  config: AppConfig;
  tokens: TokenStore;
  clients: Record<Platform, PlatformClient>;
  deezerAuth: DeezerTokenProvider;
  resolveRedirect: RedirectResolver;
  /** Deezer client bound to one token, used to verify a manually entered token */
  deezerWithToken: (accessToken: string) => PlatformClient;
}

export interface AppContextOptions {
  /** Shows an authorization URL to the user */
  prompt?: InteractiveAuthOptions['prompt'];
  send?: RequestSender;
}

export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const send = options.send ?? createGotSender(config.http.requestTimeoutMs);
  const interactive = {
    timeoutMs: config.auth.timeoutMs,
    openBrowser: config.auth.openBrowser,
    prompt: options.prompt
  };

  const spotifyAuth = new SpotifyTokenProvider({ ...config.spotify, ...interactive, send });
  const deezerAuth = new DeezerTokenProvider({ ...config.deezer, ...interactive, send });

  const tokens = new TokenStore({
    cachePath: config.auth.tokenCachePath,
    providers: { spotify: spotifyAuth, deezer: deezerAuth }
  });

  const clientOptions = { ...config.http, send, searchLimit: config.searchLimit };

  return {
    config,
    tokens,
    clients: {
      spotify: new SpotifyClient({ ...clientOptions, tokens }),
      deezer: new DeezerClient({ ...clientOptions, tokens })
    },
    deezerAuth,
    resolveRedirect: createRedirectResolver(send),
    deezerWithToken: accessToken => new DeezerClient({ ...clientOptions, tokens: fixedTokenSource(accessToken) })
  };
}
