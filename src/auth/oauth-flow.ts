import { logger } from '../logger.js';
import type { Platform } from '../types.js';
import { openBrowser } from './browser.js';
import { waitForAuthorizationCode } from './callback-server.js';
import type { InteractiveAuthOptions } from './types.js';

/**
 * Start the callback listener, send the user to the consent page and wait
 * for the redirect carrying the authorization code
 */
export async function obtainAuthorizationCode(
  platform: Platform,
  authorizeUrl: string,
  options: InteractiveAuthOptions & { expectedState?: string; port?: number }
): Promise<string> {
  const prompt = options.prompt ?? ((url: string) => logger.info({ platform, url }, 'open this url to authorize'));
  const launch = options.launch ?? openBrowser;

  return waitForAuthorizationCode({
    platform,
    redirectUri: options.redirectUri,
    timeoutMs: options.timeoutMs,
    expectedState: options.expectedState,
    port: options.port,
    onListening: () => {
      prompt(authorizeUrl);
      if (options.openBrowser) {
        launch(authorizeUrl);
      }
    }
  });
}
