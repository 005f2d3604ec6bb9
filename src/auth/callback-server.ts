import express, { type Response } from 'express';
import type { Server } from 'http';

import { AuthError, AuthTimeout } from '../errors.js';
import { logger } from '../logger.js';
import type { Platform } from '../types.js';

export interface CallbackOptions {
  platform: Platform;
  /** Redirect URI registered on the platform; its host, port and path are served */
  redirectUri: string;
  timeoutMs: number;
  /** `state` value the callback must echo back */
  expectedState?: string;
  /** Overrides the redirect URI's port (0 picks a free port) */
  port?: number;
  /** Called once the listener accepts connections */
  onListening?: (port: number) => void;
}

const page = (title: string, detail: string): string => `<!doctype html>
<html>
  <body style="font-family: sans-serif; text-align: center; margin-top: 4rem">
    <h2>${title}</h2>
    <p>${detail}</p>
  </body>
</html>`;

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, char => `&#${char.charCodeAt(0)};`);

/**
 * Serve the OAuth redirect URI until exactly one callback arrives
 * Resolves with the authorization code; rejects with AuthError when consent
 * was denied and AuthTimeout when nothing arrives within timeoutMs
 * The listener shuts down once the callback has been answered
 */
export function waitForAuthorizationCode(options: CallbackOptions): Promise<string> {
  const redirect = new URL(options.redirectUri);
  const host = redirect.hostname;
  const port = options.port ?? Number(redirect.port || 80);
  const callbackPath = redirect.pathname;

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    let server: Server | null = null;
    let closed = false;

    const shutdown = (): void => {
      if (server && !closed) {
        closed = true;
        server.close();
        server.closeAllConnections();
      }
    };

    // The listener goes down once the reply to the callback has been flushed
    const finish = (outcome: () => void, reply?: Response): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (reply && !reply.writableFinished) {
        reply.once('finish', shutdown);
        reply.once('close', shutdown);
      } else {
        shutdown();
      }
      outcome();
    };

    const timer = setTimeout(() => {
      logger.warn({ platform: options.platform, timeoutMs: options.timeoutMs }, 'oauth callback not received in time');
      finish(() => reject(new AuthTimeout(options.platform, options.timeoutMs)));
    }, options.timeoutMs);

    const app = express();

    app.get(callbackPath, (req, res) => {
      if (settled) {
        res.status(410).send(page('Authorization already handled', 'You can close this window.'));
        return;
      }

      const code = queryString(req.query.code);
      const denied = queryString(req.query.error_reason) ?? queryString(req.query.error);
      const state = queryString(req.query.state);

      if (denied || !code) {
        const reason = denied ?? 'no authorization code in callback';
        res.status(400).send(page('Authorization failed', escapeHtml(reason)));
        finish(() => reject(new AuthError(options.platform, `${options.platform} authorization failed: ${reason}`)), res);
        return;
      }

      if (options.expectedState !== undefined && state !== options.expectedState) {
        res.status(400).send(page('Authorization failed', 'State mismatch.'));
        finish(() => reject(new AuthError(options.platform, `${options.platform} authorization failed: state mismatch`)), res);
        return;
      }

      res.status(200).send(page('Authorization complete', 'You can close this window and return to the terminal.'));
      logger.debug({ platform: options.platform }, 'oauth callback received');
      finish(() => resolve(code), res);
    });

    app.use((_req, res) => {
      res.status(404).send(page('Not found', ''));
    });

    server = app.listen(port, host, () => {
      const address = server?.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      logger.debug({ platform: options.platform, host, port: boundPort, path: callbackPath }, 'oauth callback listener started');
      options.onListening?.(boundPort);
    });

    server.on('error', error => {
      finish(() => reject(new AuthError(
        options.platform,
        `cannot listen for the ${options.platform} callback on ${host}:${port} (is the port free?)`,
        { cause: error }
      )));
    });
  });
}
