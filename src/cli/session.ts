import type { AppContext } from '../context.js';
import { logger } from '../logger.js';
import { PlaylistConverter } from '../playlist/converter.js';
import { parsePlaylistInput } from '../playlist/url-parser.js';
import type { PlaylistReference } from '../types.js';
import { formatUserError } from '../utils/error-formatter.js';
import { formatConversionEvent, formatConversionSummary } from './format.js';
import { INITIAL_STATE, promptFor, reduce, type Effect, type MenuEvent, type MenuState } from './menu.js';

export interface SessionIO {
  /** Resolves null at end of input */
  readLine(prompt: string): Promise<string | null>;
  print(line: string): void;
}

/**
 * Runs the menu: performs effects against the context and feeds their
 * outcome back into the reducer until quit or end of input
 */
export class MenuSession {
  private state: MenuState = INITIAL_STATE;

  constructor(
    private readonly context: AppContext,
    private readonly io: SessionIO
  ) {}

  async run(): Promise<void> {
    const pending: MenuEvent[] = [{ type: 'start' }];

    for (;;) {
      let event = pending.shift();
      if (!event) {
        const prompt = promptFor(this.state);
        if (prompt === null) {
          // No effect reported back; nothing can move the menu forward
          return;
        }
        const line = await this.io.readLine(prompt);
        if (line === null) {
          logger.debug('end of input, leaving menu');
          return;
        }
        event = { type: 'line', text: line };
      }

      const transition = reduce(this.state, event);
      this.state = transition.state;

      for (const effect of transition.effects) {
        if (effect.kind === 'quit') {
          return;
        }
        const followUp = await this.perform(effect);
        if (followUp) {
          pending.push(followUp);
        }
      }
    }
  }

  private async perform(effect: Exclude<Effect, { kind: 'quit' }>): Promise<MenuEvent | null> {
    switch (effect.kind) {
      case 'print':
        this.printLines(effect.lines);
        return null;

      case 'load-spotify-playlists':
        try {
          const playlists = await this.context.clients.spotify.listUserPlaylists();
          return { type: 'playlists-loaded', purpose: effect.purpose, playlists };
        } catch (error) {
          this.reportError(error, 'loading your Spotify playlists');
          return { type: 'task-finished' };
        }

      case 'convert':
        await this.convert(effect.input, effect.name);
        return { type: 'task-finished' };

      case 'set-deezer-token':
        await this.setDeezerToken(effect.token);
        return { type: 'task-finished' };

      case 'authorize-deezer':
        try {
          if (await this.context.tokens.hasToken('deezer')) {
            this.io.print('A Deezer token is already cached, it will be replaced');
          }
          await this.context.tokens.authorize('deezer');
          const user = await this.context.clients.deezer.getCurrentUser();
          this.io.print(`Connected to Deezer as ${user.name}`);
        } catch (error) {
          this.reportError(error, 'authorizing Deezer');
        }
        return { type: 'task-finished' };

      case 'show-deezer-auth-url':
        this.printLines([
          '',
          'Deezer authorization URL:',
          'You first need an application on https://developers.deezer.com/myapps',
          this.context.deezerAuth.authorizationUrl(),
          '',
          'Open the link, authorize the application, then use option 5 or paste a token with option 4'
        ]);
        return { type: 'task-finished' };
    }
  }

  private async convert(input: string | PlaylistReference, name: string | undefined): Promise<void> {
    let source: PlaylistReference;
    try {
      source = typeof input === 'string' ? await parsePlaylistInput(input, this.context.resolveRedirect) : input;
    } catch (error) {
      this.reportError(error, 'reading the playlist link');
      return;
    }

    this.io.print(`Converting ${source.platform} playlist ${source.id}...`);
    const converter = new PlaylistConverter({
      clients: this.context.clients,
      onEvent: event => {
        const lines = formatConversionEvent(event);
        if (lines) {
          this.printLines(lines);
        }
      }
    });

    const report = await converter.convert(source, name ? { name } : {});
    this.printLines(formatConversionSummary(report));
  }

  /**
   * The token is verified with its own client before it replaces the cached one
   */
  private async setDeezerToken(token: string): Promise<void> {
    try {
      const user = await this.context.deezerWithToken(token).getCurrentUser();
      await this.context.tokens.setToken('deezer', { accessToken: token, expiresAt: null });
      this.io.print(`Connected to Deezer as ${user.name}`);
    } catch (error) {
      this.reportError(error, 'checking the Deezer token');
    }
  }

  private reportError(error: unknown, context: string): void {
    logger.error({ err: error }, `failed ${context}`);
    this.io.print(formatUserError(error, context));
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.io.print(line);
    }
  }
}
