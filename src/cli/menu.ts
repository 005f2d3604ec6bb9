/**
 * Interactive menu as a pure state machine
 *
 * Every handler maps (state, event) to the next state plus a list of effects.
 * The session interpreter performs the effects and feeds results back as events,
 * so nothing in this module touches the network or the terminal.
 */

import type { PlaylistReference, PlaylistSummary } from '../types.js';
import { formatPlaylistList } from './format.js';

export type MenuAction =
  | 'list-spotify-playlists'
  | 'convert-spotify-playlist'
  | 'convert-by-link'
  | 'set-deezer-token'
  | 'authorize-deezer'
  | 'show-deezer-auth-url'
  | 'quit';

export const MENU_OPTIONS: ReadonlyArray<{ key: string; action: MenuAction; label: string }> = [
  { key: '1', action: 'list-spotify-playlists', label: 'List my Spotify playlists' },
  { key: '2', action: 'convert-spotify-playlist', label: 'Convert one of my Spotify playlists to Deezer' },
  { key: '3', action: 'convert-by-link', label: 'Convert a playlist by link' },
  { key: '4', action: 'set-deezer-token', label: 'Set a Deezer access token manually' },
  { key: '5', action: 'authorize-deezer', label: 'Authenticate with Deezer automatically' },
  { key: '6', action: 'show-deezer-auth-url', label: 'Show the Deezer authorization URL' },
  { key: '7', action: 'quit', label: 'Quit' }
];

export type PlaylistPurpose = 'list' | 'choose';

export type MenuState =
  | { mode: 'main' }
  | { mode: 'choose-playlist'; playlists: readonly PlaylistSummary[] }
  | { mode: 'name-for-playlist'; playlist: PlaylistSummary }
  | { mode: 'enter-link' }
  | { mode: 'name-for-link'; link: string }
  | { mode: 'enter-token' }
  /** An effect is running; input is ignored until it reports back */
  | { mode: 'busy' }
  | { mode: 'exited' };

export type MenuEvent =
  | { type: 'start' }
  | { type: 'line'; text: string }
  | { type: 'playlists-loaded'; purpose: PlaylistPurpose; playlists: readonly PlaylistSummary[] }
  | { type: 'task-finished' };

export type Effect =
  | { kind: 'print'; lines: string[] }
  | { kind: 'load-spotify-playlists'; purpose: PlaylistPurpose }
  | { kind: 'convert'; input: string | PlaylistReference; name?: string }
  | { kind: 'set-deezer-token'; token: string }
  | { kind: 'authorize-deezer' }
  | { kind: 'show-deezer-auth-url' }
  | { kind: 'quit' };

export interface Transition {
  state: MenuState;
  effects: Effect[];
}

type Handler<S extends MenuState> = (state: S, event: MenuEvent) => Transition;
type HandlerTable = { [M in MenuState['mode']]: Handler<Extract<MenuState, { mode: M }>> };

export const INITIAL_STATE: MenuState = { mode: 'main' };

const MAIN: MenuState = { mode: 'main' };
const BUSY: MenuState = { mode: 'busy' };

const print = (...lines: string[]): Effect => ({ kind: 'print', lines });

export function menuLines(): string[] {
  return ['', 'Options:', ...MENU_OPTIONS.map(option => `${option.key}. ${option.label}`)];
}

const backToMain = (...messages: string[]): Transition => ({
  state: MAIN,
  effects: [print(...messages, ...menuLines())]
});

const stay = <S extends MenuState>(state: S): Transition => ({ state, effects: [] });

const ACTIONS: Record<MenuAction, () => Transition> = {
  'list-spotify-playlists': () => ({
    state: BUSY,
    effects: [{ kind: 'load-spotify-playlists', purpose: 'list' }]
  }),
  'convert-spotify-playlist': () => ({
    state: BUSY,
    effects: [{ kind: 'load-spotify-playlists', purpose: 'choose' }]
  }),
  'convert-by-link': () => ({ state: { mode: 'enter-link' }, effects: [] }),
  'set-deezer-token': () => ({ state: { mode: 'enter-token' }, effects: [] }),
  'authorize-deezer': () => ({
    state: BUSY,
    effects: [print('', 'Starting Deezer authorization...'), { kind: 'authorize-deezer' }]
  }),
  'show-deezer-auth-url': () => ({ state: BUSY, effects: [{ kind: 'show-deezer-auth-url' }] }),
  quit: () => ({ state: { mode: 'exited' }, effects: [print('Bye!'), { kind: 'quit' }] })
};

const HANDLERS: HandlerTable = {
  main: (state, event) => {
    if (event.type === 'start') {
      return {
        state,
        effects: [print('Spotify <-> Deezer playlist converter', '='.repeat(50), ...menuLines())]
      };
    }
    if (event.type !== 'line') {
      return stay(state);
    }
    const option = MENU_OPTIONS.find(candidate => candidate.key === event.text.trim());
    return option ? ACTIONS[option.action]() : backToMain('Invalid choice');
  },

  'choose-playlist': (state, event) => {
    if (event.type !== 'line') {
      return stay(state);
    }
    const text = event.text.trim();
    if (!/^\d+$/.test(text)) {
      return backToMain('Please enter a valid number');
    }
    const playlist = state.playlists[Number.parseInt(text, 10) - 1];
    if (!playlist) {
      return backToMain('Invalid number');
    }
    return { state: { mode: 'name-for-playlist', playlist }, effects: [] };
  },

  'name-for-playlist': (state, event) => {
    if (event.type !== 'line') {
      return stay(state);
    }
    const { playlist } = state;
    return {
      state: BUSY,
      effects: [
        {
          kind: 'convert',
          input: { platform: 'spotify', id: playlist.id, name: playlist.name },
          name: event.text.trim() || playlist.name
        }
      ]
    };
  },

  'enter-link': (state, event) => {
    if (event.type !== 'line') {
      return stay(state);
    }
    const link = event.text.trim();
    if (!link) {
      return backToMain('A playlist link is required');
    }
    return { state: { mode: 'name-for-link', link }, effects: [] };
  },

  'name-for-link': (state, event) => {
    if (event.type !== 'line') {
      return stay(state);
    }
    const name = event.text.trim();
    return {
      state: BUSY,
      effects: [{ kind: 'convert', input: state.link, ...(name ? { name } : {}) }]
    };
  },

  'enter-token': (state, event) => {
    if (event.type !== 'line') {
      return stay(state);
    }
    const token = event.text.trim();
    if (!token) {
      return backToMain('A token is required');
    }
    return { state: BUSY, effects: [{ kind: 'set-deezer-token', token }] };
  },

  busy: (state, event) => {
    if (event.type === 'task-finished') {
      return backToMain();
    }
    if (event.type !== 'playlists-loaded') {
      return stay(state);
    }

    if (event.purpose === 'list') {
      return event.playlists.length > 0
        ? backToMain('', 'Your Spotify playlists:', ...formatPlaylistList(event.playlists))
        : backToMain('No playlists found');
    }

    if (event.playlists.length === 0) {
      return backToMain('No Spotify playlist available');
    }
    return {
      state: { mode: 'choose-playlist', playlists: event.playlists },
      effects: [print('', 'Choose a playlist to convert:', ...formatPlaylistList(event.playlists))]
    };
  },

  exited: state => stay(state)
};

/**
 * Dispatch one event; the narrowing below keeps each handler typed to its own state
 */
export function reduce(state: MenuState, event: MenuEvent): Transition {
  switch (state.mode) {
    case 'main':
      return HANDLERS.main(state, event);
    case 'choose-playlist':
      return HANDLERS['choose-playlist'](state, event);
    case 'name-for-playlist':
      return HANDLERS['name-for-playlist'](state, event);
    case 'enter-link':
      return HANDLERS['enter-link'](state, event);
    case 'name-for-link':
      return HANDLERS['name-for-link'](state, event);
    case 'enter-token':
      return HANDLERS['enter-token'](state, event);
    case 'busy':
      return HANDLERS.busy(state, event);
    case 'exited':
      return HANDLERS.exited(state, event);
  }
}

/**
 * Text shown when waiting for input in a state; null when no input is expected
 */
export function promptFor(state: MenuState): string | null {
  switch (state.mode) {
    case 'main':
      return '\nYour choice (1-7): ';
    case 'choose-playlist':
      return '\nPlaylist number: ';
    case 'name-for-playlist':
      return `New name (Enter keeps "${state.playlist.name}"): `;
    case 'enter-link':
      return 'Playlist link to convert: ';
    case 'name-for-link':
      return 'New playlist name (Enter for an automatic name): ';
    case 'enter-token':
      return 'Deezer access token: ';
    case 'busy':
    case 'exited':
      return null;
  }
}
