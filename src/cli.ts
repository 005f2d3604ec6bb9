#!/usr/bin/env node
/**
 * Interactive Spotify <-> Deezer playlist converter
 */

import { createInterface, type Interface } from 'readline/promises';

import { MenuSession, type SessionIO } from './cli/session.js';
import { DEFAULT_CONFIG_FILE, loadAppConfig, type AppConfig } from './config.js';
import { createAppContext } from './context.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { formatUserError } from './utils/error-formatter.js';

const usage = `Spotify <-> Deezer playlist converter

Usage:
  playlist-bridge            Start the interactive menu
  playlist-bridge --help     Show this help

Configuration:
  Credentials are read from ${DEFAULT_CONFIG_FILE} (override with CONFIG_FILE).
  Copy config/.env.example there and fill in your application credentials.`;

const terminalIO = (rl: Interface): SessionIO => ({
  // rl.question never settles once stdin has ended, so close counts as end of input
  readLine: prompt =>
    new Promise(resolve => {
      const onClose = (): void => resolve(null);
      rl.once('close', onClose);
      rl.question(prompt).then(
        answer => {
          rl.off('close', onClose);
          resolve(answer);
        },
        (error: unknown) => {
          rl.off('close', onClose);
          logger.debug({ err: error }, 'input closed');
          resolve(null);
        }
      );
    }),
  print: line => console.log(line)
});

function readConfig(): AppConfig | null {
  try {
    return loadAppConfig(process.env.CONFIG_FILE || DEFAULT_CONFIG_FILE);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(formatUserError(error, 'loading the configuration'));
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const command = process.argv[2];
  if (command === '--help' || command === '-h' || command === 'help') {
    console.log(usage);
    return 0;
  }

  const config = readConfig();
  if (!config) {
    return 1;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'received shutdown signal');
    rl.close();
    process.exit(130);
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  rl.on('SIGINT', () => shutdown('SIGINT'));

  const context = createAppContext(config, {
    prompt: url => console.log(`\nOpen this URL to authorize:\n${url}\n`)
  });

  try {
    await new MenuSession(context, terminalIO(rl)).run();
  } finally {
    rl.close();
  }
  return 0;
}

main()
  .then(code => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'unexpected error');
    console.error(formatUserError(error, 'running the converter'));
    process.exit(1);
  });
