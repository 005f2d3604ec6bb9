import { spawn } from 'child_process';

import { logger } from '../logger.js';

const openerFor = (url: string): { command: string; args: string[] } => {
  switch (process.platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
};

/**
 * Open a URL in the system browser
 * Failures are logged only; the URL is always printed for manual use
 */
export function openBrowser(url: string): void {
  const { command, args } = openerFor(url);
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.on('error', error => {
    logger.warn({ command, error: error.message }, 'could not open browser');
  });
  child.unref();
}
