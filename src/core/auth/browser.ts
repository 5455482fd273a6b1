// src/core/auth/browser.ts

import { spawn } from 'child_process';
import type { BrowserLauncher } from './types';

/**
 * Open a URL with the platform's default browser handler.
 */
export const openInBrowser: BrowserLauncher = (url) => {
  let command: string;
  let args: string[];
  // cmd parses its own command line; Node must not re-quote the empty title
  let windowsVerbatimArguments = false;

  switch (process.platform) {
    case 'darwin':
      command = 'open';
      args = [url];
      break;
    case 'win32':
      command = 'cmd';
      args = ['/c', 'start', '""', url.replace(/&/g, '^&')];
      windowsVerbatimArguments = true;
      break;
    default:
      command = 'xdg-open';
      args = [url];
  }

  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsVerbatimArguments });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
};
