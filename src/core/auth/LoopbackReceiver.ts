// src/core/auth/LoopbackReceiver.ts

import * as http from 'http';
import { AuthorizationTimeoutError } from '../../utils/errors';

export interface RedirectParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

const CONFIRMATION_PAGE = `<!DOCTYPE html>
<html>
  <head><title>Sign-in complete</title></head>
  <body>
    <h1>Authentication complete</h1>
    <p>You can close this window and return to the application.</p>
  </body>
</html>`;

/**
 * One-shot HTTP listener on an ephemeral loopback port that captures the
 * authorization redirect. Only the first request to `/` is accepted.
 */
export class LoopbackReceiver {
  private server: http.Server;
  private received?: RedirectParams;
  private waiter?: (params: RedirectParams) => void;
  private port?: number;

  constructor(private host: string = '127.0.0.1') {
    this.server = http.createServer((req, res) => this.handle(req, res));
  }

  /**
   * Bind a random free port.
   *
   * @returns The bound port
   */
  async start(): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, this.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });

    const address = this.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Loopback listener has no TCP address');
    }
    this.port = address.port;
    return this.port;
  }

  get redirectUri(): string {
    if (this.port === undefined) {
      throw new Error('Loopback listener not started');
    }
    const host = this.host.includes(':') ? `[${this.host}]` : this.host;
    return `http://${host}:${this.port}`;
  }

  /**
   * Block until the redirect arrives.
   *
   * @param timeoutMs - Upper bound on the wait; 0 waits indefinitely
   * @throws {AuthorizationTimeoutError} If the bound elapses first
   */
  waitForRedirect(timeoutMs: number = 0): Promise<RedirectParams> {
    if (this.received) {
      return Promise.resolve(this.received);
    }

    return new Promise<RedirectParams>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiter = undefined;
          reject(new AuthorizationTimeoutError(timeoutMs));
        }, timeoutMs);
      }

      this.waiter = (params) => {
        if (timer) clearTimeout(timer);
        resolve(params);
      };
    });
  }

  async close(): Promise<void> {
    this.waiter = undefined;
    if (!this.server.listening) return;

    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
      this.server.closeAllConnections();
    });
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method !== 'GET' || url.pathname !== '/' || this.received) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
      return;
    }

    const params: RedirectParams = {
      code: url.searchParams.get('code') ?? undefined,
      state: url.searchParams.get('state') ?? undefined,
      error: url.searchParams.get('error') ?? undefined,
      errorDescription: url.searchParams.get('error_description') ?? undefined,
    };
    this.received = params;

    res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
    res.end(CONFIRMATION_PAGE);

    this.waiter?.(params);
  }
}
