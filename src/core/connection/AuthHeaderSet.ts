// src/core/connection/AuthHeaderSet.ts

import { ConfigError } from '../../utils/errors';

const AUTHORIZATION = 'Authorization';
const CONTENT_TYPE = 'Content-Type';

export function isManagedHeader(name: string): boolean {
  return name.toLowerCase() === AUTHORIZATION.toLowerCase();
}

/**
 * Ordered request headers of a connection. `Authorization` is owned by the
 * connection; every other entry belongs to the caller and survives refreshes.
 */
export class AuthHeaderSet {
  private entries: Map<string, string> = new Map();

  constructor(token: string, contentType: string = 'application/json') {
    this.entries.set(AUTHORIZATION, `Bearer ${token}`);
    this.entries.set(CONTENT_TYPE, contentType);
  }

  setToken(token: string): void {
    this.entries.set(AUTHORIZATION, `Bearer ${token}`);
  }

  /**
   * Add or replace a custom header. Names match case-insensitively.
   */
  set(name: string, value: string): void {
    this.assertCustom(name);
    this.entries.set(this.findKey(name) ?? name, value);
  }

  remove(name: string): boolean {
    this.assertCustom(name);
    const existing = this.findKey(name);
    return existing !== undefined && this.entries.delete(existing);
  }

  get(name: string): string | undefined {
    const key = this.findKey(name);
    return key === undefined ? undefined : this.entries.get(key);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  private findKey(name: string): string | undefined {
    const lower = name.toLowerCase();
    for (const key of this.entries.keys()) {
      if (key.toLowerCase() === lower) return key;
    }
    return undefined;
  }

  private assertCustom(name: string): void {
    if (isManagedHeader(name)) {
      throw new ConfigError('The Authorization header is managed by the connection');
    }
  }
}
