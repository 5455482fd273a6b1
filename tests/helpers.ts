// tests/helpers.ts

import { vi } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { Logger } from '../src/observability/Logger';
import { MetricsCollector } from '../src/observability/MetricsCollector';
import { encodeToken } from '../src/core/token/TokenCodec';
import type { JsonObject } from '../src/core/token/types';

export const AUTHORITY = 'https://login.example.test';
export const API_BASE = 'https://api.example.test';
export const TENANT = 'tenant-1';
export const TOKEN_PATH = `/${TENANT}/oauth2/v2.0/token`;
export const TOKEN_URL = `${AUTHORITY}${TOKEN_PATH}`;

/**
 * Real logger at error level with spies on every method.
 */
export function createTestLogger(): Logger {
  const logger = new Logger({ level: 'error' });
  vi.spyOn(logger, 'debug');
  vi.spyOn(logger, 'info');
  vi.spyOn(logger, 'warn');
  vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  return logger;
}

export function createTestMetrics(): MetricsCollector {
  const metrics = new MetricsCollector();
  vi.spyOn(metrics, 'incrementCounter');
  vi.spyOn(metrics, 'recordLatency');
  return metrics;
}

/**
 * Unsigned token carrying the given claims.
 */
export function makeToken(claims: JsonObject): string {
  return encodeToken({ alg: 'RS256', typ: 'JWT' }, claims, 'sig');
}

/**
 * Clock that only moves when told to. `sleep` advances it.
 */
export function createClock(start: number = Date.UTC(2024, 0, 1)) {
  let current = start;
  return {
    now: (): number => current,
    advance: (ms: number): void => {
      current += ms;
    },
    sleep: vi.fn(async (ms: number): Promise<void> => {
      current += ms;
    }),
  };
}

export function readFixture(name: string): string {
  return readFileSync(join(__dirname, 'fixtures', name), 'utf8');
}
