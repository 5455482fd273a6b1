// src/core/auth/flows/types.ts

import type { NormalizedTokenResponse } from '../../token/types';

/**
 * Result of a successful acquisition: the token plus whatever the connection
 * must remember to obtain the next one.
 */
export interface AcquiredToken {
  token: NormalizedTokenResponse;
  tokenEndpoint?: string;
  clientId?: string;
  tenantId?: string;
  scopes?: string;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
