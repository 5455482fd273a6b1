// src/core/token/types.ts

export type JsonObject = Record<string, unknown>;

export interface DecodedToken {
  header: JsonObject;
  payload: JsonObject;
}

export type TokenType = 'Delegated' | 'Application';

/**
 * Display-only projection of a decoded access token. Never used for authorization.
 */
export interface TokenContext {
  identity: string;
  tokenType: TokenType;
  tenantId?: string;
  audience?: string;
  scopes: string;
  issuedAt?: Date;
  expiresAt?: Date;
  appId?: string;
}

/**
 * Token endpoint response after normalization, shared by every acquisition flow.
 */
export interface NormalizedTokenResponse {
  accessToken: string;
  tokenType: string;
  expiresIn?: number; // seconds
  refreshToken?: string;
  scope?: string;
  resource?: string;
}
