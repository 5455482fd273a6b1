// src/core/token/TokenCodec.ts

import type { DecodedToken, JsonObject, TokenContext } from './types';
import { MalformedTokenError } from '../../utils/errors';
import { isRecord, readString } from '../../utils/guards';

// Base64 of '{"', the start of every compact JSON header
const SIGNED_HEADER_PREFIX = 'eyJ';

/**
 * Decode header and claims of a compact signed token.
 *
 * No signature verification happens here; the result is for display only.
 */
export function decodeToken(token: string): DecodedToken {
  const segments = token.split('.');
  if (segments.length < 2 || !token.startsWith(SIGNED_HEADER_PREFIX)) {
    throw new MalformedTokenError();
  }

  return {
    header: decodeSegment(segments[0], 'header'),
    payload: decodeSegment(segments[1], 'payload'),
  };
}

/**
 * Derive the display context of a token.
 *
 * @throws {MalformedTokenError} If the token cannot be decoded
 */
export function extractContext(token: string): TokenContext {
  const { payload } = decodeToken(token);

  const scp = readString(payload, 'scp');
  const roles = Array.isArray(payload.roles)
    ? payload.roles.filter((role): role is string => typeof role === 'string')
    : undefined;

  let scopes = 'N/A';
  if (scp !== undefined) {
    scopes = scp;
  } else if (roles && roles.length > 0) {
    scopes = roles.join(' ');
  }

  return {
    identity:
      readString(payload, 'upn') ??
      readString(payload, 'unique_name') ??
      readString(payload, 'app_displayname') ??
      readString(payload, 'azp') ??
      'Unknown',
    tokenType: scp !== undefined ? 'Delegated' : 'Application',
    tenantId: readString(payload, 'tid'),
    audience: readString(payload, 'aud'),
    scopes,
    issuedAt: epochClaim(payload, 'iat'),
    expiresAt: epochClaim(payload, 'exp'),
    appId: readString(payload, 'appid') ?? readString(payload, 'azp'),
  };
}

/**
 * Build an unsigned compact token. Used to fabricate tokens for tests and examples.
 */
export function encodeToken(header: JsonObject, payload: JsonObject, signature: string = ''): string {
  return `${base64UrlEncode(Buffer.from(JSON.stringify(header)))}.${base64UrlEncode(
    Buffer.from(JSON.stringify(payload))
  )}.${signature}`;
}

export function base64UrlEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

export function base64UrlDecode(segment: string): Buffer {
  const base64 = segment.replace(/-/g, '+').replace(/_/g, '/');
  const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);
  return Buffer.from(padded, 'base64');
}

function decodeSegment(segment: string, part: 'header' | 'payload'): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(base64UrlDecode(segment).toString('utf8'));
  } catch {
    throw new MalformedTokenError(`Token ${part} is not valid encoded JSON`);
  }

  if (!isRecord(parsed)) {
    throw new MalformedTokenError(`Token ${part} is not a JSON object`);
  }
  return parsed;
}

function epochClaim(payload: JsonObject, name: string): Date | undefined {
  const value = payload[name];
  return typeof value === 'number' ? new Date(value * 1000) : undefined;
}
