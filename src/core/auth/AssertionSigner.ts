// src/core/auth/AssertionSigner.ts

import { createHash, createPrivateKey, createSign, KeyObject, X509Certificate } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { ClientCertificate } from './types';
import { base64UrlEncode } from '../token/TokenCodec';
import { ConfigError, MissingPrivateKeyError } from '../../utils/errors';

export const DEFAULT_ASSERTION_LIFETIME_MINUTES = 5;

export interface ClientAssertionHeader {
  alg: 'RS256';
  typ: 'JWT';
  x5t: string;
}

export interface ClientAssertionClaims {
  aud: string;
  iss: string;
  sub: string;
  jti: string;
  nbf: number;
  exp: number;
}

/**
 * Build a signed client assertion for the certificate credentials grant.
 *
 * @param audience - Token endpoint URL the assertion is presented to
 * @param lifetimeMinutes - Validity window; kept short to limit replay
 * @throws {MissingPrivateKeyError} If the certificate handle carries no private key
 */
export function buildClientAssertion(
  clientId: string,
  audience: string,
  certificate: ClientCertificate,
  lifetimeMinutes: number = DEFAULT_ASSERTION_LIFETIME_MINUTES,
  now: () => number = Date.now
): string {
  const privateKey = loadPrivateKey(certificate);
  const issuedAt = Math.floor(now() / 1000);

  const header: ClientAssertionHeader = {
    alg: 'RS256',
    typ: 'JWT',
    x5t: computeThumbprint(certificate.certificate),
  };

  const claims: ClientAssertionClaims = {
    aud: audience,
    iss: clientId,
    sub: clientId,
    jti: uuidv4(),
    nbf: issuedAt,
    exp: issuedAt + lifetimeMinutes * 60,
  };

  const signingInput = `${base64UrlEncode(Buffer.from(JSON.stringify(header)))}.${base64UrlEncode(
    Buffer.from(JSON.stringify(claims))
  )}`;

  // RSASSA-PKCS1-v1_5 with SHA-256
  const signer = createSign('RSA-SHA256');
  signer.update(signingInput);
  const signature = signer.sign(privateKey);

  return `${signingInput}.${base64UrlEncode(signature)}`;
}

/**
 * SHA-1 digest of the DER-encoded certificate, base64url-encoded (the x5t header value).
 */
export function computeThumbprint(certificate: string | Buffer): string {
  let der: Buffer;
  try {
    der = new X509Certificate(certificate).raw;
  } catch (error) {
    throw new ConfigError('Client certificate could not be parsed', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return base64UrlEncode(createHash('sha1').update(der).digest());
}

function loadPrivateKey(certificate: ClientCertificate): KeyObject {
  if (!certificate.privateKey) {
    throw new MissingPrivateKeyError();
  }
  if (certificate.privateKey instanceof KeyObject) {
    if (certificate.privateKey.type !== 'private') {
      throw new MissingPrivateKeyError('Client certificate key is not a private key');
    }
    return certificate.privateKey;
  }

  try {
    return createPrivateKey({ key: certificate.privateKey, passphrase: certificate.passphrase });
  } catch {
    throw new MissingPrivateKeyError('Client certificate private key could not be loaded');
  }
}
