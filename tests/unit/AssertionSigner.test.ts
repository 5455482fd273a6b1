// tests/unit/AssertionSigner.test.ts

import { describe, it, expect } from 'vitest';
import { createPublicKey, createVerify, generateKeyPairSync } from 'crypto';
import { buildClientAssertion, computeThumbprint } from '../../src/core/auth/AssertionSigner';
import { base64UrlDecode, decodeToken } from '../../src/core/token/TokenCodec';
import { ConfigError, MissingPrivateKeyError } from '../../src/utils/errors';
import { TOKEN_URL, readFixture } from '../helpers';

const certificate = readFixture('test-cert.pem');
const privateKey = readFixture('test-key.pem');
const FIXED_NOW = Date.UTC(2024, 0, 1, 12, 0, 0);

describe('AssertionSigner', () => {
  describe('computeThumbprint', () => {
    it('should hash the DER certificate with SHA-1 and encode it base64url', () => {
      expect(computeThumbprint(certificate)).toBe('wDHOpPoi30GS06ME5JsYHAG8EG0');
    });

    it('should reject input that is not a certificate', () => {
      expect(() => computeThumbprint('not a certificate')).toThrow(ConfigError);
    });
  });

  describe('buildClientAssertion', () => {
    it('should produce header and claims for the token endpoint', () => {
      const assertion = buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey }, 5, () => FIXED_NOW);

      const { header, payload } = decodeToken(assertion);
      const nbf = FIXED_NOW / 1000;

      expect(header).toEqual({ alg: 'RS256', typ: 'JWT', x5t: 'wDHOpPoi30GS06ME5JsYHAG8EG0' });
      expect(payload.aud).toBe(TOKEN_URL);
      expect(payload.iss).toBe('client-1');
      expect(payload.sub).toBe('client-1');
      expect(payload.nbf).toBe(nbf);
      expect(payload.exp).toBe(nbf + 300);
      expect(payload.jti).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should sign with the certificate key so the certificate verifies it', () => {
      const assertion = buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey });
      const [header, payload, signature] = assertion.split('.');

      const verifier = createVerify('RSA-SHA256');
      verifier.update(`${header}.${payload}`);

      expect(verifier.verify(createPublicKey(certificate), base64UrlDecode(signature))).toBe(true);
    });

    it('should use a fresh identifier for every assertion', () => {
      const first = decodeToken(buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey }));
      const second = decodeToken(buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey }));

      expect(first.payload.jti).not.toBe(second.payload.jti);
    });

    it('should fail when the certificate has no private key', () => {
      expect(() => buildClientAssertion('client-1', TOKEN_URL, { certificate })).toThrow(MissingPrivateKeyError);
    });

    it('should fail when the key object is a public key', () => {
      const { publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });

      expect(() => buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey: publicKey })).toThrow(
        'Client certificate key is not a private key'
      );
    });

    it('should fail when the private key cannot be loaded', () => {
      expect(() =>
        buildClientAssertion('client-1', TOKEN_URL, { certificate, privateKey: 'garbage' })
      ).toThrow('Client certificate private key could not be loaded');
    });
  });
});
