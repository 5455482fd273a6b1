// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json' });

  it('should redact token values in metadata', () => {
    const redacted = logger['redactSensitive']({
      grantType: 'refresh_token',
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh-token',
    });

    expect(redacted).toEqual({
      grantType: 'refresh_token',
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
    });
  });

  it('should redact client credentials and grant secrets', () => {
    const redacted = logger['redactSensitive']({
      clientSecret: 'test-secret',
      clientAssertion: 'test-assertion',
      privateKey: 'test-key',
      code: 'test-code',
      codeVerifier: 'test-verifier',
      deviceCode: 'test-device-code',
      endpoint: 'https://login.example.test/t/oauth2/v2.0/token',
    });

    expect(redacted).toEqual({
      clientSecret: '[REDACTED]',
      clientAssertion: '[REDACTED]',
      privateKey: '[REDACTED]',
      code: '[REDACTED]',
      codeVerifier: '[REDACTED]',
      deviceCode: '[REDACTED]',
      endpoint: 'https://login.example.test/t/oauth2/v2.0/token',
    });
  });

  it('should redact nested tokenSet fields without touching the caller object', () => {
    const meta = {
      flowType: 'DeviceCode',
      tokenSet: { accessToken: 'nested-access', expiresIn: 3600 },
    };

    const redacted = logger['redactSensitive'](meta);

    expect(redacted.tokenSet).toEqual({ accessToken: '[REDACTED]', expiresIn: 3600 });
    expect(meta.tokenSet.accessToken).toBe('nested-access');
  });

  it('should accept calls with and without metadata at every level', () => {
    expect(() => {
      const quiet = new Logger({ level: 'error', format: 'pretty' });
      quiet.debug('debug');
      quiet.info('info', { flowType: 'Token' });
      quiet.warn('warn', { token: 'test-token' });
    }).not.toThrow();
  });
});
