// tests/unit/errors.test.ts

import { describe, it, expect } from 'vitest';
import {
  AccessDeniedError,
  ApiRequestError,
  AuthorizationError,
  AuthorizationTimeoutError,
  ConfigError,
  CsrfValidationError,
  DeviceCodeExpiredError,
  DeviceCodeTimeoutError,
  EnvironmentMismatchError,
  MalformedTokenError,
  ManagedIdentityError,
  MissingPrivateKeyError,
  NotConnectedError,
  SDKError,
  TokenRequestError,
  errorMessage,
} from '../../src/utils/errors';

describe('errors', () => {
  it.each([
    [new ConfigError('bad'), 'CONFIG_ERROR'],
    [new MalformedTokenError(), 'MALFORMED_TOKEN'],
    [new MissingPrivateKeyError(), 'MISSING_PRIVATE_KEY'],
    [new TokenRequestError('failed'), 'TOKEN_REQUEST_FAILED'],
    [new CsrfValidationError(), 'CSRF_VALIDATION_FAILED'],
    [new AuthorizationError('access_denied'), 'AUTHORIZATION_FAILED'],
    [new AuthorizationTimeoutError(1000), 'AUTHORIZATION_TIMEOUT'],
    [new DeviceCodeTimeoutError(900), 'DEVICE_CODE_TIMEOUT'],
    [new DeviceCodeExpiredError(), 'DEVICE_CODE_EXPIRED'],
    [new AccessDeniedError(), 'ACCESS_DENIED'],
    [new ManagedIdentityError('failed'), 'MANAGED_IDENTITY_FAILED'],
    [new EnvironmentMismatchError('absent'), 'ENVIRONMENT_MISMATCH'],
    [new NotConnectedError(), 'NOT_CONNECTED'],
    [new ApiRequestError('failed', 400, 'BadRequest'), 'API_REQUEST_FAILED'],
  ])('%s should carry code %s', (error, code) => {
    expect(error).toBeInstanceOf(SDKError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(code);
    expect(error.name).toBe(error.constructor.name);
  });

  it('should expose provider fields on token request errors', () => {
    const error = new TokenRequestError('invalid_grant: expired', {
      errorCode: 'invalid_grant',
      description: 'expired',
      status: 400,
    });

    expect(error.errorCode).toBe('invalid_grant');
    expect(error.description).toBe('expired');
    expect(error.status).toBe(400);
  });

  it('should describe authorization failures with and without a description', () => {
    expect(new AuthorizationError('access_denied').message).toBe('Authorization failed: access_denied');
    expect(new AuthorizationError('access_denied', 'User cancelled').message).toBe(
      'Authorization failed: access_denied - User cancelled'
    );
  });

  it('should treat an environment mismatch as a managed identity failure', () => {
    expect(new EnvironmentMismatchError('absent')).toBeInstanceOf(ManagedIdentityError);
  });

  it('should keep status and provider code on API errors', () => {
    const error = new ApiRequestError('failed', 403, 'Authorization_RequestDenied', { method: 'POST' });

    expect(error.status).toBe(403);
    expect(error.errorCode).toBe('Authorization_RequestDenied');
    expect(error.details).toEqual({ method: 'POST', status: 403, errorCode: 'Authorization_RequestDenied' });
  });

  it('should read messages from any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
