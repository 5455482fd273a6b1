// tests/unit/ManagedIdentityFlow.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { IMDS_ENDPOINT, ManagedIdentityFlow } from '../../src/core/auth/flows/ManagedIdentityFlow';
import { EnvironmentMismatchError, ManagedIdentityError } from '../../src/utils/errors';
import { API_BASE, createTestLogger } from '../helpers';

const NOW = Date.UTC(2024, 0, 1);
const NOW_SECONDS = NOW / 1000;
const IMDS_HOST = 'http://169.254.169.254';
const IMDS_PATH = '/metadata/identity/oauth2/token';
const APP_SERVICE_HOST = 'http://localhost:42356';
const APP_SERVICE_ENV = {
  IDENTITY_ENDPOINT: `${APP_SERVICE_HOST}/msi/token`,
  IDENTITY_HEADER: 'test-identity-header',
};

function createFlow(env: Record<string, string | undefined> = {}): ManagedIdentityFlow {
  return new ManagedIdentityFlow(API_BASE, createTestLogger(), { env, timeoutMs: 5000, now: () => NOW });
}

describe('ManagedIdentityFlow', () => {
  beforeEach(() => {
    nock.cleanAll();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('resolveEndpoint', () => {
    it('should prefer the platform endpoint when both variables are set', () => {
      expect(createFlow(APP_SERVICE_ENV).resolveEndpoint()).toEqual({
        kind: 'AppService',
        url: APP_SERVICE_ENV.IDENTITY_ENDPOINT,
      });
    });

    it('should fall back to instance metadata when the header is missing', () => {
      expect(createFlow({ IDENTITY_ENDPOINT: APP_SERVICE_ENV.IDENTITY_ENDPOINT }).resolveEndpoint()).toEqual({
        kind: 'InstanceMetadata',
        url: IMDS_ENDPOINT,
      });
    });
  });

  describe('acquire', () => {
    it('should request a token from instance metadata for the default resource', async () => {
      nock(IMDS_HOST)
        .get(IMDS_PATH)
        .query({ 'api-version': '2018-02-01', resource: API_BASE })
        .matchHeader('Metadata', 'true')
        .reply(200, { access_token: 'mi-token', expires_in: '3599', token_type: 'Bearer', resource: API_BASE });

      const acquired = await createFlow().acquire({ flow: 'ManagedIdentity' });

      expect(acquired).toEqual({
        token: { accessToken: 'mi-token', tokenType: 'Bearer', expiresIn: 3599, resource: API_BASE },
        tokenEndpoint: IMDS_ENDPOINT,
        clientId: undefined,
        scopes: API_BASE,
      });
    });

    it('should call the platform endpoint with the identity header and client id', async () => {
      nock(APP_SERVICE_HOST)
        .get('/msi/token')
        .query({ 'api-version': '2019-08-01', resource: 'https://vault.example.test', client_id: 'uai-1' })
        .matchHeader('X-IDENTITY-HEADER', 'test-identity-header')
        .reply(200, { access_token: 'mi-token', expires_on: String(NOW_SECONDS + 3600) });

      const acquired = await createFlow(APP_SERVICE_ENV).acquire({
        flow: 'ManagedIdentity',
        identityClientId: 'uai-1',
        resource: 'https://vault.example.test',
      });

      expect(acquired.token.expiresIn).toBe(3600);
      expect(acquired.tokenEndpoint).toBe(APP_SERVICE_ENV.IDENTITY_ENDPOINT);
      expect(acquired.clientId).toBe('uai-1');
      expect(acquired.scopes).toBe('https://vault.example.test');
    });

    it('should derive the lifetime from a date-formatted expires_on', async () => {
      nock(IMDS_HOST)
        .get(IMDS_PATH)
        .query(true)
        .reply(200, { access_token: 'mi-token', expires_on: '2024-01-01T01:00:00Z' });

      const acquired = await createFlow().acquire({ flow: 'ManagedIdentity' });

      expect(acquired.token.expiresIn).toBe(3600);
    });

    it('should report an environment mismatch when the endpoint is missing', async () => {
      nock(IMDS_HOST).get(IMDS_PATH).query(true).reply(404, 'Not Found');

      const error = await createFlow()
        .acquire({ flow: 'ManagedIdentity' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EnvironmentMismatchError);
      expect(error).toHaveProperty('code', 'ENVIRONMENT_MISMATCH');
    });

    it('should report an environment mismatch when nothing is listening', async () => {
      nock(IMDS_HOST)
        .get(IMDS_PATH)
        .query(true)
        .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED 169.254.169.254:80' });

      await expect(createFlow().acquire({ flow: 'ManagedIdentity' })).rejects.toThrow(EnvironmentMismatchError);
    });

    it('should report other endpoint failures as managed identity errors', async () => {
      nock(IMDS_HOST)
        .get(IMDS_PATH)
        .query(true)
        .reply(400, { error: 'invalid_request', error_description: 'Identity not found' });

      const error = await createFlow()
        .acquire({ flow: 'ManagedIdentity' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ManagedIdentityError);
      expect(error).not.toBeInstanceOf(EnvironmentMismatchError);
      expect(error).toHaveProperty('message', 'Managed identity request failed: Identity not found');
    });

    it('should reject a response without an access token', async () => {
      nock(IMDS_HOST).get(IMDS_PATH).query(true).reply(200, { expires_in: 3600 });

      await expect(createFlow().acquire({ flow: 'ManagedIdentity' })).rejects.toThrow(
        'Managed identity response did not contain an access token'
      );
    });
  });
});
