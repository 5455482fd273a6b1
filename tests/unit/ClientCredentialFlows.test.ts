// tests/unit/ClientCredentialFlows.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { ClientSecretFlow } from '../../src/core/auth/flows/ClientSecretFlow';
import { ClientCertificateFlow, JWT_BEARER_ASSERTION_TYPE } from '../../src/core/auth/flows/ClientCertificateFlow';
import { TokenEndpointClient } from '../../src/core/auth/TokenEndpointClient';
import { AuthorityEndpoints } from '../../src/core/auth/endpoints';
import { decodeToken } from '../../src/core/token/TokenCodec';
import { MissingPrivateKeyError, TokenRequestError } from '../../src/utils/errors';
import {
  API_BASE,
  AUTHORITY,
  TENANT,
  TOKEN_PATH,
  TOKEN_URL,
  createTestLogger,
  createTestMetrics,
  readFixture,
} from '../helpers';

const certificate = readFixture('test-cert.pem');
const privateKey = readFixture('test-key.pem');

describe('client credential flows', () => {
  let tokenClient: TokenEndpointClient;
  let endpoints: AuthorityEndpoints;
  let form: Record<string, string>;

  beforeEach(() => {
    nock.cleanAll();
    tokenClient = new TokenEndpointClient(createTestLogger(), createTestMetrics());
    endpoints = new AuthorityEndpoints(AUTHORITY, API_BASE);
    form = {};
  });

  afterEach(() => {
    nock.cleanAll();
  });

  function mockTokenEndpoint(): void {
    nock(AUTHORITY)
      .post(TOKEN_PATH, (body: Record<string, string>) => {
        form = { ...body };
        return true;
      })
      .reply(200, { access_token: 'app-token', expires_in: 3599 });
  }

  describe('ClientSecretFlow', () => {
    it('should request the application default scope with the secret', async () => {
      mockTokenEndpoint();
      const flow = new ClientSecretFlow(tokenClient, endpoints);

      const acquired = await flow.acquire({
        flow: 'ClientSecret',
        clientId: 'client-1',
        tenantId: TENANT,
        clientSecret: 'test-secret',
      });

      expect(form).toEqual({
        grant_type: 'client_credentials',
        client_id: 'client-1',
        client_secret: 'test-secret',
        scope: `${API_BASE}/.default`,
      });
      expect(acquired).toEqual({
        token: expect.objectContaining({ accessToken: 'app-token', expiresIn: 3599 }),
        tokenEndpoint: TOKEN_URL,
        clientId: 'client-1',
        tenantId: TENANT,
        scopes: `${API_BASE}/.default`,
      });
    });

    it('should fail with the provider error on a bad secret', async () => {
      nock(AUTHORITY).post(TOKEN_PATH).reply(401, { error: 'invalid_client' });
      const flow = new ClientSecretFlow(tokenClient, endpoints);

      await expect(
        flow.acquire({ flow: 'ClientSecret', clientId: 'client-1', tenantId: TENANT, clientSecret: 'test-secret' })
      ).rejects.toThrow(TokenRequestError);
    });
  });

  describe('ClientCertificateFlow', () => {
    it('should authenticate with a signed assertion addressed to the token endpoint', async () => {
      mockTokenEndpoint();
      const now = Date.UTC(2024, 0, 1);
      const flow = new ClientCertificateFlow(tokenClient, endpoints, () => now);

      const acquired = await flow.acquire({
        flow: 'ClientCertificate',
        clientId: 'client-1',
        tenantId: TENANT,
        certificate: { certificate, privateKey },
        scopes: `${API_BASE}/.default`,
      });

      expect(form.grant_type).toBe('client_credentials');
      expect(form.client_assertion_type).toBe(JWT_BEARER_ASSERTION_TYPE);
      expect(form.client_secret).toBeUndefined();

      const assertion = decodeToken(form.client_assertion);
      expect(assertion.payload.aud).toBe(TOKEN_URL);
      expect(assertion.payload.iss).toBe('client-1');
      expect(assertion.payload.nbf).toBe(now / 1000);
      expect(acquired.token.accessToken).toBe('app-token');
    });

    it('should fail before any request when the key is missing', async () => {
      const scope = nock(AUTHORITY).post(TOKEN_PATH).reply(200, { access_token: 'app-token' });
      const flow = new ClientCertificateFlow(tokenClient, endpoints);

      await expect(
        flow.acquire({ flow: 'ClientCertificate', clientId: 'client-1', tenantId: TENANT, certificate: { certificate } })
      ).rejects.toThrow(MissingPrivateKeyError);
      expect(scope.isDone()).toBe(false);
    });
  });
});
