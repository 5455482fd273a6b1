// src/core/auth/flows/ClientCertificateFlow.ts

import type { AcquiredToken } from './types';
import type { ClientCertificateParams } from '../types';
import type { AuthorityEndpoints } from '../endpoints';
import type { TokenEndpointClient } from '../TokenEndpointClient';
import { buildClientAssertion } from '../AssertionSigner';

export const JWT_BEARER_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/**
 * Client credentials grant authenticated by a certificate-signed assertion.
 * A fresh assertion is signed for every exchange.
 */
export class ClientCertificateFlow {
  constructor(
    private tokenClient: TokenEndpointClient,
    private endpoints: AuthorityEndpoints,
    private now: () => number = Date.now
  ) {}

  async acquire(params: ClientCertificateParams): Promise<AcquiredToken> {
    const scopes = params.scopes ?? this.endpoints.applicationScopes();
    const tokenEndpoint = this.endpoints.token(params.tenantId);

    const clientAssertion = buildClientAssertion(
      params.clientId,
      tokenEndpoint,
      params.certificate,
      undefined,
      this.now
    );

    const token = await this.tokenClient.requestToken(tokenEndpoint, {
      grant_type: 'client_credentials',
      client_id: params.clientId,
      client_assertion_type: JWT_BEARER_ASSERTION_TYPE,
      client_assertion: clientAssertion,
      scope: scopes,
    });

    return { token, tokenEndpoint, clientId: params.clientId, tenantId: params.tenantId, scopes };
  }
}
