// src/core/auth/flows/ClientSecretFlow.ts

import type { AcquiredToken } from './types';
import type { ClientSecretParams } from '../types';
import type { AuthorityEndpoints } from '../endpoints';
import type { TokenEndpointClient } from '../TokenEndpointClient';

export class ClientSecretFlow {
  constructor(
    private tokenClient: TokenEndpointClient,
    private endpoints: AuthorityEndpoints
  ) {}

  async acquire(params: ClientSecretParams): Promise<AcquiredToken> {
    const scopes = params.scopes ?? this.endpoints.applicationScopes();
    const tokenEndpoint = this.endpoints.token(params.tenantId);

    const token = await this.tokenClient.requestToken(tokenEndpoint, {
      grant_type: 'client_credentials',
      client_id: params.clientId,
      client_secret: params.clientSecret,
      scope: scopes,
    });

    return { token, tokenEndpoint, clientId: params.clientId, tenantId: params.tenantId, scopes };
  }
}
