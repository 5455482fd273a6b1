// src/core/auth/flows/ManagedIdentityFlow.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import type { AcquiredToken } from './types';
import type { ManagedIdentityEndpoint, ManagedIdentityParams } from '../types';
import type { NormalizedTokenResponse } from '../../token/types';
import type { Logger } from '../../../observability/Logger';
import { readErrorEnvelope } from '../TokenEndpointClient';
import { EnvironmentMismatchError, ManagedIdentityError, errorMessage } from '../../../utils/errors';
import { isRecord, readNumber, readString } from '../../../utils/guards';

export const IMDS_ENDPOINT = 'http://169.254.169.254/metadata/identity/oauth2/token';
const IMDS_API_VERSION = '2018-02-01';
const APP_SERVICE_API_VERSION = '2019-08-01';

// Transport failures that mean no identity endpoint is listening here
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
]);
const UNREACHABLE_PATTERN = /timeout|timed out|not found|unreachable|refused/i;

export interface ManagedIdentityFlowOptions {
  env: Record<string, string | undefined>;
  timeoutMs: number;
  now: () => number;
}

/**
 * Token acquisition from the platform identity endpoint (App Service style,
 * IDENTITY_ENDPOINT + IDENTITY_HEADER) or from the instance metadata service.
 */
export class ManagedIdentityFlow {
  private axiosInstance: AxiosInstance;

  constructor(
    private defaultResource: string,
    private logger: Logger,
    private options: ManagedIdentityFlowOptions
  ) {
    this.axiosInstance = axios.create({ timeout: options.timeoutMs });
  }

  async acquire(params: ManagedIdentityParams): Promise<AcquiredToken> {
    const resource = params.resource ?? this.defaultResource;
    const endpoint = this.resolveEndpoint();
    const token = await this.requestFrom(endpoint.url, resource, params.identityClientId);

    return {
      token,
      tokenEndpoint: endpoint.url,
      clientId: params.identityClientId,
      scopes: resource,
    };
  }

  /**
   * Pick the identity endpoint for this environment.
   */
  resolveEndpoint(): ManagedIdentityEndpoint {
    const identityEndpoint = this.options.env.IDENTITY_ENDPOINT;
    if (identityEndpoint && this.options.env.IDENTITY_HEADER) {
      return { kind: 'AppService', url: identityEndpoint };
    }
    return { kind: 'InstanceMetadata', url: IMDS_ENDPOINT };
  }

  /**
   * Request a token from a given identity endpoint. Used directly on refresh
   * so the connection keeps talking to the endpoint it connected through.
   */
  async requestFrom(
    endpointUrl: string,
    resource: string,
    identityClientId?: string
  ): Promise<NormalizedTokenResponse> {
    const kind: ManagedIdentityEndpoint['kind'] = endpointUrl === IMDS_ENDPOINT ? 'InstanceMetadata' : 'AppService';

    const query: Record<string, string> = {
      'api-version': kind === 'AppService' ? APP_SERVICE_API_VERSION : IMDS_API_VERSION,
      resource,
    };
    if (identityClientId) {
      query.client_id = identityClientId;
    }

    const headers: Record<string, string> =
      kind === 'AppService'
        ? { 'X-IDENTITY-HEADER': this.options.env.IDENTITY_HEADER ?? '' }
        : { Metadata: 'true' };

    this.logger.debug('Managed identity token request', {
      kind,
      endpoint: endpointUrl,
      userAssigned: identityClientId !== undefined,
    });

    let data: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>(endpointUrl, { params: query, headers });
      data = response.data;
    } catch (error: unknown) {
      throw await this.transformError(error, kind);
    }

    return this.normalize(data, kind);
  }

  private normalize(data: unknown, kind: ManagedIdentityEndpoint['kind']): NormalizedTokenResponse {
    const accessToken = isRecord(data) ? readString(data, 'access_token') : undefined;
    if (!isRecord(data) || !accessToken) {
      throw new ManagedIdentityError('Managed identity response did not contain an access token', { kind });
    }

    let expiresIn = readNumber(data, 'expires_in');
    if (expiresIn === undefined) {
      expiresIn = this.secondsUntil(data.expires_on);
    }

    return {
      accessToken,
      tokenType: readString(data, 'token_type') ?? 'Bearer',
      expiresIn,
      resource: readString(data, 'resource'),
    };
  }

  /**
   * expires_on arrives either as epoch seconds (number or numeric string) or as a date string.
   */
  private secondsUntil(expiresOn: unknown): number | undefined {
    let expiresAtMs: number | undefined;
    if (typeof expiresOn === 'number') {
      expiresAtMs = expiresOn * 1000;
    } else if (typeof expiresOn === 'string' && expiresOn.trim() !== '') {
      const epoch = Number(expiresOn);
      expiresAtMs = Number.isFinite(epoch) ? epoch * 1000 : Date.parse(expiresOn);
    }

    if (expiresAtMs === undefined || Number.isNaN(expiresAtMs)) {
      return undefined;
    }
    return Math.max(0, Math.floor((expiresAtMs - this.options.now()) / 1000));
  }

  private async transformError(error: unknown, kind: ManagedIdentityEndpoint['kind']): Promise<Error> {
    if (isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const envelope = await readErrorEnvelope(error.response.data);
        const detail = envelope?.description ?? envelope?.error ?? `status ${status}`;

        if (status === 404) {
          return new EnvironmentMismatchError(
            `Managed identity endpoint not found (${detail}). This does not look like a managed-identity environment`,
            { kind, status }
          );
        }
        return new ManagedIdentityError(`Managed identity request failed: ${detail}`, {
          kind,
          status,
          errorCode: envelope?.error,
        });
      }

      if ((error.code && UNREACHABLE_CODES.has(error.code)) || UNREACHABLE_PATTERN.test(error.message)) {
        return new EnvironmentMismatchError(
          `Managed identity endpoint is not reachable (${error.code ?? error.message}). This does not look like a managed-identity environment`,
          { kind, errorCode: error.code }
        );
      }
    }

    return new ManagedIdentityError(`Managed identity request failed: ${errorMessage(error)}`, { kind });
  }
}
