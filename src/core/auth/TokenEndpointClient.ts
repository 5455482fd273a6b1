// src/core/auth/TokenEndpointClient.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as https from 'https';
import type { NormalizedTokenResponse } from '../token/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { TokenRequestError, errorMessage } from '../../utils/errors';
import { isRecord, readNumber, readString } from '../../utils/guards';
import { parseBody } from '../../utils/body';
import { withTokenSpan } from '../../observability/tracing';

export type TokenExchangeResult =
  | { ok: true; token: NormalizedTokenResponse }
  | { ok: false; error: TokenRequestError };

export interface DeviceCodeResponse {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  expiresIn?: number;
  interval?: number;
  message?: string;
}

/**
 * All identity-provider token traffic goes through here. Only the grant type
 * and the endpoint are ever logged; form values may hold secrets.
 */
export class TokenEndpointClient {
  private axiosInstance: AxiosInstance;

  constructor(
    private logger: Logger,
    private metrics: MetricsCollector,
    timeout: number = 30000
  ) {
    this.axiosInstance = axios.create({
      timeout,
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  /**
   * Exchange a grant for tokens.
   *
   * @throws {TokenRequestError} On transport failure or a provider error envelope
   */
  async requestToken(endpoint: string, form: Record<string, string>): Promise<NormalizedTokenResponse> {
    const result = await this.exchange(endpoint, form);
    if (!result.ok) {
      throw result.error;
    }
    return result.token;
  }

  /**
   * Same exchange as requestToken, with failures returned instead of thrown.
   * Polling callers branch on the provider error code.
   */
  async exchange(endpoint: string, form: Record<string, string>): Promise<TokenExchangeResult> {
    const grantType = form.grant_type ?? 'unknown';

    return withTokenSpan('request', grantType, async () => {
      this.logger.debug('Token request', { grantType, endpoint });

      let body: unknown;
      try {
        body = await this.postForm(endpoint, form);
      } catch (error: unknown) {
        const failure = await this.transformError(error, endpoint, grantType);
        this.metrics.incrementCounter('token_requests_total', { grant_type: grantType, status: 'error' });
        return { ok: false, error: failure };
      }

      const token = normalizeTokenBody(await parseBody(body));
      if (!token) {
        this.metrics.incrementCounter('token_requests_total', { grant_type: grantType, status: 'error' });
        return {
          ok: false,
          error: new TokenRequestError('Token endpoint response did not contain an access token', {
            endpoint,
            grantType,
          }),
        };
      }

      this.metrics.incrementCounter('token_requests_total', { grant_type: grantType, status: 'success' });
      this.logger.debug('Token request succeeded', {
        grantType,
        endpoint,
        expiresIn: token.expiresIn,
        hasRefreshToken: token.refreshToken !== undefined,
      });
      return { ok: true, token };
    });
  }

  /**
   * Start a device authorization request.
   *
   * @throws {TokenRequestError} On transport failure or a provider error envelope
   */
  async requestDeviceCode(endpoint: string, form: Record<string, string>): Promise<DeviceCodeResponse> {
    let body: unknown;
    try {
      body = await this.postForm(endpoint, form);
    } catch (error: unknown) {
      throw await this.transformError(error, endpoint, 'device_code_request');
    }

    const parsed = await parseBody(body);
    const deviceCode = isRecord(parsed) ? readString(parsed, 'device_code') : undefined;
    const userCode = isRecord(parsed) ? readString(parsed, 'user_code') : undefined;
    const verificationUri = isRecord(parsed)
      ? readString(parsed, 'verification_uri') ?? readString(parsed, 'verification_url')
      : undefined;

    if (!isRecord(parsed) || !deviceCode || !userCode || !verificationUri) {
      throw new TokenRequestError('Device code response is incomplete', { endpoint });
    }

    return {
      deviceCode,
      userCode,
      verificationUri,
      expiresIn: readNumber(parsed, 'expires_in'),
      interval: readNumber(parsed, 'interval'),
      message: readString(parsed, 'message'),
    };
  }

  private async postForm(endpoint: string, form: Record<string, string>): Promise<unknown> {
    const response = await this.axiosInstance.post<unknown>(endpoint, new URLSearchParams(form).toString(), {
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
    });
    return response.data;
  }

  private async transformError(error: unknown, endpoint: string, grantType: string): Promise<TokenRequestError> {
    if (isAxiosError(error) && error.response) {
      const status = error.response.status;
      const envelope = await readErrorEnvelope(error.response.data);

      this.logger.debug('Token endpoint error response', {
        grantType,
        endpoint,
        status,
        errorCode: envelope?.error,
      });

      if (envelope) {
        const message = envelope.description
          ? `${envelope.error}: ${envelope.description}`
          : envelope.error;
        return new TokenRequestError(message, {
          errorCode: envelope.error,
          description: envelope.description,
          status,
          endpoint,
          grantType,
        });
      }
      return new TokenRequestError(`Token endpoint returned status ${status}`, { status, endpoint, grantType });
    }

    return new TokenRequestError(errorMessage(error), { endpoint, grantType });
  }
}

/**
 * Parse `{ error, error_description }` from a failed response body. The body may
 * arrive already parsed, as text, as a buffer, or as an unread stream.
 */
export async function readErrorEnvelope(
  data: unknown
): Promise<{ error: string; description?: string } | undefined> {
  const parsed = await parseBody(data);
  if (!isRecord(parsed)) return undefined;

  const error = readString(parsed, 'error');
  if (!error) return undefined;
  return { error, description: readString(parsed, 'error_description') };
}

function normalizeTokenBody(parsed: unknown): NormalizedTokenResponse | undefined {
  if (!isRecord(parsed)) return undefined;

  const accessToken = readString(parsed, 'access_token');
  if (!accessToken) return undefined;

  return {
    accessToken,
    tokenType: readString(parsed, 'token_type') ?? 'Bearer',
    expiresIn: readNumber(parsed, 'expires_in'),
    refreshToken: readString(parsed, 'refresh_token'),
    scope: readString(parsed, 'scope'),
    resource: readString(parsed, 'resource'),
  };
}
