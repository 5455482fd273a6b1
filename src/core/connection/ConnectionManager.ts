// src/core/connection/ConnectionManager.ts

import type { ConnectionState, ConnectionSummary, RefreshOutcome } from './types';
import type { AcquiredToken } from '../auth/flows/types';
import type { ConnectParams } from '../auth/types';
import type { InteractiveFlow } from '../auth/flows/InteractiveFlow';
import type { DeviceCodeFlow } from '../auth/flows/DeviceCodeFlow';
import type { ClientSecretFlow } from '../auth/flows/ClientSecretFlow';
import type { ClientCertificateFlow } from '../auth/flows/ClientCertificateFlow';
import type { ManagedIdentityFlow } from '../auth/flows/ManagedIdentityFlow';
import type { TokenEndpointClient } from '../auth/TokenEndpointClient';
import type { NormalizedTokenResponse, TokenContext } from '../token/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { AuthHeaderSet } from './AuthHeaderSet';
import { extractContext } from '../token/TokenCodec';
import { ConfigError, NotConnectedError, errorMessage } from '../../utils/errors';
import { withTokenSpan } from '../../observability/tracing';

// Tokens are treated as stale this long before the provider's expiry
export const EXPIRY_SAFETY_MARGIN_SECONDS = 60;
export const FALLBACK_LIFETIME_SECONDS = 3600;

export interface ConnectionFlows {
  interactive: InteractiveFlow;
  deviceCode: DeviceCodeFlow;
  clientSecret: ClientSecretFlow;
  clientCertificate: ClientCertificateFlow;
  managedIdentity: ManagedIdentityFlow;
}

export interface ConnectionManagerOptions {
  refreshThresholdMinutes?: number;
  now?: () => number;
  decodeContext?: (token: string) => TokenContext;
}

/**
 * Owns the single live connection and its request headers. State is only
 * published once a flow has fully succeeded, and refreshes are single-flight.
 */
export class ConnectionManager {
  private state?: ConnectionState;
  private headers?: AuthHeaderSet;
  private refreshInFlight?: Promise<RefreshOutcome>;
  private readonly refreshThresholdMinutes: number;
  private readonly now: () => number;
  private readonly decodeContext: (token: string) => TokenContext;

  constructor(
    private flows: ConnectionFlows,
    private tokenClient: TokenEndpointClient,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: ConnectionManagerOptions = {}
  ) {
    this.refreshThresholdMinutes = options.refreshThresholdMinutes ?? 10;
    this.now = options.now ?? Date.now;
    this.decodeContext = options.decodeContext ?? extractContext;
  }

  /**
   * Acquire a token through the selected flow and publish the connection.
   * A token that cannot be decoded still connects; only its context is missing.
   */
  async connect(params: ConnectParams): Promise<void> {
    await withTokenSpan('connect', params.flow, async () => {
      const acquired = await this.acquire(params);
      const issuedAt = this.now();
      const context = this.tryDecode(acquired.token.accessToken);

      const state: ConnectionState = {
        token: acquired.token.accessToken,
        tokenExpiry: this.computeExpiry(acquired.token.expiresIn, context, issuedAt),
        refreshToken: acquired.token.refreshToken,
        flowType: params.flow,
        tokenEndpoint: acquired.tokenEndpoint,
        clientId: acquired.clientId,
        tenantId: acquired.tenantId,
        scopes: acquired.scopes,
        clientSecret: params.flow === 'ClientSecret' ? params.clientSecret : undefined,
        clientCertificate: params.flow === 'ClientCertificate' ? params.certificate : undefined,
        context,
      };

      this.state = state;
      this.headers = new AuthHeaderSet(state.token);

      this.logger.info('Connected', {
        flowType: state.flowType,
        identity: context?.identity,
        tenantId: context?.tenantId ?? state.tenantId,
        tokenExpiry: state.tokenExpiry.toISOString(),
      });
    });
  }

  /**
   * Refresh the token when it expires within the threshold. Failures never
   * throw: the current token is kept and a warning is returned.
   */
  async refreshIfNeeded(thresholdMinutes: number = this.refreshThresholdMinutes): Promise<RefreshOutcome> {
    const state = this.state;
    if (!state) {
      return { status: 'Skipped' };
    }

    const remainingMinutes = (state.tokenExpiry.getTime() - this.now()) / 60000;
    if (remainingMinutes > thresholdMinutes) {
      return { status: 'Skipped' };
    }

    if (this.refreshInFlight) {
      this.logger.debug('Refresh already in progress, waiting', { flowType: state.flowType });
      return this.refreshInFlight;
    }

    const refresh = this.refresh(state, remainingMinutes);
    this.refreshInFlight = refresh;
    try {
      return await refresh;
    } finally {
      this.refreshInFlight = undefined;
    }
  }

  /**
   * Drop the connection and wipe the credentials it held. Safe to repeat.
   */
  disconnect(): void {
    const state = this.state;
    if (state) {
      state.token = '';
      state.refreshToken = undefined;
      state.clientSecret = undefined;
      state.clientCertificate = undefined;
      state.tokenEndpoint = undefined;
      state.clientId = undefined;
      state.tenantId = undefined;
      state.scopes = undefined;
      state.context = undefined;
      this.logger.info('Disconnected', { flowType: state.flowType });
    }
    this.state = undefined;
    this.headers = undefined;
  }

  isConnected(): boolean {
    return this.state !== undefined;
  }

  /**
   * Snapshot of the connection. Mutating it does not affect the live state.
   */
  getState(): ConnectionState | undefined {
    const state = this.state;
    if (!state) return undefined;
    return {
      ...state,
      tokenExpiry: new Date(state.tokenExpiry.getTime()),
      context: state.context && copyContext(state.context),
    };
  }

  currentHeaders(): Record<string, string> | undefined {
    return this.headers?.toRecord();
  }

  getContext(): TokenContext | undefined {
    return this.state?.context && copyContext(this.state.context);
  }

  describeConnection(): ConnectionSummary | undefined {
    const state = this.state;
    if (!state) return undefined;

    return {
      flowType: state.flowType,
      identity: state.context?.identity ?? 'Unknown',
      tokenType: state.context?.tokenType,
      tenantId: state.context?.tenantId ?? state.tenantId,
      scopes: state.context?.scopes ?? state.scopes,
      expiresAt: state.tokenExpiry,
      minutesRemaining: Math.floor((state.tokenExpiry.getTime() - this.now()) / 60000),
    };
  }

  setHeader(name: string, value: string): void {
    this.requireHeaders().set(name, value);
  }

  removeHeader(name: string): boolean {
    return this.requireHeaders().remove(name);
  }

  private requireHeaders(): AuthHeaderSet {
    if (!this.headers) {
      throw new NotConnectedError();
    }
    return this.headers;
  }

  private async acquire(params: ConnectParams): Promise<AcquiredToken> {
    switch (params.flow) {
      case 'Interactive':
        return this.flows.interactive.acquire(params);
      case 'DeviceCode':
        return this.flows.deviceCode.acquire(params);
      case 'ClientSecret':
        return this.flows.clientSecret.acquire(params);
      case 'ClientCertificate':
        return this.flows.clientCertificate.acquire(params);
      case 'ManagedIdentity':
        return this.flows.managedIdentity.acquire(params);
      case 'Token':
        return { token: { accessToken: params.accessToken, tokenType: 'Bearer' } };
    }
  }

  private async refresh(state: ConnectionState, remainingMinutes: number): Promise<RefreshOutcome> {
    if (state.flowType === 'Token') {
      const warning = 'Token supplied at connect cannot be refreshed; continuing with the current token';
      this.logger.warn(warning, { minutesRemaining: Math.floor(remainingMinutes) });
      this.metrics.incrementCounter('token_refresh_total', { flow: state.flowType, outcome: 'warned' });
      return { status: 'Warned', warning };
    }

    if ((state.flowType === 'Interactive' || state.flowType === 'DeviceCode') && !state.refreshToken) {
      const warning = 'No refresh token available; reconnect before the current token expires';
      this.logger.warn(warning, { flowType: state.flowType, minutesRemaining: Math.floor(remainingMinutes) });
      this.metrics.incrementCounter('token_refresh_total', { flow: state.flowType, outcome: 'warned' });
      return { status: 'Warned', warning };
    }

    this.logger.info('Refreshing token', { flowType: state.flowType, minutesRemaining: Math.floor(remainingMinutes) });

    let token: NormalizedTokenResponse;
    try {
      token = await withTokenSpan('refresh', state.flowType, () => this.reacquire(state));
    } catch (error: unknown) {
      const warning = `Token refresh failed, continuing with the current token: ${errorMessage(error)}`;
      this.logger.warn('Token refresh failed, continuing with the current token', {
        flowType: state.flowType,
        error: errorMessage(error),
      });
      this.metrics.incrementCounter('token_refresh_total', { flow: state.flowType, outcome: 'failed' });
      return {
        status: 'FailedKeptOld',
        warning,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }

    // Disconnected or reconnected while the request was in flight
    if (this.state !== state || !this.headers) {
      return { status: 'Skipped' };
    }

    const issuedAt = this.now();
    const context = this.tryDecode(token.accessToken);
    state.token = token.accessToken;
    state.tokenExpiry = this.computeExpiry(token.expiresIn, context, issuedAt);
    state.refreshToken = token.refreshToken ?? state.refreshToken;
    state.context = context;
    this.headers.setToken(state.token);

    this.metrics.incrementCounter('token_refresh_total', { flow: state.flowType, outcome: 'refreshed' });
    this.logger.info('Token refreshed', {
      flowType: state.flowType,
      tokenExpiry: state.tokenExpiry.toISOString(),
    });
    return { status: 'Refreshed' };
  }

  private async reacquire(state: ConnectionState): Promise<NormalizedTokenResponse> {
    switch (state.flowType) {
      case 'Interactive':
      case 'DeviceCode':
        return this.tokenClient.requestToken(requireField(state.tokenEndpoint, 'tokenEndpoint'), {
          grant_type: 'refresh_token',
          client_id: requireField(state.clientId, 'clientId'),
          refresh_token: requireField(state.refreshToken, 'refreshToken'),
          ...(state.scopes ? { scope: state.scopes } : {}),
        });
      case 'ClientSecret': {
        const acquired = await this.flows.clientSecret.acquire({
          flow: 'ClientSecret',
          clientId: requireField(state.clientId, 'clientId'),
          tenantId: requireField(state.tenantId, 'tenantId'),
          clientSecret: requireField(state.clientSecret, 'clientSecret'),
          scopes: state.scopes,
        });
        return acquired.token;
      }
      case 'ClientCertificate': {
        const acquired = await this.flows.clientCertificate.acquire({
          flow: 'ClientCertificate',
          clientId: requireField(state.clientId, 'clientId'),
          tenantId: requireField(state.tenantId, 'tenantId'),
          certificate: requireField(state.clientCertificate, 'clientCertificate'),
          scopes: state.scopes,
        });
        return acquired.token;
      }
      case 'ManagedIdentity':
        return this.flows.managedIdentity.requestFrom(
          requireField(state.tokenEndpoint, 'tokenEndpoint'),
          requireField(state.scopes, 'scopes'),
          state.clientId
        );
      case 'Token':
        throw new ConfigError('A supplied token cannot be refreshed');
    }
  }

  private computeExpiry(expiresIn: number | undefined, context: TokenContext | undefined, issuedAt: number): Date {
    if (expiresIn !== undefined) {
      return new Date(issuedAt + (expiresIn - EXPIRY_SAFETY_MARGIN_SECONDS) * 1000);
    }
    if (context?.expiresAt) {
      return new Date(context.expiresAt.getTime() - EXPIRY_SAFETY_MARGIN_SECONDS * 1000);
    }
    return new Date(issuedAt + FALLBACK_LIFETIME_SECONDS * 1000);
  }

  private tryDecode(token: string): TokenContext | undefined {
    try {
      return this.decodeContext(token);
    } catch (error: unknown) {
      this.logger.debug('Token could not be decoded, context unavailable', { error: errorMessage(error) });
      return undefined;
    }
  }
}

function requireField<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new ConfigError(`Connection is missing ${field} needed for refresh`);
  }
  return value;
}

function copyContext(context: TokenContext): TokenContext {
  return {
    ...context,
    issuedAt: context.issuedAt && new Date(context.issuedAt.getTime()),
    expiresAt: context.expiresAt && new Date(context.expiresAt.getTime()),
  };
}
