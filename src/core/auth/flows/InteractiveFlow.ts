// src/core/auth/flows/InteractiveFlow.ts

import { Issuer, generators } from 'openid-client';
import type { AcquiredToken } from './types';
import type { BrowserLauncher, InteractiveParams, PKCEChallenge } from '../types';
import type { AuthorityEndpoints } from '../endpoints';
import type { TokenEndpointClient } from '../TokenEndpointClient';
import type { Logger } from '../../../observability/Logger';
import { LoopbackReceiver } from '../LoopbackReceiver';
import { AuthorizationError, CsrfValidationError, errorMessage } from '../../../utils/errors';

export interface InteractiveFlowOptions {
  /** Bound on the browser round-trip; 0 waits indefinitely. */
  timeoutMs: number;
  openBrowser: BrowserLauncher;
}

/**
 * Authorization code grant with PKCE, redirected to a loopback listener.
 */
export class InteractiveFlow {
  constructor(
    private tokenClient: TokenEndpointClient,
    private endpoints: AuthorityEndpoints,
    private logger: Logger,
    private options: InteractiveFlowOptions
  ) {}

  async acquire(params: InteractiveParams): Promise<AcquiredToken> {
    const scopes = params.scopes ?? this.endpoints.delegatedScopes();
    const tokenEndpoint = this.endpoints.token(params.tenantId);
    const pkce = this.generatePKCE();
    const state = generators.state();

    const { code, redirectUri } = await this.authorize(params, scopes, state, pkce);

    const token = await this.tokenClient.requestToken(tokenEndpoint, {
      grant_type: 'authorization_code',
      client_id: params.clientId,
      code,
      redirect_uri: redirectUri,
      code_verifier: pkce.codeVerifier,
      scope: scopes,
    });

    return {
      token,
      tokenEndpoint,
      clientId: params.clientId,
      tenantId: params.tenantId,
      scopes,
    };
  }

  /**
   * Run the browser round-trip. The listener is released on every exit path.
   */
  private async authorize(
    params: InteractiveParams,
    scopes: string,
    state: string,
    pkce: PKCEChallenge
  ): Promise<{ code: string; redirectUri: string }> {
    const receiver = new LoopbackReceiver();

    try {
      await receiver.start();
      const redirectUri = receiver.redirectUri;

      const authUrl = this.createAuthUrl(params, scopes, redirectUri, state, pkce);
      this.logger.info('Opening browser for sign-in', { redirectUri, tenantId: params.tenantId });

      try {
        await this.options.openBrowser(authUrl);
      } catch (error: unknown) {
        this.logger.warn('Could not open a browser, open this URL manually', {
          url: authUrl,
          error: errorMessage(error),
        });
      }

      const redirect = await receiver.waitForRedirect(params.timeoutMs ?? this.options.timeoutMs);

      if (redirect.state !== state) {
        throw new CsrfValidationError();
      }
      if (redirect.error) {
        throw new AuthorizationError(redirect.error, redirect.errorDescription);
      }
      if (!redirect.code) {
        throw new AuthorizationError('missing_code', 'Redirect did not include an authorization code');
      }
      return { code: redirect.code, redirectUri };
    } finally {
      await receiver.close();
    }
  }

  private createAuthUrl(
    params: InteractiveParams,
    scopes: string,
    redirectUri: string,
    state: string,
    pkce: PKCEChallenge
  ): string {
    const issuer = new Issuer({
      issuer: this.endpoints.authorize(params.tenantId),
      authorization_endpoint: this.endpoints.authorize(params.tenantId),
      token_endpoint: this.endpoints.token(params.tenantId),
    });

    const client = new issuer.Client({
      client_id: params.clientId,
      redirect_uris: [redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: 'none',
    });

    return client.authorizationUrl({
      response_type: 'code',
      response_mode: 'query',
      redirect_uri: redirectUri,
      scope: scopes,
      state,
      code_challenge: pkce.codeChallenge,
      code_challenge_method: pkce.method,
      prompt: 'select_account',
    });
  }

  private generatePKCE(): PKCEChallenge {
    // 32 random bytes, base64url
    const codeVerifier = generators.codeVerifier(32);
    const codeChallenge = generators.codeChallenge(codeVerifier);
    return {
      codeVerifier,
      codeChallenge,
      method: 'S256',
    };
  }
}
