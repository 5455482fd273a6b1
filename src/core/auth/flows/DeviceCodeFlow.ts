// src/core/auth/flows/DeviceCodeFlow.ts

import type { AcquiredToken, Sleep } from './types';
import type { DeviceCodeParams, DevicePrompt } from '../types';
import type { AuthorityEndpoints } from '../endpoints';
import type { TokenEndpointClient } from '../TokenEndpointClient';
import type { NormalizedTokenResponse } from '../../token/types';
import type { Logger } from '../../../observability/Logger';
import {
  AccessDeniedError,
  DeviceCodeExpiredError,
  DeviceCodeTimeoutError,
  SDKError,
} from '../../../utils/errors';

export const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

const SLOW_DOWN_INCREMENT_MS = 5000;

export interface DeviceCodeFlowOptions {
  defaultIntervalSeconds: number;
  defaultExpiresInSeconds: number;
  sleep: Sleep;
  now: () => number;
}

export type PollResult =
  | { kind: 'Pending' }
  | { kind: 'SlowDown' }
  | { kind: 'Success'; token: NormalizedTokenResponse }
  | { kind: 'Fatal'; error: SDKError };

/**
 * Device authorization grant: show a user code, then poll until the user
 * finishes signing in elsewhere or the code expires.
 */
export class DeviceCodeFlow {
  constructor(
    private tokenClient: TokenEndpointClient,
    private endpoints: AuthorityEndpoints,
    private logger: Logger,
    private options: DeviceCodeFlowOptions
  ) {}

  async acquire(params: DeviceCodeParams): Promise<AcquiredToken> {
    const scopes = params.scopes ?? this.endpoints.delegatedScopes();
    const tokenEndpoint = this.endpoints.token(params.tenantId);

    const device = await this.tokenClient.requestDeviceCode(this.endpoints.deviceCode(params.tenantId), {
      client_id: params.clientId,
      scope: scopes,
    });

    const expiresIn = device.expiresIn ?? this.options.defaultExpiresInSeconds;
    const prompt: DevicePrompt = {
      userCode: device.userCode,
      verificationUri: device.verificationUri,
      message: device.message,
      expiresIn,
    };
    if (params.onPrompt) {
      params.onPrompt(prompt);
    } else {
      this.logger.info(
        device.message ?? `To sign in, open ${device.verificationUri} and enter the code ${device.userCode}`,
        { userCode: device.userCode, verificationUri: device.verificationUri }
      );
    }

    let intervalMs = (device.interval ?? this.options.defaultIntervalSeconds) * 1000;
    const deadline = this.options.now() + expiresIn * 1000;

    while (this.options.now() < deadline) {
      await this.options.sleep(intervalMs);

      const result = await this.poll(tokenEndpoint, params.clientId, device.deviceCode);
      switch (result.kind) {
        case 'Pending':
          break;
        case 'SlowDown':
          intervalMs += SLOW_DOWN_INCREMENT_MS;
          this.logger.debug('Device code polling slowed down', { intervalMs });
          break;
        case 'Success':
          return {
            token: result.token,
            tokenEndpoint,
            clientId: params.clientId,
            tenantId: params.tenantId,
            scopes,
          };
        case 'Fatal':
          throw result.error;
      }
    }

    throw new DeviceCodeTimeoutError(expiresIn);
  }

  async poll(tokenEndpoint: string, clientId: string, deviceCode: string): Promise<PollResult> {
    const result = await this.tokenClient.exchange(tokenEndpoint, {
      grant_type: DEVICE_CODE_GRANT,
      client_id: clientId,
      device_code: deviceCode,
    });

    if (result.ok) {
      return { kind: 'Success', token: result.token };
    }

    switch (result.error.errorCode) {
      case 'authorization_pending':
        return { kind: 'Pending' };
      case 'slow_down':
        return { kind: 'SlowDown' };
      case 'expired_token':
        return { kind: 'Fatal', error: new DeviceCodeExpiredError() };
      case 'access_denied':
      case 'authorization_declined':
        return { kind: 'Fatal', error: new AccessDeniedError() };
      default:
        return { kind: 'Fatal', error: result.error };
    }
  }
}
