// src/core/connection/types.ts

import type { ClientCertificate, FlowType } from '../auth/types';
import type { TokenContext } from '../token/types';

export interface ConnectionState {
  token: string;
  tokenExpiry: Date;
  refreshToken?: string;
  flowType: FlowType;
  tokenEndpoint?: string;
  clientId?: string;
  tenantId?: string;
  scopes?: string;
  clientSecret?: string;
  clientCertificate?: ClientCertificate;
  context?: TokenContext;
}

export type RefreshOutcome =
  | { status: 'Refreshed' }
  | { status: 'Skipped' }
  | { status: 'Warned'; warning: string }
  | { status: 'FailedKeptOld'; warning: string; error: Error };

export interface ConnectionSummary {
  flowType: FlowType;
  identity: string;
  tokenType?: TokenContext['tokenType'];
  tenantId?: string;
  scopes?: string;
  expiresAt: Date;
  minutesRemaining: number;
}
