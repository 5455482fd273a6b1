// src/core/auth/types.ts

import type { KeyObject } from 'crypto';

export type FlowType =
  | 'Interactive'
  | 'DeviceCode'
  | 'ClientSecret'
  | 'ClientCertificate'
  | 'ManagedIdentity'
  | 'Token';

/**
 * Certificate credential for the client-certificate flow.
 * `certificate` is PEM text or DER bytes; the private key stays in memory only.
 */
export interface ClientCertificate {
  certificate: string | Buffer;
  privateKey?: string | Buffer | KeyObject;
  passphrase?: string;
}

export interface DevicePrompt {
  userCode: string;
  verificationUri: string;
  message?: string;
  expiresIn: number;
}

export type BrowserLauncher = (url: string) => Promise<void>;

export interface InteractiveParams {
  flow: 'Interactive';
  clientId: string;
  tenantId?: string;
  scopes?: string;
  timeoutMs?: number;
}

export interface DeviceCodeParams {
  flow: 'DeviceCode';
  clientId: string;
  tenantId?: string;
  scopes?: string;
  onPrompt?: (prompt: DevicePrompt) => void;
}

export interface ClientSecretParams {
  flow: 'ClientSecret';
  clientId: string;
  tenantId: string;
  clientSecret: string;
  scopes?: string;
}

export interface ClientCertificateParams {
  flow: 'ClientCertificate';
  clientId: string;
  tenantId: string;
  certificate: ClientCertificate;
  scopes?: string;
}

export interface ManagedIdentityParams {
  flow: 'ManagedIdentity';
  /** Client id of a user-assigned identity; omit for the system-assigned one. */
  identityClientId?: string;
  resource?: string;
}

export interface TokenParams {
  flow: 'Token';
  accessToken: string;
}

export type ConnectParams =
  | InteractiveParams
  | DeviceCodeParams
  | ClientSecretParams
  | ClientCertificateParams
  | ManagedIdentityParams
  | TokenParams;

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  method: 'S256';
}

/**
 * Identity endpoint selected for a managed-identity connection.
 */
export interface ManagedIdentityEndpoint {
  kind: 'AppService' | 'InstanceMetadata';
  url: string;
}
