// src/index.ts

export { GraphConnectSDK } from './sdk';
export type { SDKDependencies } from './sdk';
export type { InitConfig, ResolvedConfig } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe, validateConnectParams } from './config/ConfigValidator';

// Building blocks
export { decodeToken, extractContext, encodeToken } from './core/token/TokenCodec';
export { buildClientAssertion, computeThumbprint } from './core/auth/AssertionSigner';
export { TokenEndpointClient } from './core/auth/TokenEndpointClient';
export { AuthorityEndpoints, CLOUDS } from './core/auth/endpoints';
export { ConnectionManager } from './core/connection/ConnectionManager';
export { RequestExecutor } from './core/http/RequestExecutor';
export { Logger } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';

export type { DecodedToken, TokenContext, TokenType, NormalizedTokenResponse } from './core/token/types';
export type {
  FlowType,
  ConnectParams,
  InteractiveParams,
  DeviceCodeParams,
  ClientSecretParams,
  ClientCertificateParams,
  ManagedIdentityParams,
  TokenParams,
  ClientCertificate,
  DevicePrompt,
  BrowserLauncher,
} from './core/auth/types';
export type { CloudName } from './core/auth/endpoints';
export type { ConnectionState, ConnectionSummary, RefreshOutcome } from './core/connection/types';
export type { HttpMethod, ExecuteOptions } from './core/http/types';
export type { LoggerConfig } from './observability/Logger';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  SDKError,
  ConfigError,
  MalformedTokenError,
  MissingPrivateKeyError,
  TokenRequestError,
  CsrfValidationError,
  AuthorizationError,
  AuthorizationTimeoutError,
  DeviceCodeTimeoutError,
  DeviceCodeExpiredError,
  AccessDeniedError,
  ManagedIdentityError,
  EnvironmentMismatchError,
  NotConnectedError,
  ApiRequestError,
} from './utils/errors';
