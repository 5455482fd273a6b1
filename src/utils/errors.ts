// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Token codec / signer errors
export class MalformedTokenError extends SDKError {
  constructor(message: string = 'Token is not a decodable signed token', details?: Record<string, unknown>) {
    super(message, 'MALFORMED_TOKEN', details);
  }
}

export class MissingPrivateKeyError extends SDKError {
  constructor(
    message: string = 'Client certificate has no accessible private key',
    details?: Record<string, unknown>
  ) {
    super(message, 'MISSING_PRIVATE_KEY', details);
  }
}

// Token endpoint errors
export interface TokenRequestErrorDetails extends Record<string, unknown> {
  errorCode?: string;
  description?: string;
  status?: number;
}

export class TokenRequestError extends SDKError {
  readonly errorCode?: string;
  readonly description?: string;
  readonly status?: number;

  constructor(message: string, details: TokenRequestErrorDetails = {}) {
    super(message, 'TOKEN_REQUEST_FAILED', details);
    this.errorCode = details.errorCode;
    this.description = details.description;
    this.status = details.status;
  }
}

// Interactive flow errors
export class CsrfValidationError extends SDKError {
  constructor(
    message: string = 'State returned by the authorization server does not match the request',
    details?: Record<string, unknown>
  ) {
    super(message, 'CSRF_VALIDATION_FAILED', details);
  }
}

export class AuthorizationError extends SDKError {
  constructor(
    public errorCode: string,
    public description?: string,
    details?: Record<string, unknown>
  ) {
    super(
      description ? `Authorization failed: ${errorCode} - ${description}` : `Authorization failed: ${errorCode}`,
      'AUTHORIZATION_FAILED',
      { ...details, errorCode }
    );
  }
}

export class AuthorizationTimeoutError extends SDKError {
  constructor(timeoutMs: number, details?: Record<string, unknown>) {
    super(`No authorization redirect received within ${timeoutMs}ms`, 'AUTHORIZATION_TIMEOUT', {
      ...details,
      timeoutMs,
    });
  }
}

// Device code errors
export class DeviceCodeTimeoutError extends SDKError {
  constructor(expiresInSeconds: number, details?: Record<string, unknown>) {
    super(
      `Device code sign-in was not completed within ${expiresInSeconds} seconds`,
      'DEVICE_CODE_TIMEOUT',
      { ...details, expiresInSeconds }
    );
  }
}

export class DeviceCodeExpiredError extends SDKError {
  constructor(message: string = 'Device code expired before sign-in completed', details?: Record<string, unknown>) {
    super(message, 'DEVICE_CODE_EXPIRED', details);
  }
}

export class AccessDeniedError extends SDKError {
  constructor(message: string = 'User denied the authorization request', details?: Record<string, unknown>) {
    super(message, 'ACCESS_DENIED', details);
  }
}

// Managed identity errors
export class ManagedIdentityError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MANAGED_IDENTITY_FAILED', details);
  }
}

export class EnvironmentMismatchError extends ManagedIdentityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'ENVIRONMENT_MISMATCH';
  }
}

// Connection / API errors
export class NotConnectedError extends SDKError {
  constructor(message: string = 'Not connected. Call connect() first', details?: Record<string, unknown>) {
    super(message, 'NOT_CONNECTED', details);
  }
}

export class ApiRequestError extends SDKError {
  constructor(
    message: string,
    public status: number | undefined,
    public errorCode: string | undefined,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_REQUEST_FAILED', { ...details, status, errorCode });
  }
}

/**
 * Extract a readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
