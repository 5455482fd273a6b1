// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ExecuteOptions {
  body?: unknown;
  apiVersion?: string;
  headers?: Record<string, string>; // Per-request overrides of the connection's headers
}

export interface ThrottleConfig {
  defaultRetryAfterSeconds: number;
}

export interface RequestExecutorConfig {
  baseUrl: string;
  defaultApiVersion: string;
  timeout?: number;
  throttle: ThrottleConfig;
}

export interface ApiErrorEnvelope {
  code?: string;
  message?: string;
}
