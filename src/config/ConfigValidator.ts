// src/config/ConfigValidator.ts

import { z } from 'zod';
import { KeyObject } from 'crypto';
import type { ConnectParams } from '../core/auth/types';
import { ConfigError } from '../utils/errors';

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  cloud: z
    .enum(['Global', 'USGov', 'USGovDoD', 'China'], {
      errorMap: () => ({ message: "Cloud must be 'Global', 'USGov', 'USGovDoD', or 'China'" }),
    })
    .default('Global'),
  authorityHost: z.string().url().optional(),
  apiBaseUrl: z.string().url().optional(),
  defaultApiVersion: z.string().min(1).default('v1.0'),
  refreshThresholdMinutes: z.number().min(1).max(60).default(10),
  http: z
    .object({
      timeout: z.number().positive().default(30000),
    })
    .default({}),
  throttle: z
    .object({
      defaultRetryAfterSeconds: z.number().nonnegative().default(300),
    })
    .default({}),
  interactive: z
    .object({
      // 0 waits for the redirect indefinitely
      timeoutMs: z.number().int().nonnegative().default(300000),
    })
    .default({}),
  deviceCode: z
    .object({
      defaultIntervalSeconds: z.number().positive().default(5),
      defaultExpiresInSeconds: z.number().positive().default(900),
    })
    .default({}),
  managedIdentity: z
    .object({
      timeoutMs: z.number().positive().default(5000),
    })
    .default({}),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type InitConfig = z.input<typeof InitConfigSchema>;
export type ResolvedConfig = z.output<typeof InitConfigSchema>;

const nonEmpty = z.string().min(1);

const CertificateSchema = z.object({
  certificate: z.union([nonEmpty, z.instanceof(Buffer)]),
  privateKey: z
    .union([nonEmpty, z.instanceof(Buffer), z.custom<KeyObject>((value) => value instanceof KeyObject)])
    .optional(),
  passphrase: z.string().optional(),
});

// Per-flow connect parameters, discriminated on `flow`
export const ConnectParamsSchema = z.discriminatedUnion('flow', [
  z.object({
    flow: z.literal('Interactive'),
    clientId: nonEmpty,
    tenantId: nonEmpty.optional(),
    scopes: nonEmpty.optional(),
    timeoutMs: z.number().int().nonnegative().optional(),
  }),
  z.object({
    flow: z.literal('DeviceCode'),
    clientId: nonEmpty,
    tenantId: nonEmpty.optional(),
    scopes: nonEmpty.optional(),
    onPrompt: z.custom<(prompt: unknown) => void>((value) => typeof value === 'function').optional(),
  }),
  z.object({
    flow: z.literal('ClientSecret'),
    clientId: nonEmpty,
    tenantId: nonEmpty,
    clientSecret: nonEmpty,
    scopes: nonEmpty.optional(),
  }),
  z.object({
    flow: z.literal('ClientCertificate'),
    clientId: nonEmpty,
    tenantId: nonEmpty,
    certificate: CertificateSchema,
    scopes: nonEmpty.optional(),
  }),
  z.object({
    flow: z.literal('ManagedIdentity'),
    identityClientId: nonEmpty.optional(),
    resource: nonEmpty.optional(),
  }),
  z.object({
    flow: z.literal('Token'),
    accessToken: nonEmpty,
  }),
]);

/**
 * Validate SDK initialization configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedConfig {
  return InitConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Check connect parameters before any network call.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function validateConnectParams(params: ConnectParams): void {
  const result = ConnectParamsSchema.safeParse(params);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigError(`Invalid connect parameters: ${errors.join('; ')}`, { errors });
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}
