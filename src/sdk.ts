// src/sdk.ts

import type { BrowserLauncher, ConnectParams } from './core/auth/types';
import type { Sleep } from './core/auth/flows/types';
import type { ExecuteOptions, HttpMethod } from './core/http/types';
import type { ConnectionSummary, RefreshOutcome } from './core/connection/types';
import type { TokenContext } from './core/token/types';
import { AuthorityEndpoints, CLOUDS } from './core/auth/endpoints';
import { TokenEndpointClient } from './core/auth/TokenEndpointClient';
import { InteractiveFlow } from './core/auth/flows/InteractiveFlow';
import { DeviceCodeFlow } from './core/auth/flows/DeviceCodeFlow';
import { ClientSecretFlow } from './core/auth/flows/ClientSecretFlow';
import { ClientCertificateFlow } from './core/auth/flows/ClientCertificateFlow';
import { ManagedIdentityFlow } from './core/auth/flows/ManagedIdentityFlow';
import { defaultSleep } from './core/auth/flows/types';
import { openInBrowser } from './core/auth/browser';
import { ConnectionManager } from './core/connection/ConnectionManager';
import { RequestExecutor } from './core/http/RequestExecutor';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, validateConnectParams } from './config/ConfigValidator';
import type { InitConfig, ResolvedConfig } from './config/ConfigValidator';

/**
 * Replaceable collaborators. Defaults are the real clock, timers, browser
 * and process environment.
 */
export interface SDKDependencies {
  now?: () => number;
  sleep?: Sleep;
  openBrowser?: BrowserLauncher;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export class GraphConnectSDK {
  private connection: ConnectionManager;
  private executor: RequestExecutor;
  private logger: Logger;
  private metrics: MetricsCollector;

  private constructor(config: ResolvedConfig, deps: SDKDependencies) {
    // Build ALL dependencies FIRST
    const logger = deps.logger ?? new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const now = deps.now ?? Date.now;
    const sleep = deps.sleep ?? defaultSleep;

    const cloud = CLOUDS[config.cloud];
    const apiBaseUrl = (config.apiBaseUrl ?? cloud.apiBaseUrl).replace(/\/+$/, '');
    const endpoints = new AuthorityEndpoints(config.authorityHost ?? cloud.authorityHost, apiBaseUrl);
    const tokenClient = new TokenEndpointClient(logger, metrics, config.http.timeout);

    const flows = {
      interactive: new InteractiveFlow(tokenClient, endpoints, logger, {
        timeoutMs: config.interactive.timeoutMs,
        openBrowser: deps.openBrowser ?? openInBrowser,
      }),
      deviceCode: new DeviceCodeFlow(tokenClient, endpoints, logger, {
        defaultIntervalSeconds: config.deviceCode.defaultIntervalSeconds,
        defaultExpiresInSeconds: config.deviceCode.defaultExpiresInSeconds,
        sleep,
        now,
      }),
      clientSecret: new ClientSecretFlow(tokenClient, endpoints),
      clientCertificate: new ClientCertificateFlow(tokenClient, endpoints, now),
      managedIdentity: new ManagedIdentityFlow(apiBaseUrl, logger, {
        env: deps.env ?? process.env,
        timeoutMs: config.managedIdentity.timeoutMs,
        now,
      }),
    };

    this.logger = logger;
    this.metrics = metrics;
    this.connection = new ConnectionManager(flows, tokenClient, logger, metrics, {
      refreshThresholdMinutes: config.refreshThresholdMinutes,
      now,
    });
    this.executor = new RequestExecutor(
      this.connection,
      {
        baseUrl: apiBaseUrl,
        defaultApiVersion: config.defaultApiVersion,
        timeout: config.http.timeout,
        throttle: config.throttle,
      },
      logger,
      metrics,
      sleep
    );
  }

  /**
   * Initialize the SDK
   *
   * @param config - Cloud selection, timeouts and logging; every field has a default
   * @param deps - Optional replacements for clock, sleep, browser launcher and environment
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const sdk = await GraphConnectSDK.init({ cloud: 'Global' });
   * await sdk.connect({ flow: 'DeviceCode', clientId: 'your-client-id', tenantId: 'your-tenant-id', onPrompt: console.log });
   * const users = await sdk.get('users');
   * ```
   */
  static async init(config: InitConfig = {}, deps: SDKDependencies = {}): Promise<GraphConnectSDK> {
    // Validate configuration (fail-fast with clear errors)
    const validatedConfig = validateConfig(config);

    const sdk = new GraphConnectSDK(validatedConfig, deps);
    sdk.logger.info('SDK initialized', { cloud: validatedConfig.cloud });
    return sdk;
  }

  /**
   * Establish the connection through one of the supported flows. Nothing is
   * kept from a failed attempt; a previous connection stays in place.
   *
   * @throws {ConfigError} If the parameters are invalid for the flow
   *
   * @example
   * ```typescript
   * await sdk.connect({
   *   flow: 'ClientSecret',
   *   clientId: 'your-client-id',
   *   tenantId: 'your-tenant-id',
   *   clientSecret: 'your-client-secret',
   * });
   * ```
   */
  async connect(params: ConnectParams): Promise<void> {
    validateConnectParams(params);
    await this.connection.connect(params);
  }

  disconnect(): void {
    this.connection.disconnect();
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  /**
   * Call the API, following paging links. Reads return whatever was collected
   * before an error; writes throw.
   *
   * @throws {NotConnectedError} Without a connection
   * @throws {ApiRequestError} When a write fails
   */
  async execute(method: HttpMethod, resource: string, options?: ExecuteOptions): Promise<unknown[]> {
    return this.executor.execute(method, resource, options);
  }

  async get(resource: string, options?: Omit<ExecuteOptions, 'body'>): Promise<unknown[]> {
    return this.execute('GET', resource, options);
  }

  async post(resource: string, body?: unknown, options?: Omit<ExecuteOptions, 'body'>): Promise<unknown[]> {
    return this.execute('POST', resource, { ...options, body });
  }

  async patch(resource: string, body?: unknown, options?: Omit<ExecuteOptions, 'body'>): Promise<unknown[]> {
    return this.execute('PATCH', resource, { ...options, body });
  }

  async put(resource: string, body?: unknown, options?: Omit<ExecuteOptions, 'body'>): Promise<unknown[]> {
    return this.execute('PUT', resource, { ...options, body });
  }

  async delete(resource: string, options?: Omit<ExecuteOptions, 'body'>): Promise<unknown[]> {
    return this.execute('DELETE', resource, options);
  }

  /**
   * Refresh now if the token expires within the threshold (minutes).
   * Never throws; the outcome says what happened.
   */
  async refreshIfNeeded(thresholdMinutes?: number): Promise<RefreshOutcome> {
    return this.connection.refreshIfNeeded(thresholdMinutes);
  }

  getContext(): TokenContext | undefined {
    return this.connection.getContext();
  }

  describeConnection(): ConnectionSummary | undefined {
    return this.connection.describeConnection();
  }

  /**
   * Add a header sent with every request of this connection.
   *
   * @throws {ConfigError} For the Authorization header
   * @throws {NotConnectedError} Without a connection
   */
  setHeader(name: string, value: string): void {
    this.connection.setHeader(name, value);
  }

  removeHeader(name: string): boolean {
    return this.connection.removeHeader(name);
  }

  /**
   * Prometheus exposition text of the SDK's metrics.
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }
}
