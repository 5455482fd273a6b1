// src/core/http/RequestExecutor.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as https from 'https';
import type { ApiErrorEnvelope, ExecuteOptions, HttpMethod, RequestExecutorConfig } from './types';
import type { ConnectionManager } from '../connection/ConnectionManager';
import type { Sleep } from '../auth/flows/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { ThrottleHandler } from './ThrottleHandler';
import { isManagedHeader } from '../connection/AuthHeaderSet';
import { ApiRequestError, ConfigError, NotConnectedError, errorMessage } from '../../utils/errors';
import { isRecord, readString } from '../../utils/guards';
import { parseBody } from '../../utils/body';
import { withHttpSpan } from '../../observability/tracing';

export const NEXT_LINK = '@odata.nextLink';

/**
 * Runs API calls on the current connection: refreshes first, follows paging
 * links, and waits out throttling. Reads degrade to partial results on error;
 * writes fail.
 */
export class RequestExecutor {
  private axiosInstance: AxiosInstance;
  private throttleHandler: ThrottleHandler;

  constructor(
    private connection: ConnectionManager,
    private config: RequestExecutorConfig,
    private logger: Logger,
    private metrics: MetricsCollector,
    sleep: Sleep
  ) {
    this.throttleHandler = new ThrottleHandler(config.throttle, logger, metrics, sleep);
    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  /**
   * @returns Accumulated items of every page
   * @throws {NotConnectedError} Before any network call when there is no connection
   * @throws {ConfigError} When the per-request headers name `Authorization`
   * @throws {ApiRequestError} For write methods on any non-throttling failure
   */
  async execute(method: HttpMethod, resource: string, options: ExecuteOptions = {}): Promise<unknown[]> {
    if (!this.connection.currentHeaders()) {
      throw new NotConnectedError();
    }
    if (Object.keys(options.headers ?? {}).some(isManagedHeader)) {
      throw new ConfigError('The Authorization header is managed by the connection');
    }

    await this.connection.refreshIfNeeded();

    const isWrite = method !== 'GET';
    const results: unknown[] = [];
    let url: string | undefined = this.buildUrl(resource, options.apiVersion);
    let pages = 0;

    while (url) {
      const pageUrl: string = url;
      let page: unknown;
      try {
        page = await this.throttleHandler.execute(() => this.send(method, pageUrl, options, isWrite), method);
      } catch (error: unknown) {
        const failure = await this.transformError(error, method, pageUrl);
        if (isWrite) {
          throw failure;
        }
        this.logger.warn('Read request failed, returning partial results', {
          method,
          url: pageUrl,
          status: failure.status,
          errorCode: failure.errorCode,
          error: failure.message,
          itemsSoFar: results.length,
        });
        break;
      }

      pages++;
      url = this.collect(page, results);
    }

    this.logger.debug('Request completed', { method, resource, pages, items: results.length });
    return results;
  }

  buildUrl(resource: string, apiVersion: string = this.config.defaultApiVersion): string {
    if (/^https?:\/\//i.test(resource)) {
      return resource;
    }
    const base = this.config.baseUrl.replace(/\/+$/, '');
    const version = apiVersion.replace(/^\/+|\/+$/g, '');
    return `${base}/${version}/${resource.replace(/^\/+/, '')}`;
  }

  private async send(method: HttpMethod, url: string, options: ExecuteOptions, isWrite: boolean): Promise<unknown> {
    const headers = this.connection.currentHeaders();
    if (!headers) {
      throw new NotConnectedError();
    }

    return withHttpSpan(method, url, async () => {
      const startTime = Date.now();
      try {
        const response = await this.axiosInstance.request<unknown>({
          url,
          method,
          headers: { ...headers, ...options.headers },
          data: isWrite ? serializeBody(options.body) : undefined,
        });

        this.metrics.incrementCounter('api_requests_total', { method, status: response.status });
        this.metrics.recordLatency('api_request_duration', Date.now() - startTime, { method });
        return response.data;
      } catch (error: unknown) {
        const status = isAxiosError(error) ? error.response?.status ?? 'error' : 'error';
        this.metrics.incrementCounter('api_requests_total', { method, status });
        throw error;
      }
    });
  }

  /**
   * Append a page to the accumulator.
   *
   * @returns The next page URL, or undefined on the terminal page
   */
  private collect(page: unknown, results: unknown[]): string | undefined {
    if (isRecord(page)) {
      const nextLink = readString(page, NEXT_LINK);
      const value = page.value;

      if (nextLink) {
        if (Array.isArray(value)) results.push(...value);
        return nextLink;
      }

      if (Array.isArray(value)) {
        results.push(...value);
      } else {
        results.push(page);
      }
      return undefined;
    }

    // Empty bodies (204 No Content) add nothing
    if (page !== undefined && page !== null && page !== '') {
      results.push(page);
    }
    return undefined;
  }

  private async transformError(error: unknown, method: HttpMethod, url: string): Promise<ApiRequestError> {
    if (error instanceof ApiRequestError) {
      return error;
    }

    if (isAxiosError(error) && error.response) {
      const status = error.response.status;
      const envelope = readApiError(await parseBody(error.response.data));
      const message = envelope?.message ?? `Request failed with status ${status}`;

      this.logger.debug('API error response', { method, url, status, errorCode: envelope?.code });
      return new ApiRequestError(
        envelope?.code ? `${envelope.code}: ${message}` : message,
        status,
        envelope?.code,
        { method, url }
      );
    }

    return new ApiRequestError(`Request failed: ${errorMessage(error)}`, undefined, undefined, { method, url });
  }
}

// Strings are taken as already-serialized JSON
function serializeBody(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * Read the `{ error: { code, message } }` envelope of an API error body.
 */
export function readApiError(body: unknown): ApiErrorEnvelope | undefined {
  if (!isRecord(body) || !isRecord(body.error)) {
    return undefined;
  }
  return {
    code: readString(body.error, 'code'),
    message: readString(body.error, 'message'),
  };
}
