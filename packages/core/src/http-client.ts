/**
 * @fileoverview HTTP client for the circles backend
 * @description axios wrapper that attaches auth, maps failures onto the ApiError taxonomy
 */

import axios, { AxiosAdapter, AxiosInstance, RawAxiosRequestHeaders } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AuthTokenProvider } from './adapters/auth';
import { ClientConfig } from './config';
import { ApiError, httpStatusError, toApiError, transportError, unauthenticatedError } from './errors';
import { Logger, scopedLogger } from './logger';

export type QueryValue = string | number | boolean | string[];

export interface RequestOptions {
  params?: Record<string, QueryValue>;
  /**
   * `optional` is for read paths the backend serves to anonymous callers
   * (taxonomy browsing); everything else requires a token.
   */
  auth?: 'required' | 'optional';
}

export interface HttpClient {
  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<unknown>;
  delete(path: string, options?: RequestOptions): Promise<unknown>;
}

/** DRF-style error body; anything else carries no usable detail. */
const errorBodySchema = z.object({ detail: z.string() });

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class AxiosHttpClient implements HttpClient {
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(
    config: ClientConfig,
    private readonly auth: AuthTokenProvider,
    /** Custom transport, mainly for tests. */
    adapter?: AxiosAdapter,
  ) {
    this.http = axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      // exclude_categories=a&exclude_categories=b
      paramsSerializer: { indexes: null },
      ...(adapter && { adapter }),
    });
    this.log = scopedLogger(config.logger, 'HTTP');
  }

  get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('GET', path, undefined, options);
  }

  post(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.request('POST', path, body, options);
  }

  delete(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('DELETE', path, undefined, options);
  }

  private async request(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body: unknown,
    options: RequestOptions,
  ): Promise<unknown> {
    const requestId = uuidv4();
    const headers: RawAxiosRequestHeaders = { 'X-Request-Id': requestId };
    const token = this.auth.getAccessToken();

    if (token) {
      headers.Authorization = `Bearer ${token}`;
    } else if ((options.auth ?? 'required') === 'required') {
      this.log.warn(`${method} ${path} skipped: no access token`);
      throw unauthenticatedError();
    }

    this.log.debug(`${method} ${path} (${requestId})`);

    try {
      const response = await this.http.request({
        method,
        url: path,
        params: options.params,
        data: body,
        headers,
      });
      this.log.debug(`${response.status} ${method} ${path} (${requestId})`);
      return response.data;
    } catch (error) {
      const apiError = this.mapError(error);
      this.log.error(`${method} ${path} failed (${requestId}): ${apiError.message}`);
      if (apiError.status === 401) this.startTokenRefresh();
      throw apiError;
    }
  }

  private mapError(error: unknown): ApiError {
    if (!axios.isAxiosError(error)) return toApiError(error);

    const response = error.response;
    if (!response) {
      return transportError(error.message, {
        timedOut: TIMEOUT_CODES.has(error.code ?? ''),
        original: error,
      });
    }

    const body = errorBodySchema.safeParse(response.data);
    const detail = body.success ? body.data.detail : undefined;

    if (response.status === 401) return unauthenticatedError(detail ?? 'Access token rejected', 401);
    return httpStatusError(response.status, detail, error);
  }

  /** The triggering call is not retried; callers re-issue it once a fresh token exists. */
  private startTokenRefresh(): void {
    void this.auth.refreshAccessToken().then(
      () => this.log.info('Access token refreshed'),
      (refreshError: unknown) => this.log.error('Token refresh failed:', refreshError),
    );
  }
}
