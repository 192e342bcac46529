/**
 * HTTP Client
 * Thin fetch wrapper shared by every vendor integration: URL building,
 * fixed headers, per-call timeout and status-to-category mapping
 */

import { ErrorCategory, ToolError } from './error-handler.js';

type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | QueryValue[] | null | undefined>;

export interface HttpClientOptions {
  /** Used in error messages, e.g. "NS" or "GitHub" */
  serviceName: string;
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Appended to every request, e.g. an api_key parameter */
  defaultQuery?: QueryParams;
}

export interface RequestOptions {
  method?: 'GET' | 'PUT' | 'POST';
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
}

const BODY_PREVIEW_LENGTH = 200;

export class HttpClient {
  constructor(private readonly options: HttpClientOptions) {}

  get serviceName(): string {
    return this.options.serviceName;
  }

  /**
   * Build an absolute URL, dropping empty query values
   */
  buildUrl(path: string, query?: QueryParams): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const url = new URL(`${base}${path.startsWith('/') ? path : `/${path}`}`);

    const params: QueryParams = { ...this.options.defaultQuery, ...query };
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === null || value === '') continue;
      url.searchParams.set(key, Array.isArray(value) ? value.join(',') : String(value));
    }

    return url.toString();
  }

  /**
   * Issue a request. Transport failures and timeouts become NETWORK errors;
   * the response is returned whatever its status.
   */
  async send(path: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? 'GET';
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      ...this.options.headers,
      ...options.headers,
    };

    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    try {
      return await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const isTimeout = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      const message = isTimeout
        ? `${this.serviceName} request timed out after ${this.options.timeoutMs}ms`
        : `${this.serviceName} request failed: ${error instanceof Error ? error.message : String(error)}`;

      throw new ToolError(
        ErrorCategory.NETWORK,
        message,
        { method, path },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Throw a categorized ToolError for any non-2xx response
   */
  async assertOk(response: Response, path: string): Promise<void> {
    if (response.ok) return;

    let preview = '';
    try {
      preview = (await response.text()).slice(0, BODY_PREVIEW_LENGTH);
    } catch (error) {
      preview = `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
    }

    const context = { path, status: response.status, body: preview };
    const label = `${this.serviceName} API responded with ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;

    if (response.status === 401 || response.status === 403) {
      throw new ToolError(ErrorCategory.AUTHENTICATION, label, context);
    }
    if (response.status === 429) {
      throw new ToolError(ErrorCategory.RATE_LIMIT, label, context);
    }
    if (response.status === 404) {
      throw new ToolError(ErrorCategory.DATA, label, context);
    }
    throw new ToolError(ErrorCategory.API_ERROR, label, context);
  }

  async readJson(response: Response, path: string): Promise<unknown> {
    try {
      const json: unknown = await response.json();
      return json;
    } catch (error) {
      throw new ToolError(
        ErrorCategory.DATA,
        `${this.serviceName} returned a response that is not valid JSON`,
        { path, status: response.status },
        error instanceof Error ? error : undefined
      );
    }
  }

  async getJson(path: string, query?: QueryParams): Promise<unknown> {
    const response = await this.send(path, { query });
    await this.assertOk(response, path);
    return this.readJson(response, path);
  }

  async putJson(path: string, body: unknown): Promise<unknown> {
    const response = await this.send(path, { method: 'PUT', body });
    await this.assertOk(response, path);
    return this.readJson(response, path);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
