import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { RetryManager } from '../retryManager';
import { StructuredLogger } from './StructuredLogger';
import { HttpStatusError, RunCancelledError } from './errors';
import { decodeBest } from '../utils/decodeBest';

export interface HttpClientConfig {
  timeoutMs: number;
  maxRetries: number;
  baseRetryDelayMs: number;
  maxRetryDelayMs: number;
  userAgent: string;
}

export interface HttpClientResponse<T> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

// 429 et 5xx sont transitoires, les autres 4xx sont définitifs
export function isTransientStatus(status: number): boolean {
  return status === 0 || status === 408 || status === 429 || status >= 500;
}

/**
 * Client HTTP partagé par tous les workers : identité navigateur, timeout dur
 * par requête et retry borné sur les erreurs transitoires.
 */
export class HttpClient {
  private readonly axios: AxiosInstance;
  private readonly retryManager: RetryManager;

  constructor(
    private readonly name: string,
    private readonly config: HttpClientConfig,
    logger: StructuredLogger,
    axiosInstance?: AxiosInstance
  ) {
    this.axios = axiosInstance ?? axios.create();
    this.retryManager = new RetryManager(logger.child({ component: name }), {
      maxAttempts: config.maxRetries + 1,
      baseDelay: config.baseRetryDelayMs,
      maxDelay: config.maxRetryDelayMs,
      backoffMultiplier: 2
    });
  }

  async getText(url: string, options: RequestOptions = {}): Promise<HttpClientResponse<string>> {
    return this.retryManager.executeWithRetry(
      () => this.makeRequest(url, 'GET', undefined, options),
      `GET ${url}`,
      { shouldRetry: isRetryable, signal: options.signal }
    );
  }

  async postJson<T = unknown>(url: string, body: unknown, options: RequestOptions = {}): Promise<HttpClientResponse<T>> {
    const response = await this.retryManager.executeWithRetry(
      () => this.makeRequest(url, 'POST', body, {
        ...options,
        headers: {
          'Accept': 'application/json, text/javascript, */*; q=0.01',
          'Content-Type': 'application/json; charset=UTF-8',
          'X-Requested-With': 'XMLHttpRequest',
          ...options.headers
        }
      }),
      `POST ${url}`,
      { shouldRetry: isRetryable, signal: options.signal }
    );

    let data: T;
    try {
      data = JSON.parse(response.data);
    } catch {
      throw new HttpStatusError(response.status, url, `Invalid JSON from ${url}`, false);
    }

    return { ...response, data };
  }

  private async makeRequest(
    url: string,
    method: 'GET' | 'POST',
    body: unknown,
    options: RequestOptions
  ): Promise<HttpClientResponse<string>> {
    let response: AxiosResponse<unknown>;

    // Délai dur par tentative : le timeout axios ne couvre que l'inactivité du socket
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.config.timeoutMs);
    const onCallerAbort = (): void => deadline.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) deadline.abort();

    try {
      response = await this.axios.request<unknown>({
        url,
        method,
        data: body === undefined ? undefined : JSON.stringify(body),
        timeout: this.config.timeoutMs,
        signal: deadline.signal,
        responseType: 'arraybuffer',
        maxRedirects: 5,
        validateStatus: () => true,
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'it-IT,it;q=0.9,en;q=0.8',
          ...options.headers
        }
      });
    } catch (error) {
      throw this.toRequestError(url, error, options.signal, deadline.signal.aborted);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    const headers = extractHeaders(response.headers);

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        response.status,
        url,
        `HTTP ${response.status} ${response.statusText || ''}`.trim() + ` for ${url}`,
        isTransientStatus(response.status)
      );
    }

    return {
      data: decodeBest(toBuffer(response.data), headers).text,
      status: response.status,
      headers
    };
  }

  private toRequestError(url: string, error: unknown, signal: AbortSignal | undefined, deadlineReached: boolean): Error {
    if (signal?.aborted) {
      return new RunCancelledError(`Request to ${url} cancelled`);
    }

    if (deadlineReached || axios.isCancel(error)) {
      return new HttpStatusError(0, url, `Request timeout after ${this.config.timeoutMs}ms for ${url}`, true);
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new HttpStatusError(0, url, `Request timeout after ${this.config.timeoutMs}ms for ${url}`, true);
      }
      return new HttpStatusError(0, url, `${error.code ?? 'NETWORK_ERROR'}: ${error.message}`, true);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new HttpStatusError(0, url, `[${this.name}] ${message}`, true);
  }
}

function isRetryable(error: Error): boolean {
  return error instanceof HttpStatusError && error.transient;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  if (data == null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), 'utf8');
}

function extractHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    if (value === undefined || value === null) continue;
    result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}
