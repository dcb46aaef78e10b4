import axios, { type AxiosInstance, type AxiosResponse, type ResponseType } from 'axios';
import type { Readable } from 'stream';
import { CancelledError, NetworkError, errorMessage } from './errors.js';

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (iPhone; CPU iPhone OS 16_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.0 Mobile/15E148 Safari/604.1';

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface StreamedBody {
  stream: Readable;
  totalBytes: number | null;  // null when the server sends no content-length
}

/**
 * Network collaborator of the engine. Every failure surfaces as a NetworkError,
 * or a CancelledError when the request was aborted through its signal.
 */
export interface HttpClient {
  getText(url: string, options?: RequestOptions): Promise<string>;
  getBytes(url: string, options?: RequestOptions): Promise<Buffer>;
  getJson(url: string, options?: RequestOptions): Promise<unknown>;
  getStream(url: string, options?: RequestOptions): Promise<StreamedBody>;
}

export function createHttpClient(baseURL?: string, timeout = DEFAULT_TIMEOUT): AxiosInstance {
  return axios.create({
    baseURL,
    timeout,
    headers: {
      'User-Agent': DEFAULT_USER_AGENT,
      'Accept': '*/*',
      'Accept-Language': 'en-US,en;q=0.9',
    },
  });
}

/**
 * Headers for playlist, segment and subtitle requests: CDNs check that
 * referer and origin match the host being fetched.
 */
export function buildStreamHeaders(url: string, extra: Record<string, string> = {}): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': DEFAULT_USER_AGENT,
    'Accept': '*/*',
    'Accept-Language': 'en-US,en;q=0.9',
  };

  if (URL.canParse(url)) {
    const { origin } = new URL(url);
    headers['Referer'] = `${origin}/`;
    headers['Origin'] = origin;
  }

  return { ...headers, ...extra };
}

function toNetworkError(error: unknown, url: string): Error {
  if (axios.isCancel(error)) {
    return new CancelledError();
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = status
      ? `HTTP ${status} for ${url}`
      : `Request failed for ${url}: ${error.message}`;
    return new NetworkError(message, status, url, { cause: error });
  }
  return new NetworkError(`Request failed for ${url}: ${errorMessage(error)}`, undefined, url, { cause: error });
}

function parseContentLength(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const length = Number(value);
  return Number.isFinite(length) && length > 0 ? length : null;
}

export class AxiosHttpClient implements HttpClient {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: { timeoutMs?: number; downloadTimeoutMs?: number } = {}
  ) {
    this.client = createHttpClient(undefined, options.timeoutMs ?? DEFAULT_TIMEOUT);
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.get<string>(url, 'text', options);
    return response.data;
  }

  async getBytes(url: string, options: RequestOptions = {}): Promise<Buffer> {
    const response = await this.get<ArrayBuffer>(url, 'arraybuffer', options);
    return Buffer.from(response.data);
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.get<unknown>(url, 'json', options);
    return response.data;
  }

  async getStream(url: string, options: RequestOptions = {}): Promise<StreamedBody> {
    const response = await this.get<Readable>(url, 'stream', {
      ...options,
      timeoutMs: options.timeoutMs ?? this.options.downloadTimeoutMs,
    });
    return {
      stream: response.data,
      totalBytes: parseContentLength(response.headers['content-length']),
    };
  }

  private async get<T>(url: string, responseType: ResponseType, options: RequestOptions): Promise<AxiosResponse<T>> {
    try {
      return await this.client.get<T>(url, {
        responseType,
        headers: options.headers,
        signal: options.signal,
        timeout: options.timeoutMs,
      });
    } catch (error) {
      throw toNetworkError(error, url);
    }
  }
}
