/**
 * Thin GET-only client for the IDR web gateway.
 */
import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, CreateAxiosDefaults } from 'axios';
import { ResponseParseError, TransportError } from './errors';

export const DEFAULT_BASE_URL = 'https://idr.openmicroscopy.org';

export interface GatewayClient {
  readonly baseUrl: string;
  /** GET `path` and parse the body as JSON. */
  getJson(path: string): Promise<unknown>;
  /** GET `path` and return the raw body. */
  getBytes(path: string): Promise<Buffer>;
}

export type ClientConfig = {
  baseUrl?: string;
  /** Request timeout in ms; 0 waits forever. */
  timeoutMs?: number;
  /** Replaces the HTTP transport; tests use this to stay in-process. */
  adapter?: CreateAxiosDefaults['adapter'];
};

export class IdrClient implements GatewayClient {
  readonly baseUrl: string;
  private http: AxiosInstance;

  constructor(config: ClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: config.timeoutMs ?? 0,
      // Status is checked in request() so the error carries the full URL.
      validateStatus: () => true,
      adapter: config.adapter,
    });
  }

  resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    return this.baseUrl + (path.startsWith('/') ? path : `/${path}`);
  }

  async getJson(path: string): Promise<unknown> {
    const url = this.resolveUrl(path);
    const body = await this.request<string>(url, 'text');
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new ResponseParseError(url, '<body>', 'response is not valid JSON', error);
    }
  }

  async getBytes(path: string): Promise<Buffer> {
    const url = this.resolveUrl(path);
    const body = await this.request<ArrayBuffer>(url, 'arraybuffer');
    return Buffer.from(body);
  }

  private async request<T>(url: string, responseType: 'text' | 'arraybuffer'): Promise<T> {
    let response: AxiosResponse<T>;
    try {
      response = await this.http.get<T>(url, { responseType });
    } catch (error) {
      const status = error instanceof AxiosError ? error.response?.status : undefined;
      throw new TransportError(url, { status, cause: error });
    }
    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(url, { status: response.status });
    }
    return response.data;
  }
}

export function createClient(config: ClientConfig = {}): IdrClient {
  return new IdrClient(config);
}
