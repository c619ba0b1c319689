import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { TransportError } from './errors';
import { debug, error } from './logging-utils';

export interface HttpClientConfig {
  timeout?: number;
  userAgent?: string;
  // Replaces axios' transport, e.g. with an in-process stand-in
  adapter?: AxiosAdapter;
}

/**
 * Thin axios wrapper used by the roster and profile sources.
 *
 * Requests are never retried: any transport failure or non-success status
 * surfaces as a TransportError.
 */
export class HttpClient {
  private httpClient: AxiosInstance;
  private startTimes = new Map<string, number>();
  private requestCount = 0;

  constructor(config: HttpClientConfig = {}) {
    this.httpClient = axios.create({
      timeout: config.timeout ?? 30000,
      adapter: config.adapter,
      responseType: 'text',
      // Keep the raw body; pages are parsed by the extractors
      transformResponse: [(data: unknown) => data],
      headers: {
        'User-Agent': config.userAgent ?? 'squadtrace/1.0',
        'Accept-Language': 'en'
      }
    });

    this.setupRequestInterceptors();
    this.setupResponseInterceptors();
  }

  async getText(url: string): Promise<string> {
    if (!url) {
      throw new TransportError(url, undefined, new Error('URL cannot be empty'));
    }

    try {
      debug(`[HttpClient] GET ${url}`);
      const response = await this.httpClient.get<unknown>(url);
      return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw new TransportError(url, err.response?.status, err);
      }
      throw new TransportError(url, undefined, err instanceof Error ? err : new Error(String(err)));
    }
  }

  async getJson(url: string): Promise<unknown> {
    const text = await this.getText(url);
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new TransportError(url, undefined, err instanceof Error ? err : new Error(String(err)));
    }
  }

  private setupRequestInterceptors(): void {
    this.httpClient.interceptors.request.use((config) => {
      const requestId = this.generateRequestId();
      config.headers.set('X-Request-Id', requestId);
      this.startTimes.set(requestId, Date.now());
      return config;
    });
  }

  private setupResponseInterceptors(): void {
    this.httpClient.interceptors.response.use(
      (response) => {
        const duration = this.elapsed(response.config.headers.get('X-Request-Id'));
        debug(`[HttpClient] ${response.status} ${response.config.url} in ${duration}ms`);
        return response;
      },
      (err: unknown) => {
        if (axios.isAxiosError(err)) {
          this.elapsed(err.config?.headers.get('X-Request-Id'));
          if (err.response) {
            error(`[HttpClient] Server error: ${err.response.status} ${err.response.statusText} (${err.config?.url})`);
          } else {
            error(`[HttpClient] Network error: ${err.message} (${err.config?.url})`);
          }
        }
        return Promise.reject(err);
      }
    );
  }

  private elapsed(requestId: unknown): number {
    if (typeof requestId !== 'string') return 0;
    const start = this.startTimes.get(requestId);
    this.startTimes.delete(requestId);
    return start === undefined ? 0 : Date.now() - start;
  }

  private generateRequestId(): string {
    this.requestCount++;
    return `req_${Date.now()}_${this.requestCount}`;
  }
}
