import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { logger } from '../utils/logger';

export interface ConnectivityProbe {
  isOnline(): Promise<boolean>;
}

export interface AuthProvider {
  getToken(): Promise<string | null>;
  isAuthenticated(): Promise<boolean>;
}

export interface HttpConnectivityProbeOptions {
  url: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

/**
 * Online means the API host answered at all. Any HTTP status counts, since a
 * 401 or 404 still proves the network path works.
 */
export class HttpConnectivityProbe implements ConnectivityProbe {
  private readonly http: AxiosInstance;

  constructor(private readonly options: HttpConnectivityProbeOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async isOnline(): Promise<boolean> {
    try {
      await this.http.head(this.options.url);
      return true;
    } catch (error) {
      logger.debug('Connectivity probe failed', { url: this.options.url, err: logger.serializeError(error) });
      return false;
    }
  }
}

/** Bearer token held in memory, seeded from configuration. */
export class StaticTokenAuthProvider implements AuthProvider {
  constructor(private token: string | null = null) {}

  async getToken(): Promise<string | null> {
    return this.token;
  }

  async isAuthenticated(): Promise<boolean> {
    return Boolean(this.token);
  }

  setToken(token: string | null): void {
    this.token = token && token.trim() ? token.trim() : null;
  }

  clear(): void {
    this.token = null;
  }
}
