import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { Agent } from 'https';
import logger from './logger';

/**
 * Configuration options for HTTP client
 */
export interface HttpClientConfig {
  timeout?: number; // milliseconds
  rejectUnauthorized?: boolean;
  adapter?: AxiosAdapter;
  debug?: boolean;
}

/**
 * Options for a single GET request
 */
export interface GetOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

// Socket and axios codes that mean the deadline passed
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);

const TRANSPORT_MESSAGES: Record<string, string> = {
  ECONNREFUSED: 'connection refused',
  ECONNRESET: 'connection reset by peer',
  ENOTFOUND: 'host not found',
  EAI_AGAIN: 'DNS lookup failed',
  EHOSTUNREACH: 'host unreachable',
  ENETUNREACH: 'network unreachable',
  EPROTO: 'TLS protocol error',
  DEPTH_ZERO_SELF_SIGNED_CERT: 'self-signed certificate',
  SELF_SIGNED_CERT_IN_CHAIN: 'self-signed certificate in chain',
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: 'unable to verify certificate',
  CERT_HAS_EXPIRED: 'certificate has expired',
  ERR_TLS_CERT_ALTNAME_INVALID: 'certificate does not match host',
  ERR_INVALID_URL: 'invalid URL',
};

/**
 * HTTP client that never throws on a status code and hands back raw bodies.
 * Transport failures (DNS, refused, TLS, timeout) still reject.
 */
export class HttpClient {
  private client: AxiosInstance;
  private config: Required<Omit<HttpClientConfig, 'adapter'>>;

  constructor(config: HttpClientConfig = {}) {
    this.config = {
      timeout: config.timeout ?? 3000,
      rejectUnauthorized: config.rejectUnauthorized ?? false,
      debug: config.debug ?? false,
    };

    this.client = axios.create({
      timeout: this.config.timeout,
      httpsAgent: new Agent({ rejectUnauthorized: this.config.rejectUnauthorized }),
      responseType: 'text',
      validateStatus: () => true, // Don't throw on any status code
      transitional: { clarifyTimeoutError: true },
      headers: {
        'User-Agent': 'device-sweep/1.0.0',
        'Accept': 'application/json, */*',
      },
      adapter: config.adapter,
    });

    this.setupInterceptors();
  }

  get timeout(): number {
    return this.config.timeout;
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((config) => {
      if (this.config.debug) {
        logger.debug(`[HTTP] ${config.method?.toUpperCase()} ${config.url}`);
      }
      return config;
    });

    this.client.interceptors.response.use(
      (response) => {
        if (this.config.debug) {
          logger.debug(`[HTTP] ${response.status} ${response.config.url}`);
        }
        return response;
      },
      (error: unknown) => {
        if (this.config.debug && isAxiosError(error)) {
          logger.debug(`[HTTP] ${error.code ?? 'ERROR'} ${error.config?.url} - ${error.message}`);
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * GET a URL, resolving with whatever status the server answered
   */
  async get(url: string, options: GetOptions = {}): Promise<AxiosResponse<string>> {
    return this.client.request<string>({
      method: 'get',
      url,
      headers: options.headers,
      timeout: options.timeout ?? this.config.timeout,
    });
  }
}

/**
 * Whether a rejected request ran out of time
 */
export function isTimeoutError(error: unknown): boolean {
  return isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code);
}

/**
 * Error code carried by a transport failure, if any
 */
export function getTransportCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Human-readable description of a transport failure
 */
export function describeTransportError(error: unknown): string {
  const code = getTransportCode(error);
  if (code !== undefined && TRANSPORT_MESSAGES[code]) {
    return TRANSPORT_MESSAGES[code];
  }
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return 'request failed';
}

/**
 * Create a default HTTP client instance
 */
export function createHttpClient(config?: HttpClientConfig): HttpClient {
  return new HttpClient(config);
}
