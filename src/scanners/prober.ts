import type { IProber } from '@/interfaces/scanner';
import type { IAuthStrategy } from '@/interfaces/auth';
import { NoAuth } from '@/auth/strategies';
import {
  HttpStatusError,
  ProbeTimeoutError,
  SerializationError,
  TransportError,
  toError,
} from '@/errors/error-types';
import type {
  EndpointDescriptor,
  HostIdentifier,
  JsonValue,
  ProbeAttempt,
  ProbeOutcome,
  ProbeReporter,
  ProbeResult,
} from '@/models/types';
import { HttpClient, describeTransportError, getTransportCode, isTimeoutError } from '@/utils/http';
import { DEFAULT_ENDPOINTS, renderUrl } from './endpoints';

export interface EndpointProberOptions {
  client: HttpClient;
  reporter: ProbeReporter;
  endpoints?: readonly EndpointDescriptor[];
  auth?: IAuthStrategy;
  /** Per-request timeout in milliseconds; the client's timeout when omitted */
  timeout?: number;
  /** Answers whether a record was already saved for the host */
  hasRecord?: (host: HostIdentifier) => Promise<boolean>;
}

/**
 * Probes one host against an ordered endpoint list, first success wins
 */
export class EndpointProber implements IProber {
  private client: HttpClient;
  private reporter: ProbeReporter;
  private endpoints: readonly EndpointDescriptor[];
  private auth: IAuthStrategy;
  private timeout: number;
  private hasRecord?: (host: HostIdentifier) => Promise<boolean>;

  constructor(options: EndpointProberOptions) {
    this.client = options.client;
    this.reporter = options.reporter;
    this.endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;
    this.auth = options.auth ?? new NoAuth();
    this.timeout = options.timeout ?? options.client.timeout;
    this.hasRecord = options.hasRecord;
  }

  async probe(host: HostIdentifier): Promise<ProbeResult> {
    if (this.hasRecord && !(await this.hasRecord(host))) {
      this.reporter.report({ type: 'new-device', host });
    }

    const attempts: ProbeAttempt[] = [];

    for (const endpoint of this.endpoints) {
      const outcome = await this.attempt(host, endpoint);
      attempts.push({ endpoint, outcome });
      this.reporter.report({ type: 'attempt', host, endpoint, outcome });

      if (outcome.kind === 'success') {
        return { host, attempts, success: { endpoint, payload: outcome.payload } };
      }
    }

    return { host, attempts };
  }

  /**
   * Issue one request and classify what came back. Never rejects.
   */
  async attempt(host: HostIdentifier, endpoint: EndpointDescriptor): Promise<ProbeOutcome> {
    const url = renderUrl(endpoint, host);
    const context = { host, endpoint: url };
    const { headers } = this.auth.applyAuth({ headers: { ...endpoint.headers } });

    try {
      const response = await this.client.get(url, { headers, timeout: this.timeout });

      if (response.status !== 200) {
        return {
          kind: 'http-failure',
          status: response.status,
          error: new HttpStatusError(response.status, context),
        };
      }

      try {
        return { kind: 'success', payload: parseJsonBody(response.data) };
      } catch (parseError) {
        const error = new SerializationError(context, toError(parseError));
        return { kind: 'invalid-body', message: error.message, error };
      }
    } catch (requestError) {
      if (isTimeoutError(requestError)) {
        return {
          kind: 'timeout',
          timeoutMs: this.timeout,
          error: new ProbeTimeoutError(this.timeout, context, toError(requestError)),
        };
      }

      const message = describeTransportError(requestError);
      return {
        kind: 'transport-error',
        message,
        code: getTransportCode(requestError),
        error: new TransportError(message, context, toError(requestError)),
      };
    }
  }
}

/**
 * Decode a response body. Bodies arrive as text; anything else was already
 * decoded by a custom adapter and is re-read through JSON for a plain value.
 */
function parseJsonBody(body: unknown): JsonValue {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return JSON.parse(text);
}
