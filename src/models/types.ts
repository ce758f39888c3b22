import type {
  HttpStatusError,
  ProbeTimeoutError,
  SerializationError,
  TransportError,
} from '../errors/error-types.js';

/**
 * Address or host name used to reach a target device
 */
export type HostIdentifier = string;

/**
 * Any value a JSON document can decode to
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Static description of one REST path/port/header combination to try.
 * `urlTemplate` carries a single `{host}` slot.
 */
export interface EndpointDescriptor {
  readonly urlTemplate: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly port: number;
}

/**
 * Result classification of one endpoint attempt
 */
export type ProbeOutcome =
  | { kind: 'success'; payload: JsonValue }
  | { kind: 'http-failure'; status: number; error: HttpStatusError }
  | { kind: 'timeout'; timeoutMs: number; error: ProbeTimeoutError }
  | { kind: 'transport-error'; message: string; code?: string; error: TransportError }
  | { kind: 'invalid-body'; message: string; error: SerializationError };

export interface ProbeAttempt {
  endpoint: EndpointDescriptor;
  outcome: ProbeOutcome;
}

/**
 * Everything learned about one host. `success` is set when an endpoint answered.
 */
export interface ProbeResult {
  host: HostIdentifier;
  attempts: ProbeAttempt[];
  success?: {
    endpoint: EndpointDescriptor;
    payload: JsonValue;
  };
}

/**
 * Where a sink placed a payload
 */
export interface EmitResult {
  host: HostIdentifier;
  location: string;
}

/**
 * Structured events emitted while sweeping
 */
export type ProbeEvent =
  | { type: 'new-device'; host: HostIdentifier }
  | { type: 'attempt'; host: HostIdentifier; endpoint: EndpointDescriptor; outcome: ProbeOutcome }
  | { type: 'emitted'; host: HostIdentifier; endpoint: EndpointDescriptor; location: string }
  | { type: 'host-error'; host: HostIdentifier; message: string; error: Error };

/**
 * Receives probe events; the console reporter logs them, tests record them
 */
export interface ProbeReporter {
  report(event: ProbeEvent): void;
}

export type HostStatus = 'emitted' | 'no-response' | 'failed';

/**
 * Outcome of one host's probe-then-emit pipeline
 */
export interface HostReport {
  host: HostIdentifier;
  status: HostStatus;
  attempts: number;
  endpoint?: EndpointDescriptor;
  location?: string;
  error?: string;
}

/**
 * An IPv4 block with its bounds as unsigned 32-bit integers
 */
export interface CidrBlock {
  network: number;
  broadcast: number;
  prefix: number;
}

/**
 * A named stream of hosts loaded from one input. `block` is set when the
 * hosts are the usable addresses of a CIDR range, which never repeat.
 */
export interface TargetSource {
  label: string;
  description: string;
  count?: number;
  block?: CidrBlock;
  hosts: Iterable<HostIdentifier>;
}
