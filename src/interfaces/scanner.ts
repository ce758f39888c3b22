import type { HostIdentifier, ProbeResult } from '../models/types';

/**
 * Interface that all prober implementations must implement.
 * Provides a consistent API for checking one host against a list of
 * endpoints, whatever transport sits underneath.
 */
export interface IProber {
  /**
   * Tries the host's endpoints in order and stops at the first one that
   * answers with a usable payload.
   *
   * @returns Promise that resolves to every attempt made, plus the winning
   * endpoint and payload when there was one. Endpoint failures are recorded
   * as outcomes, not thrown.
   */
  probe(host: HostIdentifier): Promise<ProbeResult>;
}
