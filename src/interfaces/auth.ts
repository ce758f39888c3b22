/**
 * Interface for HTTP request configuration that can be modified by auth strategies
 */
export interface RequestConfig {
  headers: Record<string, string>;
}

/**
 * Interface for authentication strategy implementations
 *
 * Every probe request passes through the strategy before it is sent, so the
 * credential scheme can change without touching the prober.
 */
export interface IAuthStrategy {
  /**
   * Apply authentication to an HTTP request configuration
   *
   * @returns The modified request configuration with authentication applied
   */
  applyAuth(config: RequestConfig): RequestConfig;

  /**
   * Get a human-readable description of the authentication method
   */
  getDescription(): string;
}
