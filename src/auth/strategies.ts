import type { IAuthStrategy, RequestConfig } from '@/interfaces/auth';

/**
 * No authentication strategy - performs no authentication
 */
export class NoAuth implements IAuthStrategy {
  applyAuth(config: RequestConfig): RequestConfig {
    // No authentication to apply
    return config;
  }

  getDescription(): string {
    return 'No Authentication';
  }
}

/**
 * Basic authentication strategy
 */
export class BasicAuth implements IAuthStrategy {
  private username: string;
  private password: string;

  constructor(username: string, password: string) {
    this.username = username;
    this.password = password;
  }

  applyAuth(config: RequestConfig): RequestConfig {
    const credentials = Buffer.from(`${this.username}:${this.password}`).toString('base64');

    return {
      ...config,
      headers: {
        ...config.headers,
        'Authorization': `Basic ${credentials}`
      }
    };
  }

  getDescription(): string {
    return `Basic Authentication (${this.username})`;
  }
}

/**
 * Basic auth when a username is configured, none otherwise
 */
export function createAuthStrategy(username: string, password: string): IAuthStrategy {
  return username.length > 0 ? new BasicAuth(username, password) : new NoAuth();
}
