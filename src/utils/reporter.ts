import type { ProbeEvent, ProbeReporter } from '@/models/types';
import logger, { Logger } from './logger';

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface FormattedEvent {
  level: LogLevel;
  message: string;
}

/**
 * Map a probe event to the line the console shows for it
 */
export function formatProbeEvent(event: ProbeEvent): FormattedEvent {
  switch (event.type) {
    case 'new-device':
      return { level: 'info', message: `New device detected: ${event.host}` };

    case 'emitted':
      return { level: 'debug', message: `Saved ${event.host} to ${event.location}` };

    case 'host-error':
      return { level: 'error', message: `Failed to process ${event.host}: ${event.message}` };

    case 'attempt': {
      const where = `${event.host} on port ${event.endpoint.port}`;
      const outcome = event.outcome;
      switch (outcome.kind) {
        case 'success':
          return { level: 'success', message: `Success: ${where}` };
        case 'http-failure':
          return { level: 'warn', message: `Failed: ${where} (HTTP ${outcome.status})` };
        case 'timeout':
          return { level: 'warn', message: `Timeout: ${where}` };
        case 'transport-error':
        case 'invalid-body':
          return { level: 'error', message: `Error: ${where} (${outcome.message})` };
      }
    }
  }
}

/**
 * Writes probe events through the logger
 */
export class ConsoleProbeReporter implements ProbeReporter {
  constructor(private readonly log: Logger = logger) {}

  report(event: ProbeEvent): void {
    const { level, message } = formatProbeEvent(event);
    switch (level) {
      case 'info':
        this.log.info(message);
        break;
      case 'success':
        this.log.success(message);
        break;
      case 'warn':
        this.log.warn(message);
        break;
      case 'error':
        this.log.error(message, event.type === 'host-error' ? event.error : undefined);
        break;
      case 'debug':
        this.log.debug(message);
        break;
    }
  }
}

/**
 * Keeps every event in memory, in arrival order
 */
export class RecordingProbeReporter implements ProbeReporter {
  readonly events: ProbeEvent[] = [];

  report(event: ProbeEvent): void {
    this.events.push(event);
  }
}
