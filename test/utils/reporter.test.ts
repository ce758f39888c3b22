import { describe, it, expect, vi } from 'vitest';
import { ConsoleProbeReporter, formatProbeEvent } from '@/utils/reporter';
import { Logger } from '@/utils/logger';
import { DEFAULT_ENDPOINTS } from '@/scanners/endpoints';
import { HttpStatusError, OutputWriteError, ProbeTimeoutError, TransportError } from '@/errors/error-types';

const health = DEFAULT_ENDPOINTS[0];
const hardware = DEFAULT_ENDPOINTS[1];

describe('formatProbeEvent', () => {
  it('announces new devices', () => {
    expect(formatProbeEvent({ type: 'new-device', host: '10.0.0.1' })).toEqual({
      level: 'info',
      message: 'New device detected: 10.0.0.1',
    });
  });

  it('describes each attempt outcome', () => {
    const context = { host: '10.0.0.1', endpoint: 'health' };

    expect(formatProbeEvent({
      type: 'attempt',
      host: '10.0.0.1',
      endpoint: hardware,
      outcome: { kind: 'success', payload: {} },
    })).toEqual({ level: 'success', message: 'Success: 10.0.0.1 on port 443' });

    expect(formatProbeEvent({
      type: 'attempt',
      host: '10.0.0.1',
      endpoint: health,
      outcome: { kind: 'http-failure', status: 404, error: new HttpStatusError(404, context) },
    })).toEqual({ level: 'warn', message: 'Failed: 10.0.0.1 on port 8888 (HTTP 404)' });

    expect(formatProbeEvent({
      type: 'attempt',
      host: '10.0.0.1',
      endpoint: health,
      outcome: { kind: 'timeout', timeoutMs: 3000, error: new ProbeTimeoutError(3000, context) },
    })).toEqual({ level: 'warn', message: 'Timeout: 10.0.0.1 on port 8888' });

    expect(formatProbeEvent({
      type: 'attempt',
      host: '10.0.0.1',
      endpoint: health,
      outcome: {
        kind: 'transport-error',
        message: 'connection refused',
        code: 'ECONNREFUSED',
        error: new TransportError('connection refused', context),
      },
    })).toEqual({ level: 'error', message: 'Error: 10.0.0.1 on port 8888 (connection refused)' });
  });

  it('logs saved records at debug level', () => {
    expect(formatProbeEvent({
      type: 'emitted',
      host: '10.0.0.1',
      endpoint: hardware,
      location: 'response_10.0.0.1.yaml',
    })).toEqual({ level: 'debug', message: 'Saved 10.0.0.1 to response_10.0.0.1.yaml' });
  });
});

describe('ConsoleProbeReporter', () => {
  it('routes each event to the matching logger method', () => {
    const log = new Logger({ enableDebug: false });
    const info = vi.spyOn(log, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(log, 'warn').mockImplementation(() => {});
    const reporter = new ConsoleProbeReporter(log);

    reporter.report({ type: 'new-device', host: '10.0.0.1' });
    reporter.report({
      type: 'attempt',
      host: '10.0.0.1',
      endpoint: hardware,
      outcome: { kind: 'timeout', timeoutMs: 3000, error: new ProbeTimeoutError(3000, {}) },
    });

    expect(info).toHaveBeenCalledWith('New device detected: 10.0.0.1');
    expect(warn).toHaveBeenCalledWith('Timeout: 10.0.0.1 on port 443');
  });

  it('passes the error of a failed host to the logger', () => {
    const log = new Logger({ enableDebug: false });
    const error = vi.spyOn(log, 'error').mockImplementation(() => {});
    const failure = new OutputWriteError('out/response_10.0.0.1.yaml', '10.0.0.1', new Error('read-only file system'));

    new ConsoleProbeReporter(log).report({
      type: 'host-error',
      host: '10.0.0.1',
      message: failure.message,
      error: failure,
    });

    expect(error).toHaveBeenCalledWith(
      'Failed to process 10.0.0.1: Failed to write out/response_10.0.0.1.yaml: read-only file system',
      failure
    );
  });

  it('prints debug lines only when debug is on', () => {
    const print = vi.spyOn(console, 'log').mockImplementation(() => {});
    const event = { type: 'emitted', host: '10.0.0.1', endpoint: hardware, location: 'stdout' } as const;

    new ConsoleProbeReporter(new Logger({ enableDebug: false })).report(event);
    expect(print).not.toHaveBeenCalled();

    new ConsoleProbeReporter(new Logger({ enableDebug: true })).report(event);
    expect(print).toHaveBeenCalledWith('🐛', 'Saved 10.0.0.1 to stdout');
  });
});
