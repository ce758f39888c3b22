import type { Config } from '../models/config.js';
import type {
  HostIdentifier,
  HostReport,
  ProbeReporter,
  TargetSource,
} from '../models/types.js';
import type { IProber } from '../interfaces/scanner.js';
import type { IResultSink } from '../interfaces/sink.js';
import { getErrorMessage, toError } from '../errors/error-types.js';
import { createAuthStrategy } from '../auth/strategies.js';
import { EndpointProber } from '../scanners/prober.js';
import { DEFAULT_ENDPOINTS } from '../scanners/endpoints.js';
import { createSink } from '../sinks/factory.js';
import { hasRecord } from '../sinks/file-sink.js';
import { expandAddressInput, readHostFile, uniqueHosts } from '../targets/expander.js';
import { createHttpClient } from '../utils/http.js';
import { ConsoleProbeReporter } from '../utils/reporter.js';
import logger from '../utils/logger.js';
import { WorkerPool } from './pool.js';

/**
 * An input that could not be turned into targets. `targets` covers a failure
 * while the combined host stream was being read.
 */
export interface SourceError {
  source: 'ip_input' | 'ip_file' | 'targets';
  message: string;
  error: Error;
}

/**
 * Result of a sweep. Only hosts that emitted or failed keep a report; hosts
 * that never answered are counted in `hostsProbed` alone.
 */
export interface RunResult {
  hostsProbed: number;
  devicesFound: number;
  reports: HostReport[];
  sourceErrors: SourceError[];
  duration: number;
}

/**
 * Collaborators a sweep is built from; each defaults to the production one
 */
export interface RunDependencies {
  prober?: IProber;
  sink?: IResultSink;
  reporter?: ProbeReporter;
  pool?: WorkerPool;
}

/**
 * Load every configured input. A source that fails is recorded and skipped;
 * the other still runs.
 */
export async function loadSources(config: Config): Promise<{ sources: TargetSource[]; errors: SourceError[] }> {
  const sources: TargetSource[] = [];
  const errors: SourceError[] = [];

  if (config.ipInput) {
    logger.info(`Fetching data for IP(s) from command line input: ${config.ipInput}`);
    try {
      sources.push(expandAddressInput(config.ipInput));
    } catch (error) {
      errors.push({ source: 'ip_input', message: getErrorMessage(error), error: toError(error) });
    }
  }

  if (config.ipFile) {
    try {
      const source = await readHostFile(config.ipFile);
      logger.info(`Reading from file ${config.ipFile}. Found ${source.count ?? 0} IP addresses.`);
      sources.push(source);
    } catch (error) {
      errors.push({ source: 'ip_file', message: getErrorMessage(error), error: toError(error) });
    }
  }

  for (const { message, error } of errors) {
    logger.error(message, error);
  }

  return { sources, errors };
}

/**
 * Probe one host and hand a success to the sink. Failures of the sink are
 * reported against the host and do not propagate.
 */
export async function processHost(
  host: HostIdentifier,
  prober: IProber,
  sink: IResultSink,
  reporter: ProbeReporter
): Promise<HostReport> {
  const result = await prober.probe(host);

  if (!result.success) {
    return { host, status: 'no-response', attempts: result.attempts.length };
  }

  const { endpoint, payload } = result.success;
  try {
    const { location } = await sink.emit(host, payload, endpoint);
    reporter.report({ type: 'emitted', host, endpoint, location });
    return { host, status: 'emitted', attempts: result.attempts.length, endpoint, location };
  } catch (error) {
    const err = toError(error);
    reporter.report({ type: 'host-error', host, message: err.message, error: err });
    return { host, status: 'failed', attempts: result.attempts.length, endpoint, error: err.message };
  }
}

/**
 * Main application orchestration: expand targets, probe them through the
 * worker pool and count what answered
 *
 * @param config - Configuration object containing all settings and options
 * @param deps - Optional replacements for the prober, sink, reporter or pool
 */
export async function runDiscovery(config: Config, deps: RunDependencies = {}): Promise<RunResult> {
  const startTime = Date.now();
  const reporter = deps.reporter ?? new ConsoleProbeReporter();
  const sink = deps.sink ?? createSink(config.output, config.outputDir);
  const prober = deps.prober ?? new EndpointProber({
    client: createHttpClient({
      timeout: config.timeout * 1000,
      rejectUnauthorized: config.verifyTls,
      debug: config.debug ?? false,
    }),
    reporter,
    endpoints: DEFAULT_ENDPOINTS,
    auth: createAuthStrategy(config.username, config.password),
    hasRecord: (host) => hasRecord(config.outputDir, host),
  });
  const pool = deps.pool ?? new WorkerPool();

  const { sources, errors } = await loadSources(config);
  for (const source of sources) {
    logger.debug(`Queued ${source.description}${source.count !== undefined ? ` (${source.count} hosts)` : ''}`);
  }

  const reports: HostReport[] = [];
  let hostsProbed = 0;
  let devicesFound = 0;

  const { inputError } = await pool.forEach(
    uniqueHosts(sources),
    (host) => processHost(host, prober, sink, reporter),
    (entry) => {
      hostsProbed++;
      if (entry.status === 'rejected') {
        reporter.report({ type: 'host-error', host: entry.item, message: entry.reason.message, error: entry.reason });
        reports.push({ host: entry.item, status: 'failed', attempts: 0, error: entry.reason.message });
        return;
      }
      if (entry.value.status === 'emitted') {
        devicesFound++;
      }
      if (entry.value.status !== 'no-response') {
        reports.push(entry.value);
      }
    }
  );

  if (inputError) {
    logger.error(`Stopped reading targets: ${inputError.message}`, inputError);
    errors.push({ source: 'targets', message: inputError.message, error: inputError });
  }

  return {
    hostsProbed,
    devicesFound,
    reports,
    sourceErrors: errors,
    duration: Date.now() - startTime,
  };
}

/**
 * Utility function to format duration in human-readable format
 */
export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return `${minutes}m ${remainingSeconds}s`;
  }

  return `${seconds}s`;
}

/**
 * Get a one-line summary of a sweep for logging/reporting
 */
export function getRunSummary(result: RunResult): string {
  const duration = formatDuration(result.duration);
  const summary = `Probed ${result.hostsProbed} hosts in ${duration}; ${result.devicesFound} responded.`;

  if (result.sourceErrors.length > 0) {
    return `${summary} ${result.sourceErrors.length} input source(s) could not be loaded.`;
  }
  return summary;
}

/**
 * Whether an input source failed to load, which gives a non-zero exit code
 */
export function hasStartupErrors(result: RunResult): boolean {
  return result.sourceErrors.length > 0;
}
