// Main exports for programmatic use of the device-sweep package
export { runDiscovery, processHost, loadSources, getRunSummary, formatDuration } from './core/app.js';
export type { RunResult, RunDependencies, SourceError } from './core/app.js';
export { WorkerPool, defaultPoolSize } from './core/pool.js';
export type { Settled, PoolRun, PoolSummary } from './core/pool.js';

// Configuration exports
export { ConfigBuilder, ConfigValidationError, OutputMode } from './models/config.js';
export type { Config, CliArgs } from './models/config.js';

// Targets
export {
  parseIPv4,
  formatIPv4,
  parseCidr,
  cidrHosts,
  blockContains,
  countHosts,
  expandAddressInput,
  readHostFile,
  parseHostList,
  uniqueHosts,
} from './targets/expander.js';
export type { CidrBlock } from './targets/expander.js';

// Probing
export { EndpointProber } from './scanners/prober.js';
export type { EndpointProberOptions } from './scanners/prober.js';
export { DEFAULT_ENDPOINTS, renderUrl } from './scanners/endpoints.js';
export { HttpClient, createHttpClient } from './utils/http.js';
export { BasicAuth, NoAuth, createAuthStrategy } from './auth/strategies.js';

// Output
export { FileSink, escapeHostForFile, recordPath, hasRecord, toYaml } from './sinks/file-sink.js';
export { ConsoleSink } from './sinks/console-sink.js';
export { createSink } from './sinks/factory.js';
export { ConsoleProbeReporter, RecordingProbeReporter, formatProbeEvent } from './utils/reporter.js';

// Errors
export * from './errors/error-types.js';

// Type exports
export type {
  HostIdentifier,
  JsonValue,
  EndpointDescriptor,
  ProbeOutcome,
  ProbeAttempt,
  ProbeResult,
  ProbeEvent,
  ProbeReporter,
  HostReport,
  EmitResult,
  TargetSource,
} from './models/types.js';
export type { IProber } from './interfaces/scanner.js';
export type { IResultSink } from './interfaces/sink.js';
export type { IAuthStrategy } from './interfaces/auth.js';
