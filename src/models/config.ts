/**
 * Destinations a successful payload can be sent to
 */
export enum OutputMode {
  FILE = 'file',
  STDOUT = 'stdout',
}

export const DEFAULT_TIMEOUT_SECONDS = 3;
export const DEFAULT_USERNAME = 'admin';
export const DEFAULT_PASSWORD = 'admin';

/**
 * Configuration interface representing all CLI options and settings
 */
export interface Config {
  // Target sources
  ipInput?: string;
  ipFile?: string;

  // Probing
  timeout: number; // seconds per HTTP call
  username: string;
  password: string;
  verifyTls: boolean;

  // Output
  output: OutputMode;
  outputDir: string;

  // Debug and logging
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Raw CLI arguments interface
 */
export interface CliArgs {
  ipInput?: string;
  ipFile?: string;
  timeout?: number;
  output?: string;
  outputDir?: string;
  verifyTls?: boolean;
  username?: string;
  password?: string;
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Builder class for creating and validating configuration objects
 */
export class ConfigBuilder {
  private config: Partial<Config> = {};

  /**
   * Set the single address or CIDR range to sweep
   */
  setIpInput(ipInput: string): ConfigBuilder {
    if (ipInput.trim() === '') {
      throw new ConfigValidationError('IP input cannot be empty');
    }
    this.config.ipInput = ipInput.trim();
    return this;
  }

  /**
   * Set the path of a newline-delimited host list
   */
  setIpFile(ipFile: string): ConfigBuilder {
    if (ipFile.trim() === '') {
      throw new ConfigValidationError('IP file path cannot be empty');
    }
    this.config.ipFile = ipFile;
    return this;
  }

  /**
   * Set the per-request timeout in seconds
   */
  setTimeout(timeout: number): ConfigBuilder {
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigValidationError(`Invalid timeout: ${timeout}. Must be a positive number of seconds`);
    }
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Set the output mode
   */
  setOutput(output: string): ConfigBuilder {
    if (!isOutputMode(output)) {
      throw new ConfigValidationError(
        `Invalid output: ${output}. Must be one of: ${Object.values(OutputMode).join(', ')}`
      );
    }
    this.config.output = output;
    return this;
  }

  /**
   * Set the directory records are written to and looked up in
   */
  setOutputDir(outputDir: string): ConfigBuilder {
    if (outputDir.trim() === '') {
      throw new ConfigValidationError('Output directory cannot be empty');
    }
    this.config.outputDir = outputDir;
    return this;
  }

  /**
   * Set the basic-auth credential sent to every endpoint.
   * An empty username sends requests without an Authorization header.
   */
  setCredentials(username: string, password: string): ConfigBuilder {
    this.config.username = username;
    this.config.password = password;
    return this;
  }

  setVerifyTls(verifyTls: boolean): ConfigBuilder {
    this.config.verifyTls = verifyTls;
    return this;
  }

  setVerbose(verbose: boolean): ConfigBuilder {
    this.config.verbose = verbose;
    return this;
  }

  setDebug(debug: boolean): ConfigBuilder {
    this.config.debug = debug;
    return this;
  }

  /**
   * Create configuration from CLI arguments
   */
  static fromCliArgs(args: CliArgs): Config {
    const builder = new ConfigBuilder();

    if (args.ipInput !== undefined) {
      builder.setIpInput(args.ipInput);
    }
    if (args.ipFile !== undefined) {
      builder.setIpFile(args.ipFile);
    }
    if (args.timeout !== undefined) {
      builder.setTimeout(args.timeout);
    }
    if (args.output !== undefined) {
      builder.setOutput(args.output);
    }
    if (args.outputDir !== undefined) {
      builder.setOutputDir(args.outputDir);
    }
    if (args.username !== undefined || args.password !== undefined) {
      builder.setCredentials(args.username ?? DEFAULT_USERNAME, args.password ?? DEFAULT_PASSWORD);
    }
    if (args.verifyTls !== undefined) {
      builder.setVerifyTls(args.verifyTls);
    }
    if (args.verbose !== undefined) {
      builder.setVerbose(args.verbose);
    }
    if (args.debug !== undefined) {
      builder.setDebug(args.debug);
    }

    return builder.build();
  }

  /**
   * Build and validate the final configuration
   */
  build(): Config {
    this.setDefaults();
    this.validate();

    return {
      ipInput: this.config.ipInput,
      ipFile: this.config.ipFile,
      timeout: this.config.timeout ?? DEFAULT_TIMEOUT_SECONDS,
      username: this.config.username ?? DEFAULT_USERNAME,
      password: this.config.password ?? DEFAULT_PASSWORD,
      verifyTls: this.config.verifyTls ?? false,
      output: this.config.output ?? OutputMode.STDOUT,
      outputDir: this.config.outputDir ?? '.',
      verbose: this.config.verbose,
      debug: this.config.debug,
    };
  }

  /**
   * Validate the complete configuration
   */
  private validate(): void {
    if (!this.config.ipInput && !this.config.ipFile) {
      throw new ConfigValidationError('At least one of --ip_input or --ip_file is required');
    }
  }

  /**
   * Set default values for optional configuration
   */
  private setDefaults(): void {
    if (this.config.debug && this.config.verbose === undefined) {
      this.config.verbose = true;
    }
  }
}

function isOutputMode(value: string): value is OutputMode {
  return Object.values<string>(OutputMode).includes(value);
}
