import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { DEFAULT_TIMEOUT_SECONDS, OutputMode } from '../models/config.js';
import type { CliArgs } from '../models/config.js';

// Package information
export const packageInfo = {
  name: 'device-sweep',
  version: '1.0.0',
  description: 'Fetches data from device REST endpoints for a single IP, a CIDR range or a list of hosts, and saves what it finds to response_<host>.yaml'
};

/**
 * Options as commander hands them to the action
 */
export interface CliOptions {
  ip_input?: string;
  ip_file?: string;
  timeout: number;
  output: string;
  outputDir: string;
  verifyTls: boolean;
  verbose: boolean;
  debug: boolean;
}

/**
 * Parse a positive number of seconds
 */
export function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  }
  return seconds;
}

/**
 * Nothing to sweep: the CLI prints usage and exits successfully
 */
export function shouldShowHelp(options: Pick<CliOptions, 'ip_input' | 'ip_file'>): boolean {
  return !options.ip_input && !options.ip_file;
}

/**
 * Build the commander program without running it
 */
export function createProgram(): Command {
  const program = new Command();

  // Configure the CLI program
  program
    .name(packageInfo.name)
    .description(packageInfo.description)
    .version(packageInfo.version, '-v, --version', 'display version number')
    .helpOption('-h, --help', 'display help for command');

  // Define command-line options
  program
    .option(
      '--ip_input <address>',
      'single IP address or IP range in CIDR format (e.g., 192.168.1.0/24)'
    )
    .option(
      '--ip_file <path>',
      'text file containing a list of IP addresses, one per line'
    )
    .option(
      '--timeout <seconds>',
      'timeout for each API request in seconds',
      parseTimeout,
      DEFAULT_TIMEOUT_SECONDS
    )
    .option(
      '--output <mode>',
      `where results go: "${OutputMode.FILE}" writes response_<host>.yaml, "${OutputMode.STDOUT}" prints them`,
      OutputMode.STDOUT
    )
    .option(
      '--output-dir <dir>',
      'directory response files are written to and checked for known devices',
      '.'
    )
    .option(
      '--verify-tls',
      'verify device TLS certificates (off by default)',
      false
    )
    .option(
      '--verbose',
      'enable verbose logging',
      false
    )
    .option(
      '--debug',
      'enable debug mode with detailed error information',
      false
    );

  // Add examples to help text
  program.addHelpText('after', `

${chalk.bold('Examples:')}
  ${chalk.cyan('# Probe a single device and print what it returns')}
  $ device-sweep --ip_input 10.0.0.5

  ${chalk.cyan('# Sweep a subnet and save every answer to response_<host>.yaml')}
  $ device-sweep --ip_input 10.0.0.0/24 --output file

  ${chalk.cyan('# Sweep hosts listed in a file with a longer timeout')}
  $ device-sweep --ip_file hosts.txt --timeout 10

${chalk.bold('Environment Variables:')}
  ${chalk.yellow('DEVICE_SWEEP_USERNAME')}  Basic-auth user sent to every device (default: admin)
  ${chalk.yellow('DEVICE_SWEEP_PASSWORD')}  Basic-auth password sent to every device (default: admin)
  ${chalk.yellow('DEBUG')}                  Enable debug mode (alternative to --debug)
`);

  return program;
}

/**
 * Parse CLI options into CliArgs format
 */
export function parseCliArguments(options: CliOptions, env: NodeJS.ProcessEnv = process.env): CliArgs {
  // Get debug mode from option or environment variable
  const debug = options.debug || env.DEBUG === 'true';

  return {
    ipInput: options.ip_input,
    ipFile: options.ip_file,
    timeout: options.timeout,
    output: options.output,
    outputDir: options.outputDir,
    verifyTls: options.verifyTls,
    username: env.DEVICE_SWEEP_USERNAME,
    password: env.DEVICE_SWEEP_PASSWORD,
    verbose: options.verbose || debug,
    debug,
  };
}
