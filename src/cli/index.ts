#!/usr/bin/env node

import chalk from 'chalk';
import dotenv from 'dotenv';
import { ConfigBuilder, ConfigValidationError } from '../models/config.js';
import type { Config } from '../models/config.js';
import { isSweepError } from '../errors/error-types.js';
import { createAuthStrategy } from '../auth/strategies.js';
import { runDiscovery, getRunSummary, hasStartupErrors } from '../core/app.js';
import type { RunResult } from '../core/app.js';
import { setDebugEnabled } from '../utils/logger.js';
import { createProgram, packageInfo, parseCliArguments, shouldShowHelp } from './program.js';
import type { CliOptions } from './program.js';

// Load environment variables from .env file
dotenv.config();

/**
 * Main CLI program setup and execution
 */
async function main(): Promise<void> {
  const program = createProgram();

  // Set up the main action handler
  program.action(async (options: CliOptions) => {
    if (shouldShowHelp(options)) {
      program.outputHelp();
      process.exit(0);
    }

    try {
      const config = ConfigBuilder.fromCliArgs(parseCliArguments(options));
      setDebugEnabled(config.verbose ?? false);
      displayStartup(config);

      const result = await runDiscovery(config);
      displayResults(result);

      process.exit(hasStartupErrors(result) ? 1 : 0);
    } catch (error) {
      handleError(error, options.debug);
      process.exit(1);
    }
  });

  // Parse command line arguments
  await program.parseAsync(process.argv);
}

function displayStartup(config: Config): void {
  console.log(chalk.blue.bold(`\n${packageInfo.name} v${packageInfo.version}`));
  console.log(chalk.gray('Running script to fetch data from API endpoints.'));
  console.log(chalk.gray(`Options chosen: Timeout = ${config.timeout} seconds, Output = ${config.output}`));
  if (config.verbose) {
    console.log(chalk.gray(`Auth: ${createAuthStrategy(config.username, config.password).getDescription()}`));
    console.log(chalk.gray(`TLS verification: ${config.verifyTls ? 'on' : 'off'}`));
  }
  console.log();
}

/**
 * Display sweep results
 */
function displayResults(result: RunResult): void {
  console.log();
  const color = result.sourceErrors.length > 0 ? chalk.yellow : chalk.green;
  console.log(color.bold(getRunSummary(result)));
}

/**
 * Handle and display errors appropriately
 */
function handleError(error: unknown, debug: boolean = false): void {
  console.log(); // Add spacing

  if (error instanceof ConfigValidationError) {
    console.log(chalk.red.bold('Configuration Error'));
    console.log(chalk.red(error.message));
    console.log();
    console.log(chalk.yellow('Tip: Use --help to see all available options and examples'));
  } else if (isSweepError(error)) {
    console.log(chalk.red.bold(`Error ${error.code}`));
    console.log(chalk.red(error.message));

    if (debug) {
      console.log();
      console.log(chalk.gray('Debug information:'));
      console.log(chalk.gray(JSON.stringify(error.serialize(), null, 2)));
    }
  } else if (error instanceof Error) {
    console.log(chalk.red.bold('Error'));
    console.log(chalk.red(error.message));

    if (debug) {
      console.log();
      console.log(chalk.gray('Debug information:'));
      console.log(chalk.gray(error.stack || 'No stack trace available'));
    }
  } else {
    console.log(chalk.red.bold('Unknown Error'));
    console.log(chalk.red('An unexpected error occurred'));

    if (debug) {
      console.log();
      console.log(chalk.gray('Debug information:'));
      console.log(chalk.gray(JSON.stringify(error, null, 2)));
    }
  }
}

/**
 * Handle uncaught exceptions and unhandled rejections
 */
process.on('uncaughtException', (error) => {
  console.log(chalk.red.bold('\nUncaught Exception'));
  console.log(chalk.red(error.message));
  console.log(chalk.gray('\nThe application will now exit.'));
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.log(chalk.red.bold('\nUnhandled Promise Rejection'));
  console.log(chalk.red(reason instanceof Error ? reason.message : String(reason)));
  console.log(chalk.gray('\nThe application will now exit.'));
  process.exit(1);
});

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\nProcess interrupted by user'));
  process.exit(130);
});

process.on('SIGTERM', () => {
  console.log(chalk.yellow('\n\nProcess terminated'));
  process.exit(143);
});

// Run the main function
main().catch((error) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

export { main };
