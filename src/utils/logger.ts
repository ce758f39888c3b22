import chalk from 'chalk';

export interface LoggerOptions {
  enableDebug?: boolean;
}

class Logger {
  private debugEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.enableDebug ?? process.env.DEBUG === 'true';
  }

  /**
   * Log an informational message
   */
  info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  /**
   * Log a success message
   */
  success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  /**
   * Log a warning message
   */
  warn(message: string): void {
    console.log(chalk.yellow('⚠'), message);
  }

  /**
   * Log an error message
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red('✗'), message);
    if (error && this.debugEnabled) {
      console.error(chalk.red(error.stack || error.message));
    }
  }

  /**
   * Log a debug message (only shown when debug is enabled)
   */
  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(chalk.gray('🐛'), chalk.gray(message));
    }
  }

  /**
   * Log a section header
   */
  section(title: string): void {
    console.log();
    console.log(chalk.bold.cyan(`── ${title} ──`));
  }

  /**
   * Log raw text without formatting
   */
  raw(message: string): void {
    console.log(message);
  }

  /**
   * Enable or disable debug logging
   */
  setDebugEnabled(enabled: boolean): void {
    this.debugEnabled = enabled;
  }
}

// Create a default logger instance
const logger = new Logger();

export const setDebugEnabled = (enabled: boolean) => logger.setDebugEnabled(enabled);

// Export the Logger class for custom instances
export { Logger };

// Export the default logger instance
export default logger;
