/**
 * Custom error types for the device sweep
 * Categorizes failures so callers can report them with host and endpoint context
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  INPUT = 'input',
  NETWORK = 'network',
  RESPONSE = 'response',
  OUTPUT = 'output'
}

/**
 * Specific error codes for different error types
 */
export enum ErrorCode {
  // Input errors (1000-1999)
  INPUT_INVALID_ADDRESS = 1001,
  INPUT_FILE_UNREADABLE = 1002,

  // Network errors (2000-2999)
  NETWORK_TIMEOUT = 2001,
  NETWORK_TRANSPORT_FAILED = 2002,

  // Response errors (3000-3999)
  RESPONSE_HTTP_STATUS = 3001,
  RESPONSE_NOT_JSON = 3002,

  // Output errors (4000-4999)
  OUTPUT_WRITE_FAILED = 4001
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  host?: string;
  endpoint?: string;
  path?: string;
}

/**
 * Serialized error format for logging and debugging
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  context?: ErrorContext;
  stack?: string;
  timestamp: string;
  cause?: {
    name: string;
    message: string;
  };
}

/**
 * Base error class for all sweep errors
 */
export abstract class SweepError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging and debugging
   */
  public serialize(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
      stack: this.stack,
      timestamp: this.timestamp.toISOString(),
      cause: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message
      } : undefined
    };
  }
}

/**
 * Address or CIDR input that has no valid interpretation
 */
export class InvalidInputError extends SweepError {
  constructor(input: string, reason?: string) {
    super(
      reason ? `Invalid IP or IP range provided: ${input} (${reason})` : `Invalid IP or IP range provided: ${input}`,
      ErrorCode.INPUT_INVALID_ADDRESS,
      ErrorCategory.INPUT
    );
  }
}

/**
 * Host list file that is missing or unreadable
 */
export class FileReadError extends SweepError {
  constructor(path: string, originalError?: Error) {
    super(
      `Failed to read host file ${path}: ${originalError?.message ?? 'Unknown error'}`,
      ErrorCode.INPUT_FILE_UNREADABLE,
      ErrorCategory.INPUT,
      { path },
      originalError
    );
  }
}

export class HttpStatusError extends SweepError {
  public readonly status: number;

  constructor(status: number, context: ErrorContext) {
    super(`HTTP ${status}`, ErrorCode.RESPONSE_HTTP_STATUS, ErrorCategory.RESPONSE, context);
    this.status = status;
  }
}

export class ProbeTimeoutError extends SweepError {
  constructor(timeoutMs: number, context: ErrorContext, originalError?: Error) {
    super(
      `Request timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      ErrorCategory.NETWORK,
      context,
      originalError
    );
  }
}

export class TransportError extends SweepError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.NETWORK_TRANSPORT_FAILED, ErrorCategory.NETWORK, context, originalError);
  }
}

/**
 * Response body that could not be parsed as JSON
 */
export class SerializationError extends SweepError {
  constructor(context: ErrorContext, originalError?: Error) {
    super(
      `Response is not valid JSON${originalError ? `: ${originalError.message}` : ''}`,
      ErrorCode.RESPONSE_NOT_JSON,
      ErrorCategory.RESPONSE,
      context,
      originalError
    );
  }
}

export class OutputWriteError extends SweepError {
  constructor(path: string, host: string, originalError?: Error) {
    super(
      `Failed to write ${path}: ${originalError?.message ?? 'Unknown error'}`,
      ErrorCode.OUTPUT_WRITE_FAILED,
      ErrorCategory.OUTPUT,
      { host, path },
      originalError
    );
  }
}

/**
 * Type guard for sweep errors
 */
export function isSweepError(error: unknown): error is SweepError {
  return error instanceof SweepError;
}

/**
 * Extracts a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Narrows a thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
