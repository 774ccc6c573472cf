/**
 * Custom error classes for better error handling
 */

/**
 * Base error class for application-specific errors
 */
export class AppError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors (env vars, chain and label files, invalid chain entries)
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
  }
}

/**
 * Transport-level failure of a chain's log stream
 */
export class ConnectionError extends AppError {
  constructor(
    message: string,
    public readonly chainId: string,
    cause?: Error
  ) {
    super(`Connection error: ${message}`, { cause });
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A log record that does not have the shape of an ERC-20 Transfer
 */
export class DecodeError extends AppError {
  constructor(message: string, public readonly txHash: string | null = null) {
    super(`Decode error: ${message}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap whatever a transport threw into a ConnectionError for the given chain
 */
export function toConnectionError(chainId: string, error: unknown): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ConnectionError(`${chainId}: ${cause.message}`, chainId, cause);
}
