/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when required environment variables are missing
 * or a value cannot be parsed
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
    cause?: Error,
  ) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Exchange error - thrown when any call to the exchange fails
 * (network, rejected order, rate limit, bad symbol)
 */
export class ExchangeError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly symbol?: string,
    cause?: Error,
  ) {
    super(message, "EXCHANGE_ERROR", cause);
  }
}
