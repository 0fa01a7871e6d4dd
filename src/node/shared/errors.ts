/**
 * Custom error classes for the branch tree pipeline.
 * Provides typed errors for the ways an input or a configuration can be rejected.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when an input line does not split into the expected number of fields.
 */
export class MalformedRecordError extends AppError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly fieldCount: number
  ) {
    super(message)
    this.name = 'MalformedRecordError'
  }
}

/**
 * Error thrown when upstream tracking forms a loop (A tracks B, B tracks A).
 */
export class CyclicUpstreamError extends AppError {
  constructor(
    message: string,
    public readonly cycle: string[]
  ) {
    super(message)
    this.name = 'CyclicUpstreamError'
  }
}

/**
 * Error thrown when a configuration value is not one of the accepted values.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
