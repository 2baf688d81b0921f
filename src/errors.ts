/**
 * Error types for the content tracker client.
 *
 * Every failure surfaced by this package is a ContentTrackerError; the
 * `code` field tells the kinds apart without instanceof checks.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ErrorCode =
  | 'SPECIFIER_PARSE'
  | 'CONNECTION'
  | 'ENCODING'
  | 'DECODING'
  | 'RESPONSE_TOO_LARGE'
  | 'CONFIG';

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all content tracker errors.
 */
export class ContentTrackerError extends Error {
  /** Machine-readable error kind */
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ContentTrackerError';
    this.code = code;
  }
}

/**
 * Error thrown when a string is not a hash, a content address or a ticket.
 */
export class SpecifierParseError extends ContentTrackerError {
  /** The rejected input */
  readonly input: string;

  constructor(message: string, input: string, options?: ErrorOptions) {
    super('SPECIFIER_PARSE', message, options);
    this.name = 'SpecifierParseError';
    this.input = input;
  }
}

/**
 * Error thrown when a connection or stream to a peer fails.
 */
export class ConnectionError extends ContentTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONNECTION', message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when a value cannot be encoded to the wire format.
 */
export class EncodingError extends ContentTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super('ENCODING', message, options);
    this.name = 'EncodingError';
  }
}

/**
 * Error thrown when received bytes are not a valid message.
 */
export class DecodingError extends ContentTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super('DECODING', message, options);
    this.name = 'DecodingError';
  }
}

/**
 * Error thrown when a peer sends more than the response size cap.
 */
export class ResponseTooLargeError extends ContentTrackerError {
  /** The cap in bytes that was exceeded */
  readonly limit: number;

  constructor(limit: number) {
    super('RESPONSE_TOO_LARGE', `Response exceeded ${limit} bytes`);
    this.name = 'ResponseTooLargeError';
    this.limit = limit;
  }
}

/**
 * Error thrown when a configuration value is invalid.
 */
export class ConfigError extends ContentTrackerError {
  /** The offending configuration key */
  readonly key: string;

  constructor(message: string, key: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
    this.key = key;
  }
}
