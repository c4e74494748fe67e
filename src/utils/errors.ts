export enum ErrorCode {
  // Authentication Errors (1xxx)
  INVALID_CREDENTIALS = 1001,
  MISSING_SESSION = 1002,

  // Transport Errors (2xxx)
  REQUEST_FAILED = 2001,
  REQUEST_TIMEOUT = 2002,
  UNEXPECTED_STATUS = 2003,

  // Markup Errors (3xxx)
  UPTIME_UNPARSABLE = 3001,
  ROW_UNPARSABLE = 3101,

  // Configuration Errors (4xxx)
  CONFIG_INVALID = 4001,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

interface ExporterErrorOptions {
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class ExporterError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: ExporterErrorOptions & { recoverable?: boolean }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ExporterError';
    this.code = code;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, ExporterError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause : undefined,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: Error, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): ExporterError {
    if (err instanceof ExporterError) return err;
    return new ExporterError(code, err.message, { cause: err });
  }
}

/** Login rejected by the device: bad credentials or no usable session cookie. */
export class AuthError extends ExporterError {
  constructor(
    code: ErrorCode.INVALID_CREDENTIALS | ErrorCode.MISSING_SESSION,
    message: string,
    options?: ExporterErrorOptions
  ) {
    super(code, message, { ...options, recoverable: false });
    this.name = 'AuthError';
  }
}

export class TransportError extends ExporterError {
  constructor(
    code: ErrorCode.REQUEST_FAILED | ErrorCode.REQUEST_TIMEOUT | ErrorCode.UNEXPECTED_STATUS,
    message: string,
    options?: ExporterErrorOptions
  ) {
    super(code, message, { ...options, recoverable: false });
    this.name = 'TransportError';
  }
}

/**
 * The page no longer has the shape the selectors expect. Every other value
 * read from the same page is suspect, so this aborts the scrape.
 */
export class MarkupShapeError extends ExporterError {
  constructor(message: string, options?: ExporterErrorOptions) {
    super(ErrorCode.UPTIME_UNPARSABLE, message, { ...options, recoverable: false });
    this.name = 'MarkupShapeError';
  }
}

export class RowParseError extends ExporterError {
  constructor(message: string, options?: ExporterErrorOptions) {
    super(ErrorCode.ROW_UNPARSABLE, message, { ...options, recoverable: true });
    this.name = 'RowParseError';
  }
}

export class ConfigurationError extends ExporterError {
  constructor(message: string, options?: ExporterErrorOptions) {
    super(ErrorCode.CONFIG_INVALID, message, { ...options, recoverable: false });
    this.name = 'ConfigurationError';
  }
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof ExporterError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

export interface ErrorReport {
  success: false;
  error: string;
  code: ErrorCode;
  context?: Record<string, unknown> | undefined;
}

/** Shape printed by the CLI when a command fails. */
export function errorReport(value: unknown): ErrorReport {
  const { code, message, context } = ExporterError.fromError(toError(value)).toJSON();
  return { success: false, error: message, code, context };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
