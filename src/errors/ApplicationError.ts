/**
 * Error hierarchy for the subtitle monitor and the drive migration tool.
 *
 * Per-item results of a run (no match, empty payload, not a video) are
 * tagged outcomes, not errors. The classes here describe failures at a
 * collaborator boundary (provider HTTP calls, child processes, the
 * filesystem) and the setup problems that stop a run before it starts.
 *
 * Two families:
 * - OperationalError: something outside the process misbehaved; may be retried
 * - PermanentError:   the setup is wrong; retrying cannot help
 */

export enum ErrorCode {
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  PROVIDER_AUTH_FAILED = 'PROVIDER_AUTH_FAILED',
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',

  CONFIG_INVALID = 'CONFIG_INVALID',

  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',
}

/**
 * Where the error happened, for the log line
 */
export interface ErrorContext {
  /** Component that raised it ('OpenSubtitlesClient', 'LibraryUploader', ...) */
  service?: string;
  /** Method or step ('search', 'flush', 'execFile', ...) */
  operation?: string;
  metadata?: Record<string, unknown>;
}

interface ApplicationErrorOptions {
  isOperational: boolean;
  retryable: boolean;
  context?: ErrorContext | undefined;
  cause?: Error | undefined;
}

export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;
  /** False for setup problems (configuration, missing binaries) */
  public readonly isOperational: boolean;
  /** Consulted by RetryStrategy */
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  declare public readonly cause?: Error;

  protected constructor(message: string, code: ErrorCode, options: ApplicationErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = options.isOperational;
    this.retryable = options.retryable;
    this.context = options.context ?? {};

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
      ...(this.cause && { cause: { name: this.cause.name, message: this.cause.message } }),
    };
  }
}

function withMetadata(context: ErrorContext | undefined, metadata: Record<string, unknown>): ErrorContext {
  return { ...context, metadata: { ...context?.metadata, ...metadata } };
}

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      isOperational: true,
      retryable: false,
      context,
      cause,
    });
  }
}

// --------------------------------------------
// Operational
// --------------------------------------------

export class OperationalError extends ApplicationError {
  constructor(message: string, code: ErrorCode, retryable: boolean, context?: ErrorContext, cause?: Error) {
    super(message, code, { isOperational: true, retryable, context, cause });
  }
}

export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, withMetadata(context, { path }), cause);
  }
}

/** Connection failures and timeouts; always retryable */
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, true, withMetadata(context, { url }), cause);
  }
}

export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, { ...context, service: providerName }, cause);
  }
}

export class RateLimitError extends ProviderError {
  /**
   * @param retryAfter - seconds the provider asked us to wait
   */
  constructor(
    providerName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message ?? `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      true,
      withMetadata(context, { retryAfter })
    );
  }
}

/** Non-auth HTTP error status; 5xx may be retried, 4xx may not */
export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message ?? `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      httpStatusCode >= 500,
      withMetadata(context, { httpStatusCode }),
      cause
    );
  }
}

export class ProviderAuthenticationError extends ProviderError {
  constructor(providerName: string, message?: string, context?: ErrorContext) {
    super(
      message ?? `Authentication rejected by provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_AUTH_FAILED,
      false,
      context
    );
  }
}

// --------------------------------------------
// Permanent
// --------------------------------------------

export class PermanentError extends ApplicationError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, { isOperational: false, retryable: false, context, cause });
  }
}

/**
 * Invalid settings, or a path the run depends on (history log, library
 * root) that is missing. Raised before any entry is processed.
 */
export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(message ?? `Configuration error: ${configKey}`, ErrorCode.CONFIG_INVALID, withMetadata(context, { configKey }));
  }
}

/** A child process (guessit, rclone, odrive) exited unsuccessfully */
export class ProcessError extends PermanentError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number | null,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message ?? `Process '${processName}' failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      withMetadata(context, { processName, exitCode }),
      cause
    );
  }
}

/** An external binary could not be started at all */
export class DependencyError extends PermanentError {
  constructor(
    public readonly dependency: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message ?? `Missing or invalid dependency: ${dependency}`,
      ErrorCode.SYSTEM_DEPENDENCY_MISSING,
      withMetadata(context, { dependency }),
      cause
    );
  }
}
