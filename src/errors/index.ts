export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
  ValidationError,
  OperationalError,
  FileSystemError,
  NetworkError,
  ProviderError,
  RateLimitError,
  ProviderServerError,
  ProviderAuthenticationError,
  PermanentError,
  ConfigurationError,
  ProcessError,
  DependencyError,
} from './ApplicationError.js';

export {
  RetryStrategy,
  NETWORK_RETRY_POLICY,
  extractRetryAfter,
  type RetryPolicy,
  type RetryResult,
} from './RetryStrategy.js';
