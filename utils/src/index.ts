export { logger, Logger } from './logger.js';
export type { LogMeta } from './logger.js';
export {
  ErrorHandler,
  CfUpdaterError,
  ConfigError,
  SecretsError,
  IpLookupError,
  CloudflareApiError,
  RETRYABLE_STATUSES,
} from './error-handler.js';
export type { ErrorCode, CloudflareErrorEntry } from './error-handler.js';
export { ConfigManager } from './config.js';
export { Validator } from './validator.js';
export { retry, sleep, timeout, backoffDelay } from './async-utils.js';
export type { RetryOptions } from './async-utils.js';
