export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'SECRETS_ERROR'
  | 'IP_LOOKUP_ERROR'
  | 'CLOUDFLARE_API_ERROR'
  | 'UPDATE_FAILED'
  | 'UNKNOWN_ERROR';

export class CfUpdaterError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends CfUpdaterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class SecretsError extends CfUpdaterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SECRETS_ERROR', details);
  }
}

export class IpLookupError extends CfUpdaterError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'IP_LOOKUP_ERROR', status === undefined ? undefined : { status });
    this.status = status;
  }
}

export interface CloudflareErrorEntry {
  code?: number;
  message: string;
}

export class CloudflareApiError extends CfUpdaterError {
  /** HTTP status, undefined when the request never got a response */
  readonly status?: number;
  readonly errors: CloudflareErrorEntry[];

  constructor(message: string, status?: number, errors: CloudflareErrorEntry[] = []) {
    super(message, 'CLOUDFLARE_API_ERROR', { status, errors });
    this.status = status;
    this.errors = errors;
  }
}

export class ErrorHandler {
  static normalize(error: unknown): CfUpdaterError {
    if (error instanceof CfUpdaterError) {
      return error;
    }
    if (error instanceof Error) {
      const normalized = new CfUpdaterError(error.message, 'UNKNOWN_ERROR', { name: error.name });
      normalized.stack = error.stack;
      return normalized;
    }
    return new CfUpdaterError(String(error), 'UNKNOWN_ERROR');
  }

  static describe(error: unknown): string {
    const normalized = ErrorHandler.normalize(error);
    return normalized.code === 'UNKNOWN_ERROR'
      ? normalized.message
      : `[${normalized.code}] ${normalized.message}`;
  }

  static isRetryableStatus(status: number | undefined): boolean {
    return status === undefined || RETRYABLE_STATUSES.includes(status);
  }
}

export const RETRYABLE_STATUSES: readonly number[] = [408, 429, 500, 502, 503, 504];
