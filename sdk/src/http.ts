import axios, { AxiosError, type AxiosInstance, type RawAxiosRequestHeaders } from 'axios';
import type { HttpClientConfig } from './types.js';

export const DEFAULT_TIMEOUT = 30000;

/**
 * Every status resolves: callers inspect `response.status` themselves.
 * Only transport failures (DNS, refused connection, timeout) reject.
 */
export function createHttpClient(
  baseURL: string | undefined,
  config: HttpClientConfig,
  headers: RawAxiosRequestHeaders = {},
): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    validateStatus: () => true,
    ...(config.adapter ? { adapter: config.adapter } : {}),
  });
}

export function describeTransportError(error: unknown): string {
  if (error instanceof AxiosError) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
