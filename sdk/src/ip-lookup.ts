import type { AxiosInstance, AxiosResponse } from 'axios';
import { ErrorHandler, IpLookupError, Validator, logger, retry } from '@cfupdater/utils';
import { createHttpClient, describeTransportError } from './http.js';
import { DEFAULT_IP_LOOKUP_URL } from './config.js';
import type { HttpClientConfig, SpeedTestMeta } from './types.js';

/**
 * Finds this host's public IPv4 address from Cloudflare's speed-test
 * metadata endpoint, which echoes the caller's address as `clientIp`.
 */
export class IpLookupClient {
  private api: AxiosInstance;

  constructor(
    private readonly url: string = DEFAULT_IP_LOOKUP_URL,
    private readonly config: HttpClientConfig = {},
  ) {
    this.api = createHttpClient(undefined, config);
  }

  async getPublicIp(): Promise<string> {
    return retry(() => this.fetchOnce(), {
      maxRetries: this.config.retryAttempts ?? 3,
      baseDelay: this.config.retryDelay ?? 1000,
      shouldRetry: (error) => error instanceof IpLookupError && ErrorHandler.isRetryableStatus(error.status),
      onRetry: (attempt, error) => {
        logger.warn(`Retrying IP lookup (attempt ${attempt})`, { error: ErrorHandler.describe(error) });
      },
    });
  }

  private async fetchOnce(): Promise<string> {
    let response: AxiosResponse<SpeedTestMeta | undefined>;
    try {
      response = await this.api.get<SpeedTestMeta | undefined>(this.url);
    } catch (error) {
      throw new IpLookupError(`Error getting IP: ${describeTransportError(error)}`);
    }

    if (response.status !== 200) {
      throw new IpLookupError(`Failed to get IP: HTTP ${response.status}`, response.status);
    }

    const clientIp = response.data?.clientIp;
    if (typeof clientIp !== 'string' || clientIp.length === 0) {
      throw new IpLookupError('IP lookup response did not include clientIp', response.status);
    }
    if (!Validator.isIPv4(clientIp)) {
      throw new IpLookupError(`Public address ${clientIp} is not an IPv4 address`, response.status);
    }

    return clientIp;
  }
}
