import { ErrorHandler, logger } from '@cfupdater/utils';
import { CloudflareClient } from './cloudflare-client.js';
import { IpLookupClient } from './ip-lookup.js';
import { DnsVerifier, type Resolve4 } from './dns-verifier.js';
import type {
  CloudflareCredentials,
  HttpClientConfig,
  RunOptions,
  UpdateResult,
  UpdaterConfig,
} from './types.js';

export interface DnsUpdaterOptions {
  client: Pick<CloudflareClient, 'findARecord' | 'updateRecord' | 'createRecord'>;
  ipLookup: Pick<IpLookupClient, 'getPublicIp'>;
  verifier: Pick<DnsVerifier, 'verify'>;
  recordName: string;
  ttl?: number;
  proxied?: boolean;
}

/**
 * Reconciles one A record against this host's public address.
 */
export class DnsUpdater {
  constructor(private readonly options: DnsUpdaterOptions) {}

  get recordName(): string {
    return this.options.recordName;
  }

  async run(runOptions: RunOptions = {}): Promise<UpdateResult> {
    const { client, ipLookup, recordName } = this.options;
    const { force = false, verify = true } = runOptions;

    let ip: string;
    try {
      ip = await ipLookup.getPublicIp();
    } catch (error) {
      logger.error('Failed to get current IP address', error);
      return { status: 'failed', recordName, error: ErrorHandler.describe(error) };
    }

    logger.info(`Current IP address: ${ip}`);

    try {
      const existing = await client.findARecord(recordName);

      if (existing && existing.content === ip && !force) {
        logger.info(`DNS record ${recordName} already points to ${ip}, nothing to do`);
        return { status: 'unchanged', recordName, ip, recordId: existing.id };
      }

      const input = {
        name: recordName,
        content: ip,
        ttl: this.options.ttl,
        proxied: this.options.proxied,
      };

      let result: UpdateResult;
      if (existing) {
        logger.info(`Updating existing DNS record with ID: ${existing.id}`);
        const record = await client.updateRecord(existing.id, input);
        logger.success(`Successfully updated DNS record to ${ip}`);
        result = { status: 'updated', recordName, ip, recordId: record.id };
      } else {
        logger.info(`No existing record found. Creating a new DNS record for ${recordName}`);
        const record = await client.createRecord(input);
        logger.success(`Successfully created new DNS record for ${recordName} with IP ${ip}`);
        result = { status: 'created', recordName, ip, recordId: record.id };
      }

      if (verify) {
        result.verified = await this.options.verifier.verify(recordName, ip);
      }
      return result;
    } catch (error) {
      logger.error(`Failed to reconcile DNS record ${recordName}`, error);
      return { status: 'failed', recordName, ip, error: ErrorHandler.describe(error) };
    }
  }
}

/**
 * Wires the clients for one record from loaded configuration.
 */
export function createDnsUpdater(
  config: UpdaterConfig,
  credentials: CloudflareCredentials,
  http: Pick<HttpClientConfig, 'adapter'> = {},
  resolve4?: Resolve4,
): DnsUpdater {
  const httpConfig: HttpClientConfig = {
    timeout: config.timeout,
    retryAttempts: config.retryAttempts,
    retryDelay: config.retryDelay,
    adapter: http.adapter,
  };

  return new DnsUpdater({
    client: new CloudflareClient({
      ...httpConfig,
      apiToken: credentials.apiToken,
      zoneId: credentials.zoneId,
      baseUrl: config.apiBaseUrl,
    }),
    ipLookup: new IpLookupClient(config.ipLookupUrl, httpConfig),
    verifier: new DnsVerifier(config.verifyDelay, resolve4),
    recordName: credentials.recordName,
    ttl: config.ttl,
    proxied: config.proxied,
  });
}
