import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import { CloudflareApiError, ErrorHandler, logger, retry } from '@cfupdater/utils';
import { createHttpClient, describeTransportError } from './http.js';
import { DEFAULT_API_BASE_URL } from './config.js';
import type { ARecordInput, CloudflareConfig, CloudflareEnvelope, DnsRecord } from './types.js';

export class CloudflareClient {
  private api: AxiosInstance;
  private config: CloudflareConfig;

  constructor(config: CloudflareConfig) {
    this.config = {
      ...config,
      baseUrl: config.baseUrl ?? DEFAULT_API_BASE_URL,
      timeout: config.timeout ?? 30000,
      retryAttempts: config.retryAttempts ?? 3,
      retryDelay: config.retryDelay ?? 1000,
    };

    this.api = createHttpClient(this.config.baseUrl, this.config, {
      Authorization: `Bearer ${this.config.apiToken}`,
    });
  }

  get zoneId(): string {
    return this.config.zoneId;
  }

  // DNS records

  async listRecords(name: string): Promise<DnsRecord[]> {
    const result = await this.request<DnsRecord[]>('GET', this.recordsPath(), 'list DNS records', {
      params: { name },
    });
    return result ?? [];
  }

  /**
   * The A record whose name matches exactly, or null when the zone has none.
   */
  async findARecord(name: string): Promise<DnsRecord | null> {
    const records = await this.listRecords(name);

    if (records.length === 0) {
      logger.warn(`No DNS records found with name ${name}`);
      return null;
    }

    const record = records.find((r) => r.type === 'A' && r.name === name);
    if (!record) {
      logger.warn(`No matching A record found for ${name}`);
      return null;
    }

    logger.info(`Found DNS record ID for ${name}: ${record.id}`);
    return record;
  }

  async updateRecord(recordId: string, input: ARecordInput): Promise<DnsRecord> {
    const record = await this.request<DnsRecord>('PUT', this.recordsPath(recordId), 'update DNS record', {
      data: toRecordBody(input),
    });
    return this.expectRecord(record, 'update DNS record');
  }

  async createRecord(input: ARecordInput): Promise<DnsRecord> {
    const record = await this.request<DnsRecord>('POST', this.recordsPath(), 'create DNS record', {
      data: toRecordBody(input),
    });
    return this.expectRecord(record, 'create DNS record');
  }

  // Transport

  private recordsPath(recordId?: string): string {
    const base = `/zones/${encodeURIComponent(this.config.zoneId)}/dns_records`;
    return recordId ? `${base}/${encodeURIComponent(recordId)}` : base;
  }

  private expectRecord(record: DnsRecord | null, action: string): DnsRecord {
    if (!record) {
      throw new CloudflareApiError(`Failed to ${action}: response contained no record`, 200);
    }
    return record;
  }

  private request<T>(
    method: Method,
    url: string,
    action: string,
    options: { params?: Record<string, string>; data?: unknown } = {},
  ): Promise<T | null> {
    return retry(() => this.send<T>(method, url, action, options), {
      maxRetries: this.config.retryAttempts,
      baseDelay: this.config.retryDelay,
      shouldRetry: (error) => error instanceof CloudflareApiError && ErrorHandler.isRetryableStatus(error.status),
      onRetry: (attempt, error) => {
        logger.warn(`Retrying ${action} (attempt ${attempt})`, { error: ErrorHandler.describe(error) });
      },
    });
  }

  private async send<T>(
    method: Method,
    url: string,
    action: string,
    options: { params?: Record<string, string>; data?: unknown },
  ): Promise<T | null> {
    let response: AxiosResponse<Partial<CloudflareEnvelope<T>> | undefined>;
    try {
      response = await this.api.request<Partial<CloudflareEnvelope<T>> | undefined>({ method, url, ...options });
    } catch (error) {
      throw new CloudflareApiError(`Failed to ${action}: ${describeTransportError(error)}`);
    }

    const body = typeof response.data === 'object' ? response.data : undefined;
    const ok = response.status >= 200 && response.status < 300;

    if (!ok || !body || body.success !== true) {
      const errors = body && Array.isArray(body.errors) ? body.errors : [];
      const message = errors[0]?.message ?? 'Unknown error';
      throw new CloudflareApiError(`Failed to ${action}: ${message}`, response.status, errors);
    }

    return body.result ?? null;
  }
}

function toRecordBody(input: ARecordInput) {
  return {
    type: 'A',
    name: input.name,
    content: input.content,
    ttl: input.ttl ?? 1, // 1 = automatic
    proxied: input.proxied ?? false,
  };
}
