import type { AxiosAdapter } from 'axios';
import type { CloudflareErrorEntry } from '@cfupdater/utils';

export interface SecretReferences {
  apiToken: string;
  zoneId: string;
  recordName: string;
}

export interface UpdaterConfig {
  onePassword: {
    serviceAccountToken?: string;
    references: SecretReferences;
  };
  direct: Partial<CloudflareCredentials>;
  apiBaseUrl: string;
  ipLookupUrl: string;
  timeout: number;
  retryAttempts: number;
  retryDelay: number;
  verifyDelay: number;
  ttl: number;
  proxied: boolean;
}

export interface CloudflareCredentials {
  apiToken: string;
  zoneId: string;
  recordName: string;
}

export interface HttpClientConfig {
  timeout?: number;
  retryAttempts?: number;
  retryDelay?: number;
  /** Replaces axios' network adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

export interface CloudflareConfig extends HttpClientConfig {
  apiToken: string;
  zoneId: string;
  baseUrl?: string;
}

export interface DnsRecord {
  id: string;
  type: string;
  name: string;
  content: string;
  ttl: number;
  proxied?: boolean;
  proxiable?: boolean;
  zone_id?: string;
  zone_name?: string;
  created_on?: string;
  modified_on?: string;
}

export interface ARecordInput {
  name: string;
  content: string;
  ttl?: number;
  proxied?: boolean;
}

export interface CloudflareEnvelope<T> {
  success: boolean;
  errors: CloudflareErrorEntry[];
  messages?: CloudflareErrorEntry[];
  result: T | null;
}

export interface SpeedTestMeta {
  clientIp?: string;
  asn?: number;
  asOrganization?: string;
  colo?: string;
  country?: string;
  city?: string;
}

export type UpdateStatus = 'created' | 'updated' | 'unchanged' | 'failed';

export interface UpdateResult {
  status: UpdateStatus;
  recordName: string;
  ip?: string;
  recordId?: string;
  verified?: boolean;
  error?: string;
}

export interface RunOptions {
  /** Write the record even when it already holds the current address */
  force?: boolean;
  verify?: boolean;
}
