export { CloudflareClient } from './cloudflare-client.js';
export { IpLookupClient } from './ip-lookup.js';
export { DnsVerifier } from './dns-verifier.js';
export type { Resolve4 } from './dns-verifier.js';
export { DnsUpdater, createDnsUpdater } from './dns-updater.js';
export type { DnsUpdaterOptions } from './dns-updater.js';
export { UpdateScheduler, getIntervalMs, isScheduleMode, SCHEDULE_MODES } from './scheduler.js';
export type { ScheduleMode, ScheduleOptions } from './scheduler.js';
export {
  OnePasswordSecretsProvider,
  connectOnePassword,
  resolveCredentials,
  normalizeRecordName,
  INTEGRATION_NAME,
  INTEGRATION_VERSION,
} from './secrets.js';
export type { SecretsProvider, SecretsProviderFactory } from './secrets.js';
export {
  loadUpdaterConfig,
  DEFAULT_SECRET_REFERENCES,
  DEFAULT_API_BASE_URL,
  DEFAULT_IP_LOOKUP_URL,
} from './config.js';
export * from './types.js';
