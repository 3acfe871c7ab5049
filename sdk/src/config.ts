import { ConfigManager, ConfigError, Validator } from '@cfupdater/utils';
import type { SecretReferences, UpdaterConfig } from './types.js';

export const DEFAULT_SECRET_REFERENCES: SecretReferences = {
  apiToken: 'op://Services/CF DNS API/credential',
  zoneId: 'op://Services/CF DNS API/zone_id',
  recordName: 'op://Services/CF DNS API/hostname',
};

export const DEFAULT_API_BASE_URL = 'https://api.cloudflare.com/client/v4';
export const DEFAULT_IP_LOOKUP_URL = 'https://speed.cloudflare.com/meta';

function getCount(config: ConfigManager, key: string, defaultValue: number): number {
  const value = config.getNumber(key, defaultValue);
  if (!Validator.isNonNegativeInteger(value)) {
    throw new ConfigError(`${key} must be a non-negative integer, got ${value}`, { key, value });
  }
  return value;
}

export function loadUpdaterConfig(env: Record<string, string | undefined> = process.env): UpdaterConfig {
  const config = new ConfigManager(env);

  const references: SecretReferences = {
    apiToken: config.get('CF_API_TOKEN_REF', DEFAULT_SECRET_REFERENCES.apiToken),
    zoneId: config.get('CF_ZONE_ID_REF', DEFAULT_SECRET_REFERENCES.zoneId),
    recordName: config.get('CF_RECORD_NAME_REF', DEFAULT_SECRET_REFERENCES.recordName),
  };

  for (const [field, reference] of Object.entries(references)) {
    if (!Validator.isSecretReference(reference)) {
      throw new ConfigError(`Invalid 1Password secret reference for ${field}: ${reference}`, { field, reference });
    }
  }

  return {
    onePassword: {
      serviceAccountToken: config.get('OP_SERVICE_ACCOUNT_TOKEN'),
      references,
    },
    direct: {
      apiToken: config.get('CF_API_TOKEN'),
      zoneId: config.get('CF_ZONE_ID'),
      recordName: config.get('CF_RECORD_NAME'),
    },
    apiBaseUrl: config.get('CF_API_BASE_URL', DEFAULT_API_BASE_URL),
    ipLookupUrl: config.get('IP_LOOKUP_URL', DEFAULT_IP_LOOKUP_URL),
    timeout: getCount(config, 'REQUEST_TIMEOUT_MS', 30000),
    retryAttempts: getCount(config, 'RETRY_ATTEMPTS', 3),
    retryDelay: getCount(config, 'RETRY_DELAY_MS', 1000),
    verifyDelay: getCount(config, 'VERIFY_DELAY_MS', 5000),
    ttl: getCount(config, 'CF_RECORD_TTL', 1),
    proxied: config.getBoolean('CF_RECORD_PROXIED', false),
  };
}
