import { ConfigError, SecretsError, Validator, logger } from '@cfupdater/utils';
import type { CloudflareCredentials, UpdaterConfig } from './types.js';

export const INTEGRATION_NAME = 'cfupdater';
export const INTEGRATION_VERSION = '1.0';

export interface SecretsProvider {
  resolve(reference: string): Promise<string>;
}

export type SecretsProviderFactory = (serviceAccountToken: string) => Promise<SecretsProvider>;

/**
 * Resolves `op://` references through a 1Password service account.
 */
export class OnePasswordSecretsProvider implements SecretsProvider {
  private constructor(private readonly client: SecretsProvider) {}

  static async connect(serviceAccountToken: string | undefined): Promise<OnePasswordSecretsProvider> {
    if (!serviceAccountToken) {
      throw new SecretsError('OP_SERVICE_ACCOUNT_TOKEN unset');
    }

    try {
      // Loaded on first use
      const { createClient } = await import('@1password/sdk');
      const client = await createClient({
        auth: serviceAccountToken,
        integrationName: INTEGRATION_NAME,
        integrationVersion: INTEGRATION_VERSION,
      });
      return new OnePasswordSecretsProvider(client.secrets);
    } catch (error) {
      throw new SecretsError('1Password authentication failed', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  resolve(reference: string): Promise<string> {
    return this.client.resolve(reference);
  }
}

export const connectOnePassword: SecretsProviderFactory = (token) => OnePasswordSecretsProvider.connect(token);

export function normalizeRecordName(name: string): string {
  return name.replace(/\.$/, '').toLowerCase();
}

function isComplete(direct: Partial<CloudflareCredentials>): direct is CloudflareCredentials {
  return Boolean(direct.apiToken && direct.zoneId && direct.recordName);
}

async function resolveReference(provider: SecretsProvider, reference: string): Promise<string> {
  try {
    return await provider.resolve(reference);
  } catch (error) {
    throw new SecretsError(`Failed to resolve secret ${reference}`, {
      reference,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Cloudflare credentials from the environment when all three are set,
 * otherwise from 1Password.
 */
export async function resolveCredentials(
  config: UpdaterConfig,
  connect: SecretsProviderFactory = connectOnePassword,
): Promise<CloudflareCredentials> {
  let credentials: Partial<CloudflareCredentials>;

  if (isComplete(config.direct)) {
    logger.debug('Using Cloudflare credentials from the environment');
    credentials = config.direct;
  } else {
    const token = config.onePassword.serviceAccountToken;
    if (!token) {
      throw new SecretsError('OP_SERVICE_ACCOUNT_TOKEN unset');
    }

    const provider = await connect(token);
    const { references } = config.onePassword;
    credentials = {
      apiToken: await resolveReference(provider, references.apiToken),
      zoneId: await resolveReference(provider, references.zoneId),
      recordName: await resolveReference(provider, references.recordName),
    };
    logger.debug('Resolved Cloudflare credentials from 1Password');
  }

  if (!isComplete(credentials)) {
    throw new ConfigError('Please set CF_API_TOKEN, CF_ZONE_ID, and CF_RECORD_NAME');
  }
  if (!Validator.isHostname(credentials.recordName)) {
    throw new ConfigError(`Record name is not a valid hostname: ${credentials.recordName}`);
  }

  // Cloudflare stores names lowercased and without the root dot
  return { ...credentials, recordName: normalizeRecordName(credentials.recordName) };
}
