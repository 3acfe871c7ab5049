import type { AxiosAdapter } from 'axios';
import {
  connectOnePassword,
  createDnsUpdater,
  loadUpdaterConfig,
  resolveCredentials,
  type DnsUpdater,
  type Resolve4,
  type SecretsProviderFactory,
  type UpdaterConfig,
} from '@cfupdater/sdk';

/**
 * Everything a command needs from the outside world. Tests swap in
 * in-process stand-ins for the network, the resolver and 1Password.
 */
export interface CommandContext {
  env: Record<string, string | undefined>;
  secrets: SecretsProviderFactory;
  adapter?: AxiosAdapter;
  resolve4?: Resolve4;
  /** Receives the human-readable output of `ip` and `status` */
  print: (line: string) => void;
  /** Show spinners */
  interactive?: boolean;
}

export function defaultContext(): CommandContext {
  return {
    env: process.env,
    secrets: connectOnePassword,
    print: (line) => process.stdout.write(`${line}\n`),
    interactive: Boolean(process.stderr.isTTY),
  };
}

export interface ConfigOverrides {
  ttl?: number;
  proxied?: boolean;
}

export function loadConfig(context: CommandContext, overrides: ConfigOverrides = {}): UpdaterConfig {
  const config = loadUpdaterConfig(context.env);
  return {
    ...config,
    ttl: overrides.ttl ?? config.ttl,
    proxied: overrides.proxied ?? config.proxied,
  };
}

export async function buildUpdater(context: CommandContext, config: UpdaterConfig): Promise<DnsUpdater> {
  const credentials = await resolveCredentials(config, context.secrets);
  return createDnsUpdater(config, credentials, { adapter: context.adapter }, context.resolve4);
}
