import { IpLookupClient } from '@cfupdater/sdk';
import { defaultContext, loadConfig, type CommandContext } from '../context.js';

export async function ipCommand(context: CommandContext = defaultContext()): Promise<string> {
  const config = loadConfig(context);
  const client = new IpLookupClient(config.ipLookupUrl, {
    timeout: config.timeout,
    retryAttempts: config.retryAttempts,
    retryDelay: config.retryDelay,
    adapter: context.adapter,
  });

  const ip = await client.getPublicIp();
  context.print(ip);
  return ip;
}
