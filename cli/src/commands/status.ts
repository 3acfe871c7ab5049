import chalk from 'chalk';
import ora from 'ora';
import {
  CloudflareClient,
  IpLookupClient,
  resolveCredentials,
  type DnsRecord,
} from '@cfupdater/sdk';
import { defaultContext, loadConfig, type CommandContext } from '../context.js';

export interface RecordStatus {
  recordName: string;
  publicIp: string;
  record: DnsRecord | null;
  upToDate: boolean;
}

export async function statusCommand(context: CommandContext = defaultContext()): Promise<RecordStatus> {
  const spinner = ora({ isSilent: !context.interactive });
  spinner.start('Checking DNS record...');

  try {
    const config = loadConfig(context);
    const credentials = await resolveCredentials(config, context.secrets);
    const http = {
      timeout: config.timeout,
      retryAttempts: config.retryAttempts,
      retryDelay: config.retryDelay,
      adapter: context.adapter,
    };

    const publicIp = await new IpLookupClient(config.ipLookupUrl, http).getPublicIp();
    const client = new CloudflareClient({
      ...http,
      apiToken: credentials.apiToken,
      zoneId: credentials.zoneId,
      baseUrl: config.apiBaseUrl,
    });
    const record = await client.findARecord(credentials.recordName);
    spinner.stop();

    const status: RecordStatus = {
      recordName: credentials.recordName,
      publicIp,
      record,
      upToDate: record?.content === publicIp,
    };
    printStatus(status, context.print);
    return status;
  } catch (error) {
    spinner.fail(chalk.red('Status check failed'));
    throw error;
  }
}

function printStatus(status: RecordStatus, print: (line: string) => void) {
  print(`Record:    ${status.recordName}`);
  print(`Public IP: ${status.publicIp}`);
  print(`DNS value: ${status.record ? status.record.content : '(no A record)'}`);
  if (status.record) {
    print(`Record ID: ${status.record.id}`);
  }
  print(status.upToDate ? chalk.green('Up to date') : chalk.yellow('Update needed'));
}
