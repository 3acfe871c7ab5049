import { readFileSync } from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { logger } from '@cfupdater/utils';
import { SCHEDULE_MODES, type ScheduleMode } from '@cfupdater/sdk';
import { updateCommand } from './commands/update.js';
import { ipCommand } from './commands/ip.js';
import { statusCommand } from './commands/status.js';
import { defaultContext, type CommandContext } from './context.js';

export type { CommandContext } from './context.js';

interface UpdateActionOptions {
  mode?: ScheduleMode;
  runs: number;
  force?: boolean;
  verify: boolean;
  ttl?: number;
  proxied?: boolean;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function createProgram(context: CommandContext = defaultContext()): Command {
  const program = new Command();
  // Throw instead of exiting; subcommands inherit this when created afterwards
  program.exitOverride();

  program
    .name('cfupdater')
    .description('Keep a Cloudflare A record pointed at this host\'s public IP')
    .version(readVersion())
    .option('-v, --verbose', 'Enable verbose logging')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().verbose) {
        logger.setLevel('debug');
      }
    });

  // Reconcile the record, once or on a schedule
  program
    .command('update', { isDefault: true })
    .description('Point the DNS record at the current public IP')
    .addOption(
      new Option('-m, --mode <mode>', 'Repeat the update on a schedule; runs once if omitted')
        .choices(SCHEDULE_MODES),
    )
    .option('-r, --runs <n>', 'How many times to run the update (0 = infinite)', parseNonNegativeInt, 1)
    .option('-f, --force', 'Write the record even when it already holds the current IP')
    .option('--no-verify', 'Skip resolving the record after writing it')
    .option('--ttl <seconds>', 'Record TTL (1 = automatic)', parseNonNegativeInt)
    .option('--proxied', 'Proxy traffic through Cloudflare')
    .action(async (options: UpdateActionOptions) => {
      await updateCommand(options, context);
    });

  program
    .command('ip')
    .description('Print the current public IP address')
    .action(async () => {
      await ipCommand(context);
    });

  program
    .command('status')
    .description('Compare the DNS record with the current public IP')
    .action(async () => {
      await statusCommand(context);
    });

  return program;
}
