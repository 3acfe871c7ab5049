import { CfUpdaterError, logger } from '@cfupdater/utils';
import { UpdateScheduler, type ScheduleMode, type UpdateResult } from '@cfupdater/sdk';
import { buildUpdater, defaultContext, loadConfig, type CommandContext } from '../context.js';

export interface UpdateCommandOptions {
  mode?: ScheduleMode;
  runs: number;
  force?: boolean;
  verify: boolean;
  ttl?: number;
  proxied?: boolean;
}

export async function updateCommand(
  options: UpdateCommandOptions,
  context: CommandContext = defaultContext(),
): Promise<UpdateResult[]> {
  const config = loadConfig(context, { ttl: options.ttl, proxied: options.proxied });
  const updater = await buildUpdater(context, config);

  const results: UpdateResult[] = [];
  const scheduler = new UpdateScheduler(
    () => updater.run({ force: options.force, verify: options.verify }),
    { mode: options.mode, runs: options.runs },
  );
  scheduler.on('run', (_runNumber: number, result: UpdateResult) => {
    results.push(result);
  });

  // A one-shot run keeps the default signal behaviour
  const shutdown = () => {
    logger.info('Stopping scheduler');
    scheduler.stop();
  };
  if (options.mode) {
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }

  try {
    await scheduler.start();
  } finally {
    if (options.mode) {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
    }
  }

  if (!options.mode) {
    const [result] = results;
    if (result?.status === 'failed') {
      throw new CfUpdaterError(`DNS update failed: ${result.error ?? 'unknown error'}`, 'UPDATE_FAILED', {
        recordName: result.recordName,
      });
    }
  }

  return results;
}
