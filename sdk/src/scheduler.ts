import { EventEmitter } from 'events';
import { ConfigError, Validator, logger } from '@cfupdater/utils';

export type ScheduleMode = 'daily' | 'hourly' | 'min';

export const SCHEDULE_MODES: readonly ScheduleMode[] = ['daily', 'hourly', 'min'];

const INTERVALS: Record<ScheduleMode, number> = {
  daily: 24 * 60 * 60 * 1000,
  hourly: 60 * 60 * 1000,
  min: 60 * 1000,
};

export function getIntervalMs(mode: ScheduleMode): number {
  return INTERVALS[mode];
}

export function isScheduleMode(value: string): value is ScheduleMode {
  return (SCHEDULE_MODES as readonly string[]).includes(value);
}

export interface ScheduleOptions {
  /** Repeat interval; without one the task runs exactly once */
  mode?: ScheduleMode;
  /** Total number of runs, 0 = until stopped */
  runs?: number;
}

/**
 * Runs a task immediately, then again every interval until the run budget
 * is spent or `stop()` is called. A failing run is logged and does not end
 * the schedule.
 *
 * Events: `run` (runNumber, result), `run-failed` (runNumber, error).
 */
export class UpdateScheduler<T> extends EventEmitter {
  private readonly runs: number;
  private runCount = 0;
  private stopped = false;
  private timer?: NodeJS.Timeout;
  private cancelWait?: () => void;

  constructor(
    private readonly task: () => Promise<T>,
    private readonly options: ScheduleOptions = {},
  ) {
    super();
    this.runs = options.runs ?? 1;
    if (!Validator.isNonNegativeInteger(this.runs)) {
      throw new ConfigError(`runs must be a non-negative integer, got ${this.runs}`);
    }
  }

  get completedRuns(): number {
    return this.runCount;
  }

  async start(): Promise<void> {
    const { mode } = this.options;

    while (!this.stopped) {
      await this.runOnce();
      // stop() may have landed while the task was running
      if (!mode || this.stopped || this.isDone()) {
        break;
      }

      const interval = getIntervalMs(mode);
      logger.debug(`Next run in ${interval / 1000}s`);
      if (!(await this.wait(interval))) {
        break;
      }
    }
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.cancelWait?.();
    this.cancelWait = undefined;
  }

  private isDone(): boolean {
    return this.runs !== 0 && this.runCount >= this.runs;
  }

  private async runOnce(): Promise<void> {
    const runNumber = ++this.runCount;
    const budget = this.runs === 0 ? '' : ` of ${this.runs}`;
    logger.info(`[${new Date().toISOString()}] Running scheduled update (run ${runNumber}${budget})`);

    try {
      const result = await this.task();
      this.emit('run', runNumber, result);
    } catch (error) {
      logger.error(`Scheduled run ${runNumber} failed`, error);
      this.emit('run-failed', runNumber, error);
    }
  }

  /** Resolves true when the interval elapsed, false when stopped first. */
  private wait(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      this.cancelWait = () => resolve(false);
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.cancelWait = undefined;
        resolve(true);
      }, ms);
    });
  }
}
