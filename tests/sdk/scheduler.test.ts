import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError } from '@cfupdater/utils';
import { UpdateScheduler, getIntervalMs, isScheduleMode } from '@cfupdater/sdk';

const MINUTE = 60 * 1000;

describe('getIntervalMs', () => {
  it('maps modes to intervals', () => {
    expect(getIntervalMs('daily')).toBe(86_400_000);
    expect(getIntervalMs('hourly')).toBe(3_600_000);
    expect(getIntervalMs('min')).toBe(60_000);
  });

  it('recognises the supported modes', () => {
    expect(isScheduleMode('hourly')).toBe(true);
    expect(isScheduleMode('weekly')).toBe(false);
  });
});

describe('UpdateScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs once without a mode', async () => {
    const task = vi.fn(async () => 'done');
    const scheduler = new UpdateScheduler(task, { runs: 5 });

    await scheduler.start();

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.completedRuns).toBe(1);
  });

  it('repeats every interval until the run budget is spent', async () => {
    const task = vi.fn(async () => 'done');
    const scheduler = new UpdateScheduler(task, { mode: 'min', runs: 3 });

    const finished = scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(MINUTE - 1);
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(MINUTE);
    await finished;
    expect(task).toHaveBeenCalledTimes(3);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('runs the first update only when runs is 1', async () => {
    const task = vi.fn(async () => 'done');
    const scheduler = new UpdateScheduler(task, { mode: 'hourly', runs: 1 });

    await scheduler.start();

    expect(task).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('keeps going with runs = 0 until stopped', async () => {
    const task = vi.fn(async () => 'done');
    const scheduler = new UpdateScheduler(task, { mode: 'min', runs: 0 });

    const finished = scheduler.start();
    await vi.advanceTimersByTimeAsync(5 * MINUTE);
    expect(task).toHaveBeenCalledTimes(6);

    scheduler.stop();
    await finished;
    expect(scheduler.completedRuns).toBe(6);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('keeps the schedule alive after a failed run', async () => {
    let calls = 0;
    const task = vi.fn(async () => {
      calls++;
      if (calls === 1) throw new Error('api down');
      return 'recovered';
    });
    const failures: number[] = [];
    const results: unknown[] = [];
    const scheduler = new UpdateScheduler(task, { mode: 'min', runs: 2 });
    scheduler.on('run-failed', (runNumber: number) => failures.push(runNumber));
    scheduler.on('run', (_runNumber: number, result: unknown) => results.push(result));

    const finished = scheduler.start();
    await vi.advanceTimersByTimeAsync(MINUTE);
    await finished;

    expect(failures).toEqual([1]);
    expect(results).toEqual(['recovered']);
  });

  it('resolves start() when stopped between runs', async () => {
    const task = vi.fn(async () => 'done');
    const scheduler = new UpdateScheduler(task, { mode: 'daily', runs: 5 });

    const finished = scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    scheduler.stop();
    await finished;

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('resolves start() when stopped while a run is in progress', async () => {
    let finishRun: (value: string) => void = () => {};
    const task = vi.fn(() => new Promise<string>((resolve) => {
      finishRun = resolve;
    }));
    const scheduler = new UpdateScheduler(task, { mode: 'daily', runs: 0 });
    let settled = false;

    const finished = scheduler.start().then(() => {
      settled = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(task).toHaveBeenCalledTimes(1);

    scheduler.stop();
    finishRun('done');
    await vi.advanceTimersByTimeAsync(1000);

    expect(settled).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
    await finished;
    expect(scheduler.completedRuns).toBe(1);
  });

  it('rejects an invalid run count', () => {
    const task = vi.fn(async () => 'done');

    expect(() => new UpdateScheduler(task, { runs: -1 })).toThrow(ConfigError);
    expect(() => new UpdateScheduler(task, { runs: 1.5 })).toThrow('runs must be a non-negative integer, got 1.5');
  });
});
