import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { JobScheduler, nextDailyRun } from '../../src/modules/scheduler/index.js';
import type { RunOptions, RunResult } from '../../src/modules/runner/index.js';
import { FIXED_NOW, fixedClock } from '../helpers/fakes.js';

function runResult(status: RunResult['status']): RunResult {
  return {
    runId: 'run-1',
    status,
    reconciled: false,
    dryRun: false,
    startedAt: FIXED_NOW,
    completedAt: FIXED_NOW,
    durationMs: 0,
  };
}

describe('nextDailyRun', () => {
  const after = new Date('2026-03-01T12:00:00Z');

  it('finds the next slot later the same day', () => {
    expect(nextDailyRun('0 8,14,20 * * *', after)).toEqual(new Date('2026-03-01T14:00:00Z'));
  });

  it('rolls over to the first slot of the next day', () => {
    expect(nextDailyRun('0 8,14,20 * * *', new Date('2026-03-01T20:00:00Z'))).toEqual(
      new Date('2026-03-02T08:00:00Z')
    );
  });

  it('supports step values', () => {
    expect(nextDailyRun('*/15 * * * *', new Date('2026-03-01T12:07:00Z'))).toEqual(
      new Date('2026-03-01T12:15:00Z')
    );
  });

  it('does not handle day, month or weekday restrictions', () => {
    expect(nextDailyRun('0 8 * * 1', after)).toBeUndefined();
    expect(nextDailyRun('not cron', after)).toBeUndefined();
  });
});

describe('JobScheduler', () => {
  let runOnce: Mock<(options?: RunOptions) => Promise<RunResult>>;
  let scheduler: JobScheduler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    runOnce = vi.fn(async (_options?: RunOptions) => runResult('published'));
    scheduler = new JobScheduler({ runOnce }, {}, fixedClock());
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('counts successful and failed runs', async () => {
    await scheduler.triggerManually();
    runOnce.mockResolvedValueOnce(runResult('failed'));
    await scheduler.triggerManually();
    runOnce.mockResolvedValueOnce(runResult('skipped'));
    await scheduler.triggerManually({ dryRun: true });

    expect(scheduler.getState()).toMatchObject({
      isRunActive: false,
      totalRuns: 3,
      successfulRuns: 2,
      failedRuns: 1,
    });
    expect(scheduler.getState().lastRun?.status).toBe('skipped');
    expect(runOnce).toHaveBeenLastCalledWith({ dryRun: true });
  });

  it('counts a thrown run as failed and rethrows', async () => {
    runOnce.mockRejectedValueOnce(new Error('lock directory missing'));

    await expect(scheduler.triggerManually()).rejects.toThrow('lock directory missing');
    expect(scheduler.getState()).toMatchObject({ totalRuns: 1, failedRuns: 1, isRunActive: false });
  });

  it('does not start a second run while one is active', async () => {
    let finish: (result: RunResult) => void = () => {};
    runOnce.mockImplementationOnce(
      () =>
        new Promise<RunResult>((resolve) => {
          finish = resolve;
        })
    );

    const first = scheduler.triggerManually();
    expect(scheduler.getState().isRunActive).toBe(true);

    await expect(scheduler.triggerManually()).resolves.toBeNull();

    finish(runResult('published'));
    await expect(first).resolves.toMatchObject({ status: 'published' });
    expect(runOnce).toHaveBeenCalledTimes(1);
  });

  it('registers the cron job and reports the next UTC run', () => {
    scheduler.start();

    expect(scheduler.getState()).toMatchObject({
      isRunning: true,
      nextRunTime: new Date('2026-03-01T14:00:00Z'),
    });

    scheduler.stop();
    expect(scheduler.getState()).toMatchObject({ isRunning: false, nextRunTime: undefined });
  });

  it('refuses an invalid cron expression', () => {
    const invalid = new JobScheduler({ runOnce }, { cronExpression: 'every morning' });

    expect(() => invalid.start()).toThrow('Invalid cron expression: every morning');
  });

  it('stays idle when disabled', () => {
    const disabled = new JobScheduler({ runOnce }, { enabled: false });
    disabled.start();

    expect(disabled.getState().isRunning).toBe(false);
  });
});
