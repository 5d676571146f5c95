import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Scheduler, type JobDefinition } from '../scheduler.js';
import { ConfigurationError } from '../utils/errors.js';
import { InMemoryProgressStore } from './fakes.js';

const cronMock = vi.hoisted(() => ({
  validate: vi.fn((expression: string) => expression !== 'bad'),
  schedule: vi.fn((_expression: string, _run: () => void, _options?: { timezone?: string }) => ({ stop: vi.fn() })),
}));

vi.mock('node-cron', () => ({ default: cronMock }));

class UnavailableProgressStore extends InMemoryProgressStore {
  override async tryBeginRun(): Promise<boolean> {
    throw new Error('database unavailable');
  }
}

function job(name: JobDefinition['name'], run: JobDefinition['run'], schedule = '*/5 * * * *'): JobDefinition {
  return { name, schedule, run };
}

describe('Scheduler', () => {
  beforeEach(() => {
    cronMock.schedule.mockClear();
  });

  it('runs a job and records a clean end', async () => {
    const progress = new InMemoryProgressStore();
    const scheduler = new Scheduler(progress, [job('continuous', async () => 'done')], { timezone: 'UTC' });

    const outcome = await scheduler.runNow('continuous');

    expect(outcome).toEqual({ status: 'completed', result: 'done' });
    expect(progress.records.get('continuous')).toMatchObject({ status: 'idle', failureCount: 0 });
  });

  it('skips a trigger while the same job is running', async () => {
    const progress = new InMemoryProgressStore();
    let release: () => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve('done');
        })
    );
    const scheduler = new Scheduler(progress, [job('continuous', run)], { timezone: 'UTC' });

    const first = scheduler.runNow('continuous');
    const second = await scheduler.runNow('continuous');

    expect(second).toEqual({ status: 'skipped' });
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));

    release();
    expect(await first).toEqual({ status: 'completed', result: 'done' });
    expect(await scheduler.runNow('continuous')).toEqual({ status: 'completed', result: 'done' });
  });

  it('records a failed run and releases the job', async () => {
    const progress = new InMemoryProgressStore();
    const scheduler = new Scheduler(
      progress,
      [
        job('backfill', async () => {
          throw new Error('boom');
        }),
      ],
      { timezone: 'UTC' }
    );

    const outcome = await scheduler.runNow('backfill');

    expect(outcome).toEqual({ status: 'failed', error: 'boom' });
    expect(progress.records.get('backfill')).toMatchObject({ status: 'error', failureCount: 1, lastError: 'boom' });
    expect(await progress.tryBeginRun('backfill')).toBe(true);
  });

  it('records a failure when the run cannot be started', async () => {
    const progress = new UnavailableProgressStore();
    const run = vi.fn(async () => 'done');
    const scheduler = new Scheduler(progress, [job('recovery', run)], { timezone: 'UTC' });

    const outcome = await scheduler.runNow('recovery');

    expect(outcome).toEqual({ status: 'failed', error: 'database unavailable' });
    expect(run).not.toHaveBeenCalled();
    expect(progress.records.get('recovery')).toMatchObject({ failureCount: 1, lastError: 'database unavailable' });
  });

  it('rejects unknown jobs', async () => {
    const scheduler = new Scheduler(new InMemoryProgressStore(), [], { timezone: 'UTC' });

    await expect(scheduler.runNow('taxonomy')).rejects.toThrow('Unknown job: taxonomy');
  });

  it('schedules every job in the configured timezone', async () => {
    const run = vi.fn(async () => 'done');
    const scheduler = new Scheduler(
      new InMemoryProgressStore(),
      [job('continuous', run), job('taxonomy', async () => 'ok', '0 3 * * *')],
      { timezone: 'Europe/Paris' }
    );

    scheduler.start();

    expect(scheduler.isRunning()).toBe(true);
    expect(cronMock.schedule.mock.calls.map(([expression, , options]) => [expression, options])).toEqual([
      ['*/5 * * * *', { timezone: 'Europe/Paris' }],
      ['0 3 * * *', { timezone: 'Europe/Paris' }],
    ]);

    cronMock.schedule.mock.calls[0]?.[1]();
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));

    scheduler.stop();

    expect(scheduler.isRunning()).toBe(false);
    for (const { value } of cronMock.schedule.mock.results) {
      expect(value.stop).toHaveBeenCalledTimes(1);
    }
  });

  it('refuses to start with an invalid cron expression', () => {
    const scheduler = new Scheduler(
      new InMemoryProgressStore(),
      [job('continuous', async () => 'done'), job('backfill', async () => 'done', 'bad')],
      { timezone: 'UTC' }
    );

    expect(() => scheduler.start()).toThrow(ConfigurationError);
    expect(cronMock.schedule).not.toHaveBeenCalled();
    expect(scheduler.isRunning()).toBe(false);
  });
});
