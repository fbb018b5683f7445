import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigurationError } from '../errors/workflow';
import { createHarness } from '../test/fixtures';

const cronMock = vi.hoisted(() => ({
  validate: vi.fn((expression: string) => expression.split(' ').length === 5),
  schedule: vi.fn<[string, () => Promise<void>], void>(),
  stop: vi.fn(),
}));

vi.mock('node-cron', () => ({
  default: {
    validate: cronMock.validate,
    schedule: (expression: string, fn: () => Promise<void>) => {
      cronMock.schedule(expression, fn);
      return { stop: cronMock.stop };
    },
  },
}));

import { startScheduledJobs } from './scheduler';

describe('scheduled jobs', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules the re-scoring job and stops it', () => {
    const jobs = startScheduledJobs(createHarness().ctx, '0 3 * * *');

    expect(cronMock.schedule).toHaveBeenCalledWith('0 3 * * *', expect.any(Function));
    jobs.stop();
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });

  it('runs the re-scoring pass when the schedule fires', async () => {
    const { ctx, store } = createHarness();
    store.addEmployee({ id: 10, name: 'Eli Dev', role: 'employee', department: 'Engineering', leave_balance: 10 });
    const today = new Date().toISOString().slice(0, 10);
    const record = await store.createAttendanceRecord({
      employee_id: 10,
      date: today,
      status: 'absent',
      review_status: 'none',
      recorded_by: 2,
      anomaly_score: 0,
      anomaly_reason: 'none',
    });
    startScheduledJobs(ctx, '0 3 * * *');

    const [, tick] = cronMock.schedule.mock.calls[0];
    await tick();

    expect((await store.getAttendanceRecord(record.id))?.anomaly_score).toBe(0.25);
  });

  it('refuses an invalid cron expression', () => {
    expect(() => startScheduledJobs(createHarness().ctx, 'every night')).toThrow(ConfigurationError);
  });
});
