import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ReplanDriver,
  nextCronOccurrence,
  validateCron,
  type ReplanTarget,
} from '../../../src/scheduling/replan-driver.js';
import type { ReplanSummary } from '../../../src/scheduling/class-planner.js';
import { getTraceContext } from '../../../src/core/trace-context.js';
import { createMockLogger, type MockLogger } from '../../helpers/factories.js';

const NOW = new Date('2024-06-10T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;

const SUMMARY: ReplanSummary = {
  slotsConsidered: 1,
  slotsSkipped: 0,
  scheduled: 2,
  replaced: 0,
  unchanged: 0,
  skippedPast: 0,
};

function createTarget() {
  const calls: string[] = [];
  const target = {
    calls,
    replanClassOccurrences: vi.fn(async (): Promise<ReplanSummary> => {
      calls.push('replan');
      return SUMMARY;
    }),
    sweepHomeworkReminders: vi.fn(async (): Promise<unknown> => {
      calls.push('sweep');
      return {};
    }),
  } satisfies ReplanTarget & { calls: string[] };
  return target;
}

describe('cron helpers', () => {
  it('computes the next occurrence in UTC', () => {
    expect(nextCronOccurrence('1 0 * * *', NOW, 'UTC').toISOString()).toBe(
      '2024-06-11T00:01:00.000Z'
    );
    expect(nextCronOccurrence('0 * * * *', NOW, 'UTC').toISOString()).toBe(
      '2024-06-10T13:00:00.000Z'
    );
  });

  it('rejects expressions with the wrong number of fields', () => {
    expect(() => {
      validateCron('every day', 'UTC');
    }).toThrow('Invalid cron expression "every day": expected 5-6 fields, got 2');
  });

  it('rejects expressions the parser cannot read', () => {
    expect(() => {
      validateCron('99 * * * *', 'UTC');
    }).toThrow();
  });
});

describe('ReplanDriver', () => {
  let logger: MockLogger;
  let target: ReturnType<typeof createTarget>;
  let driver: ReplanDriver;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    logger = createMockLogger();
    target = createTarget();
    driver = new ReplanDriver(target, logger);
  });

  afterEach(() => {
    driver.stop();
    vi.useRealTimers();
  });

  it('runs a pass and then the homework sweep at start', async () => {
    driver.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(target.calls).toEqual(['replan', 'sweep']);
    expect(driver.isRunning()).toBe(true);
  });

  it('skips the sweep when disabled', async () => {
    driver = new ReplanDriver(target, logger, { config: { sweepHomeworkOnStartup: false } });

    driver.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(target.calls).toEqual(['replan']);
  });

  it('runs a pass at the top of every hour', async () => {
    driver.start();
    await vi.advanceTimersByTimeAsync(0);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(target.replanClassOccurrences).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(target.replanClassOccurrences).toHaveBeenCalledTimes(3);
  });

  it('reports when each trigger fires next', () => {
    expect(driver.nextRuns()).toEqual({
      daily: '2024-06-11T00:01:00.000Z',
      hourly: '2024-06-10T13:00:00.000Z',
    });
  });

  it('stops firing after stop', async () => {
    driver.start();
    await vi.advanceTimersByTimeAsync(0);
    driver.stop();

    await vi.advanceTimersByTimeAsync(3 * HOUR);

    expect(target.replanClassOccurrences).toHaveBeenCalledTimes(1);
    expect(driver.isRunning()).toBe(false);
  });

  it('warns on a second start', () => {
    driver.start();
    driver.start();

    expect(logger.messages('warn')).toEqual(['Re-planning driver already running']);
  });

  it('coalesces a pass requested while another is running', async () => {
    let release: (summary: ReplanSummary) => void = () => undefined;
    target.replanClassOccurrences.mockImplementationOnce(
      () =>
        new Promise<ReplanSummary>((resolve) => {
          release = resolve;
        })
    );

    const first = driver.runPass('manual');
    const second = await driver.runPass('hourly');
    release(SUMMARY);

    expect(second).toBeNull();
    expect(await first).toEqual(SUMMARY);
    expect(target.replanClassOccurrences).toHaveBeenCalledTimes(1);
  });

  it('runs each pass in its own trace context', async () => {
    let correlationId: string | undefined;
    let traceId: string | undefined;
    target.replanClassOccurrences.mockImplementationOnce(async () => {
      correlationId = getTraceContext()?.correlationId;
      traceId = getTraceContext()?.traceId;
      return SUMMARY;
    });

    await driver.runPass('manual');

    expect(correlationId).toBe('manual');
    expect(traceId).toMatch(/^replan_[0-9a-f]{8}$/);
  });

  it('logs a failed pass and returns null', async () => {
    target.replanClassOccurrences.mockRejectedValueOnce(new Error('store offline'));

    const result = await driver.runPass('manual');

    expect(result).toBeNull();
    expect(logger.messages('error')).toEqual(['Re-planning pass failed']);
  });

  it('logs a failed sweep', async () => {
    target.sweepHomeworkReminders.mockRejectedValueOnce(new Error('store offline'));

    driver.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(logger.messages('error')).toEqual(['Homework recovery sweep failed']);
  });

  it('waits for the pass in flight on idle', async () => {
    let release: (summary: ReplanSummary) => void = () => undefined;
    target.replanClassOccurrences.mockImplementationOnce(
      () =>
        new Promise<ReplanSummary>((resolve) => {
          release = resolve;
        })
    );
    const pass = driver.runPass('manual');
    let idle = false;
    const waiting = driver.idle().then(() => {
      idle = true;
    });

    await Promise.resolve();
    expect(idle).toBe(false);

    release(SUMMARY);
    await waiting;
    await pass;
    expect(idle).toBe(true);
  });

  it('rejects a bad cron expression at construction', () => {
    expect(() => new ReplanDriver(target, logger, { config: { hourlyCron: '0 * *' } })).toThrow(
      'Invalid cron expression'
    );
  });
});
