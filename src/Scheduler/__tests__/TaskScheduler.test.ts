import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CancelledError } from '@utils/errors';
import { parseOptions } from '@utils/options';
import { wait } from '@utils/wait';
import { Application } from '../../Service/Application';
import { CLEANUP_INTERVAL_MS, getScheduler, setupScheduler, type TaskScheduler } from '../TaskScheduler';

describe('TaskScheduler', () => {
  let app: Application;
  let scheduler: TaskScheduler;

  beforeEach(() => {
    app = new Application(parseOptions({}));
    setupScheduler(app);
    scheduler = getScheduler(app);
  });

  afterEach(async () => {
    await app.stop();
    vi.useRealTimers();
  });

  it('runs work in the background', async () => {
    const work = vi.fn(async () => 'result');
    const task = scheduler.create(work, 'compute');

    expect(work).not.toHaveBeenCalled();
    expect(scheduler.has(task)).toBe(true);
    await expect(task.promise).resolves.toBe('result');
    expect(task.done).toBe(true);
    expect(task.name).toBe('compute');
  });

  it('treats cancelling nothing as a no-op', async () => {
    await expect(scheduler.cancel(undefined)).resolves.toBeUndefined();
  });

  it('cancels a running task and waits for it', async () => {
    const task = scheduler.create((signal) => wait(10_000, signal));

    await expect(scheduler.cancel(task)).resolves.toBeUndefined();
    expect(task.cancelled).toBe(true);
    expect(task.done).toBe(true);
    expect(scheduler.has(task)).toBe(false);
    await expect(task.promise).rejects.toThrow(CancelledError);
  });

  it('returns what a cancelled task produced', async () => {
    const task = scheduler.create(async (signal) => {
      try {
        await wait(10_000, signal);
        return 'finished';
      } catch {
        return 'partial';
      }
    });
    await wait(0);

    await expect(scheduler.cancel(task)).resolves.toBe('partial');
  });

  it('leaves a finished task alone', async () => {
    const task = scheduler.create(async () => 7);
    await task.promise;

    await expect(scheduler.cancel(task)).resolves.toBe(7);
    expect(task.cancelled).toBe(false);
  });

  it('does not wait unless asked to', async () => {
    let stopped = false;
    const task = scheduler.create(async (signal) => {
      await wait(10_000, signal).catch(() => wait(5));
      stopped = true;
    });
    await wait(0);

    await expect(scheduler.cancel(task, false)).resolves.toBeUndefined();
    expect(stopped).toBe(false);
    await vi.waitFor(() => {
      expect(stopped).toBe(true);
    });
  });

  it('drops finished tasks on every cleanup interval', async () => {
    vi.useFakeTimers();
    await app.start();

    const task = scheduler.create(async () => 'done');
    await task.promise;
    expect(scheduler.size).toBe(2);

    await vi.advanceTimersByTimeAsync(CLEANUP_INTERVAL_MS);

    expect(scheduler.has(task)).toBe(false);
    expect(scheduler.size).toBe(1);
  });

  it('cancels every task on shutdown', async () => {
    await app.start();
    const tasks = [1, 2, 3].map(() => scheduler.create((signal) => wait(10_000, signal)));

    await app.stop();

    expect(scheduler.size).toBe(0);
    expect(tasks.every((task) => task.cancelled && task.done)).toBe(true);
  });

  it('keeps failures inside the task', async () => {
    const task = scheduler.create(async () => {
      throw new Error('broken');
    });

    await expect(task.promise).rejects.toThrow('broken');
    scheduler.cleanup();
    expect(scheduler.has(task)).toBe(false);
  });
});
