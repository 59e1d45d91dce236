import type { Application } from '../Service/Application';
import type { Feature } from '../Service/Feature';
import { CancelledError, errorMessage } from '@utils/errors';
import { logDebug } from '@utils/logger';
import { wait } from '@utils/wait';

export const CLEANUP_INTERVAL_MS = 300_000;

export type TaskWork<T> = (signal: AbortSignal) => Promise<T>;

/** Handle to a unit of background work owned by a TaskScheduler. */
export interface Task<T = unknown> {
  readonly id: number;
  readonly name: string;
  /** Settles with the outcome of the work. Rejects with the abort reason when cancelled mid-flight. */
  readonly promise: Promise<T>;
  readonly done: boolean;
  readonly cancelled: boolean;
}

let nextTaskId = 1;

class ManagedTask<T> implements Task<T> {
  readonly id = nextTaskId++;
  readonly promise: Promise<T>;
  /** Never rejects: resolves with the result, or `undefined` on failure. */
  readonly settled: Promise<T | undefined>;
  private controller = new AbortController();
  private finished = false;

  constructor(readonly name: string, work: TaskWork<T>) {
    // Work starts on the next microtask so `create()` never runs caller code synchronously
    this.promise = Promise.resolve().then(() => work(this.controller.signal));
    this.settled = this.promise.then(
      (result) => {
        this.finished = true;
        return result;
      },
      (error: unknown) => {
        this.finished = true;
        if (!this.cancelled) logDebug(`[Scheduler] Task ${this} failed: ${errorMessage(error)}`);
        return undefined;
      }
    );
  }

  get done() {
    return this.finished;
  }

  get cancelled() {
    return this.controller.signal.aborted;
  }

  cancel() {
    if (!this.cancelled && !this.finished) this.controller.abort(new CancelledError(`Task ${this} cancelled`));
  }

  toString() {
    return `<Task ${this.id} ${this.name}>`;
  }
}

/**
 * Owns the background tasks of one application.
 * Every task it creates is cancelled and awaited when the application shuts down.
 */
export class TaskScheduler implements Feature {
  readonly name = 'TaskScheduler';
  private tasks = new Set<ManagedTask<unknown>>();

  get size() {
    return this.tasks.size;
  }

  has(task: Task): boolean {
    return task instanceof ManagedTask && this.tasks.has(task);
  }

  async startup(_app: Application) {
    this.create((signal) => this.cleanupLoop(signal), 'scheduler-cleanup');
  }

  async shutdown(_app: Application) {
    const tasks = [...this.tasks];
    this.tasks.clear();
    tasks.forEach((task) => task.cancel());
    await Promise.all(tasks.map((task) => task.settled));
  }

  create<T>(work: TaskWork<T>, name: string = 'task'): Task<T> {
    const task = new ManagedTask(name, work);
    this.tasks.add(task);
    logDebug(`[Scheduler] Scheduled ${task}`);
    return task;
  }

  /**
   * Cancels `task` and removes it from the managed set.
   * With `waitFor`, resolves once the task stopped, with its result if it produced one.
   * Errors raised by the cancelled task are swallowed.
   */
  async cancel<T>(task: Task<T> | undefined, waitFor = true): Promise<T | undefined> {
    if (!(task instanceof ManagedTask)) return undefined;

    this.tasks.delete(task);
    task.cancel();
    const result = waitFor ? await task.settled : undefined;
    logDebug(`[Scheduler] Cancelled ${task}`);
    return result;
  }

  /** Drops finished tasks from the managed set so fire-and-forget work can be collected. */
  cleanup() {
    for (const task of this.tasks) {
      if (task.done) this.tasks.delete(task);
    }
  }

  private async cleanupLoop(signal: AbortSignal) {
    for (;;) {
      await wait(CLEANUP_INTERVAL_MS, signal);
      this.cleanup();
    }
  }
}

export const setupScheduler = (app: Application) => {
  app.features.add(TaskScheduler, new TaskScheduler());
};

export const getScheduler = (app: Application): TaskScheduler => app.features.get(TaskScheduler);
