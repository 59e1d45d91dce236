import { getScheduler, type Task } from '../Scheduler/TaskScheduler';
import type { Application } from '../Service/Application';
import { errorMessage, RepeaterCancelled } from '@utils/errors';
import { logError, logInfo } from '@utils/logger';

export type RepeaterState = 'Stopped' | 'Starting' | 'Running';

export interface RepeaterContext {
  app: Application;
  /** Aborted when the repeater is stopped. Every suspension point should observe it. */
  signal: AbortSignal;
}

/**
 * Something that keeps repeating the same action in the background.
 *
 * `prepare()` runs once; errors abort the repeater. `run()` is then called forever.
 * Either may throw `RepeaterCancelled` to stop without error logs.
 * Rate limiting between `run()` calls is up to the implementation.
 */
export interface IRepeatable {
  readonly name: string;
  prepare(ctx: RepeaterContext): Promise<void>;
  run(ctx: RepeaterContext): Promise<void>;
}

export class Repeater {
  private task?: Task<void>;
  private currentState: RepeaterState = 'Stopped';

  constructor(private readonly target: IRepeatable) {}

  get active(): boolean {
    return this.task !== undefined && !this.task.done;
  }

  get state(): RepeaterState {
    return this.currentState;
  }

  async start(app: Application) {
    await this.stop(app);
    this.currentState = 'Starting';
    this.task = getScheduler(app).create((signal) => this.repeat({ app, signal }), `repeater:${this.target.name}`);
  }

  async stop(app: Application) {
    const task = this.task;
    this.task = undefined;
    await getScheduler(app).cancel(task);
    this.currentState = 'Stopped';
  }

  private async repeat(ctx: RepeaterContext): Promise<void> {
    const { signal } = ctx;
    let lastOk = true;

    try {
      await this.target.prepare(ctx);
    } catch (error) {
      this.currentState = 'Stopped';
      if (signal.aborted) return;
      if (error instanceof RepeaterCancelled) {
        logInfo(`[Repeater] ${this.target.name} cancelled during setup.`);
        return;
      }
      logError(`[Repeater] ${this.target.name} error during setup: ${errorMessage(error)}`);
      throw error;
    }

    this.currentState = 'Running';

    while (!signal.aborted) {
      try {
        await this.target.run(ctx);

        if (!lastOk) {
          logInfo(`[Repeater] ${this.target.name} resumed OK`);
          lastOk = true;
        }
      } catch (error) {
        if (signal.aborted) {
          this.currentState = 'Stopped';
          return;
        }
        if (error instanceof RepeaterCancelled) {
          logInfo(`[Repeater] ${this.target.name} cancelled during runtime.`);
          this.currentState = 'Stopped';
          return;
        }
        // Only the first error of a streak is logged
        if (lastOk) {
          logError(`[Repeater] ${this.target.name} error during runtime: ${errorMessage(error)}`);
          lastOk = false;
        }
      }
    }
    this.currentState = 'Stopped';
  }
}
