/**
 * Task Supervisor
 * Tracks the long-running relay and forwarding loops so they can all be
 * cancelled at once on stop, restart or shutdown
 */

import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export enum SchedulerKind {
  /** loops that talk to the engine */
  Runtime = 'runtime',
  /** loops that mutate session state seen by the presentation layer */
  Ui = 'ui',
}

export type SupervisedTask = (signal: AbortSignal) => Promise<void>;

export class TaskHandle {
  readonly done: Promise<void>;
  private readonly controller = new AbortController();
  private finished = false;

  constructor(
    readonly name: string,
    readonly scheduler: SchedulerKind,
    task: SupervisedTask
  ) {
    this.done = this.run(task);
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  isFinished(): boolean {
    return this.finished;
  }

  /**
   * Request cancellation without waiting for the task to wind down.
   * Returns false when the task had already finished or been cancelled.
   */
  cancel(): boolean {
    if (this.finished || this.controller.signal.aborted) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  private async run(task: SupervisedTask): Promise<void> {
    try {
      await task(this.controller.signal);
      logger.debug(`Task ${this.name} (${this.scheduler}) ended`);
    } catch (err) {
      if (this.controller.signal.aborted) {
        logger.debug(`Task ${this.name} (${this.scheduler}) cancelled`);
      } else {
        logger.error(`Task ${this.name} (${this.scheduler}) failed:`, errorMessage(err));
      }
    } finally {
      this.finished = true;
    }
  }
}

export class TaskSupervisor {
  private handles: TaskHandle[] = [];

  get size(): number {
    return this.handles.length;
  }

  names(): string[] {
    return this.handles.map((handle) => handle.name);
  }

  spawn(name: string, scheduler: SchedulerKind, task: SupervisedTask): TaskHandle {
    const handle = new TaskHandle(name, scheduler, task);
    this.handles.push(handle);
    logger.debug(`Spawned ${name} on ${scheduler}`);
    return handle;
  }

  /**
   * Cancel every tracked task, newest first. Returns how many handles were
   * stopped; a second call in a row returns 0.
   */
  stopAll(): number {
    let count = 0;
    let handle = this.handles.pop();
    while (handle) {
      handle.cancel();
      count++;
      handle = this.handles.pop();
    }
    return count;
  }
}
