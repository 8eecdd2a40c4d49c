import type { AppLogger } from '../../telemetry/logger';
import type { RelayMetrics } from '../../telemetry/metrics';

/** Receives a signal that aborts when the process shuts down. */
export type TaskRunner = (shutdown: AbortSignal) => Promise<void>;

export interface NamedTask {
  name: string;
  run: TaskRunner;
}

/**
 * Work collected while handling one webhook, to be run after the HTTP
 * response has been written. Tasks run one after another in the order added.
 */
export class BackgroundTasks {
  private readonly tasks: NamedTask[] = [];

  add(name: string, run: TaskRunner): void {
    this.tasks.push({ name, run });
  }

  get size(): number {
    return this.tasks.length;
  }

  names(): string[] {
    return this.tasks.map((task) => task.name);
  }

  toArray(): readonly NamedTask[] {
    return [...this.tasks];
  }
}

/** Spawns detached work on behalf of request handlers. */
export interface TaskSpawner {
  spawn(name: string, run: TaskRunner): Promise<void>;
}

/**
 * Process-wide owner of detached work. Failures are logged and counted here
 * and never surface to the caller; `drain()` waits for everything in flight,
 * including work spawned while draining. `shutdown()` first signals every task
 * to stop, so open-ended loops end before the drain.
 */
export class BackgroundTaskSupervisor implements TaskSpawner {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly shutdownController = new AbortController();

  constructor(
    private readonly logger: AppLogger,
    private readonly metrics?: Pick<RelayMetrics, 'backgroundTaskFailures'>,
  ) {}

  get pending(): number {
    return this.inFlight.size;
  }

  /** Run a request's task list in order, without waiting for it. */
  launch(tasks: BackgroundTasks): void {
    if (tasks.size === 0) {
      return;
    }

    void this.track(this.runInOrder(tasks.toArray()));
  }

  /** Run a single task detached; the returned promise settles when it ends and never rejects. */
  spawn(name: string, run: TaskRunner): Promise<void> {
    return this.track(this.runGuarded({ name, run }));
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async shutdown(): Promise<void> {
    this.shutdownController.abort();
    await this.drain();
  }

  private async runInOrder(tasks: readonly NamedTask[]): Promise<void> {
    for (const task of tasks) {
      await this.runGuarded(task);
    }
  }

  private async runGuarded(task: NamedTask): Promise<void> {
    try {
      await task.run(this.shutdownController.signal);
    } catch (error) {
      this.metrics?.backgroundTaskFailures.inc({ task: task.name });
      this.logger.error({ task: task.name, err: error }, 'Background task failed');
    }
  }

  private track(promise: Promise<void>): Promise<void> {
    const tracked = promise.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
    return tracked;
  }
}
