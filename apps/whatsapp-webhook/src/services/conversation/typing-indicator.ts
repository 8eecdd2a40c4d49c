import type { AppLogger } from '../../telemetry/logger';
import type { TaskSpawner } from '../tasks/background-tasks';

export interface TypingIndicatorOptions {
  intervalMs: number;
  /** Measured from the first indicator; no indicator is sent after this. */
  maxDurationMs: number;
  now?: () => number;
}

export type SendTypingIndicator = (signal: AbortSignal) => Promise<void>;

/**
 * Keeps WhatsApp's "typing…" bubble visible while a reply is prepared. WhatsApp
 * hides the bubble after about 25 seconds, so it is re-sent on an interval
 * until `stop()` is called or the safety cap is reached.
 */
export class TypingIndicatorLoop {
  private controller?: AbortController;
  private loop?: Promise<void>;
  private firstIndicatorAt?: number;
  private readonly now: () => number;

  constructor(
    private readonly send: SendTypingIndicator,
    private readonly spawner: TaskSpawner,
    private readonly logger: AppLogger,
    private readonly options: TypingIndicatorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.controller !== undefined && !this.controller.signal.aborted;
  }

  /** Send the first indicator, then keep refreshing it in the background. */
  async start(): Promise<void> {
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.firstIndicatorAt = this.now();

    await this.sendSafely(controller.signal);

    if (!controller.signal.aborted) {
      this.loop = this.spawner.spawn('typing-indicator-loop', (shutdown) =>
        this.runUntilShutdown(controller, shutdown),
      );
    }
  }

  /** Cancel the loop and wait until no further indicator can be sent. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
  }

  private async runUntilShutdown(controller: AbortController, shutdown: AbortSignal): Promise<void> {
    const onShutdown = () => controller.abort();
    if (shutdown.aborted) {
      controller.abort();
    } else {
      shutdown.addEventListener('abort', onShutdown, { once: true });
    }

    try {
      await this.run(controller.signal);
    } finally {
      shutdown.removeEventListener('abort', onShutdown);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const startedAt = this.firstIndicatorAt ?? this.now();

    while (await delay(this.options.intervalMs, signal)) {
      const elapsedMs = this.now() - startedAt;
      if (elapsedMs > this.options.maxDurationMs) {
        this.logger.warn(
          { maxDurationMs: this.options.maxDurationMs },
          'Typing indicator loop reached its maximum duration',
        );
        return;
      }

      this.logger.debug({ elapsedMs }, 'Sending follow-up typing indicator');
      await this.sendSafely(signal);
    }

    this.logger.debug('Typing indicator loop cancelled');
  }

  private async sendSafely(signal: AbortSignal): Promise<void> {
    try {
      await this.send(signal);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      this.logger.warn({ err: error }, 'Failed to send typing indicator');
    }
  }
}

/** Wait `ms`; resolves false instead when the signal aborts first. */
export function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
