import { Logger } from '@nestjs/common';

/**
 * Tracks work started after the response was sent so it can be awaited
 * on shutdown.
 */
export class BackgroundTasks {
  private readonly logger = new Logger(BackgroundTasks.name);
  private readonly inFlight = new Set<Promise<void>>();

  /**
   * Start a task on the next tick. Rejections are logged, never rethrown.
   */
  run(name: string, task: () => Promise<void>): void {
    const promise = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .catch((error: unknown) => {
        this.logger.error(
          `Background task ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      })
      .finally(() => {
        this.inFlight.delete(promise);
      });

    this.inFlight.add(promise);
  }

  /**
   * Resolve once every task started so far (and any they start) has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get size(): number {
    return this.inFlight.size;
  }
}
