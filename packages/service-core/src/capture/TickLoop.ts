import { Logger } from '@changeplane/lib-services-framework';
import * as timers from 'timers/promises';

export type TickLoopOptions = {
  name: string;
  interval_ms: number;
  /**
   * The signal aborts once the loop is stopped.
   */
  tick: (signal: AbortSignal) => Promise<void>;
  logger: Logger;
};

/**
 * Runs a tick function at a fixed interval until stopped. A failing tick is logged and retried on the next interval.
 */
export class TickLoop {
  private abortController = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(private options: TickLoopOptions) {}

  start() {
    this.loop = this.runLoop();
  }

  async stop() {
    this.abortController.abort();
    await this.loop;
  }

  private async runLoop() {
    const { name, interval_ms, tick, logger } = this.options;
    const signal = this.abortController.signal;
    while (!signal.aborted) {
      try {
        await tick(signal);
      } catch (e) {
        logger.error(`${name} failed`, e);
      }
      try {
        await timers.setTimeout(interval_ms, undefined, { signal });
      } catch (e) {
        if (!signal.aborted) {
          throw e;
        }
      }
    }
  }
}
