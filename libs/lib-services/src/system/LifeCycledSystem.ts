/**
 * An interface that can be used to create a stateful System. A System is an entity
 * which contains state, generally in the form of connections, that must be started
 * and stopped gracefully along with a services lifecycle.
 *
 * A System can contain anything but should offer a `start` and `stop` operation
 */

import { ServiceError } from '@changeplane/service-errors';
import { logger } from '../logger/Logger.js';
import { TerminationHandler } from '../signals/termination-handler.js';

export type LifecycleCallback<T> = (singleton: T) => Promise<void> | void;

export type PartialLifecycle<T> = {
  start?: LifecycleCallback<T>;
  stop?: LifecycleCallback<T>;
};

type RegisteredLifecycle = {
  start: () => Promise<void> | void;
  stop: () => Promise<void> | void;
};

export type LifeCycledSystemOptions = {
  /**
   * When provided, the system is stopped on process termination signals.
   */
  terminationHandler?: TerminationHandler;
};

export class LifeCycledSystem {
  protected components: RegisteredLifecycle[] = [];

  constructor(options?: LifeCycledSystemOptions) {
    options?.terminationHandler?.handleTerminationSignal(() => this.stop());
  }

  withLifecycle = <T>(component: T, lifecycle: PartialLifecycle<T>): T => {
    this.components.push({
      start: () => lifecycle.start?.(component),
      stop: () => lifecycle.stop?.(component)
    });
    return component;
  };

  start = async () => {
    for (const lifecycle of this.components) {
      await lifecycle.start();
    }
  };

  /**
   * Stops components in reverse registration order.
   */
  stop = async () => {
    for (const lifecycle of [...this.components].reverse()) {
      await lifecycle.stop();
    }
  };

  stopWithError = async (error: ServiceError) => {
    try {
      logger.error('Stopping process due to fatal error', error);
      await this.stop();
    } catch (e) {
      logger.error('Error while stopping', e);
    } finally {
      // Custom error code to distinguish from other common errors
      logger.warn(`Exiting with code 151`);
      process.exit(151);
    }
  };
}
