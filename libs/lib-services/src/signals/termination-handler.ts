import _ from 'lodash';
import { logger } from '../logger/Logger.js';

export enum Signal {
  SIGTERM = 'SIGTERM',
  SIGINT = 'SIGINT',
  SIGUSR2 = 'SIGUSR2'
}

export type Handler = (event: Signal) => void | Promise<void>;

export type TerminationHandlerParams = {
  /**
   * @default ['SIGTERM', 'SIGINT', 'SIGUSR2']
   */
  signals?: Signal[];
  /**
   * The process is force exited when the handlers have not completed within this time.
   */
  timeout_ms?: number;
  exit?: (code: number) => void;
};

/**
 * Runs the registered handlers once a termination signal arrives, then exits the process.
 * Handlers run one after another, the most recently registered first.
 */
export const createTerminationHandler = (params?: TerminationHandlerParams) => {
  const { signals = Object.values(Signal), timeout_ms = 30_000, exit = (code: number) => process.exit(code) } = params ?? {};
  const handlers: Handler[] = [];
  let terminating = false;

  const runHandlers = async (signal: Signal) => {
    logger.info(`Received ${signal}, shutting down`);
    for (const handler of [...handlers].reverse()) {
      try {
        await handler(signal);
      } catch (err) {
        logger.error('Termination handler failed', err);
      }
    }
    logger.info('Shutdown complete');
  };

  const onSignal = (signal: Signal) => {
    if (terminating) {
      if (signal == Signal.SIGINT) {
        logger.info('Second interrupt received, exiting immediately');
        exit(1);
      }
      return;
    }
    terminating = true;
    if (signal == Signal.SIGINT) {
      logger.info('Interrupt again to exit immediately');
    }

    const forceExit = setTimeout(() => {
      logger.error(`Shutdown did not complete within ${timeout_ms}ms, exiting`);
      exit(1);
    }, timeout_ms);
    forceExit.unref();

    runHandlers(signal).then(
      () => exit(0),
      (err) => {
        logger.error('Shutdown failed', err);
        exit(1);
      }
    );
  };

  // Process managers may deliver one kill signal several times in quick succession
  const debounced = _.debounce(onSignal, 1000, { leading: true, trailing: false });
  for (const signal of signals) {
    process.on(signal, () => debounced(signal));
  }

  return {
    handleTerminationSignal: (handler: Handler) => {
      handlers.push(handler);
    },
    /**
     * Runs the handlers without exiting the process.
     */
    runHandlers
  };
};

export type TerminationHandler = ReturnType<typeof createTerminationHandler>;
