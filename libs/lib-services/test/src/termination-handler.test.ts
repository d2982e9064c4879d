import { describe, expect, test, vi } from 'vitest';

import { logger } from '../../src/logger/Logger.js';
import { createTerminationHandler, Signal } from '../../src/signals/termination-handler.js';

describe('termination handler', () => {
  test('runs the most recently registered handler first and continues after failures', async () => {
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => logger);
    const handler = createTerminationHandler({ signals: [], exit: () => {} });
    const calls: string[] = [];

    handler.handleTerminationSignal(() => {
      calls.push('storage');
    });
    handler.handleTerminationSignal(async () => {
      calls.push('capture');
      throw new Error('stuck');
    });
    handler.handleTerminationSignal((signal) => {
      calls.push(`server ${signal}`);
    });

    await handler.runHandlers(Signal.SIGTERM);

    expect(calls).toEqual(['server SIGTERM', 'capture', 'storage']);
    expect(errorSpy).toHaveBeenCalledWith('Termination handler failed', new Error('stuck'));
    errorSpy.mockRestore();
  });
});
