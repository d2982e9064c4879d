import type fastify from 'fastify';
import a from 'async';
import { logger, TooManyRequestsError } from '@changeplane/lib-services-framework';

import { serviceErrorToResponse } from './route-register.js';

export type CreateRequestQueueParams = {
  max_queue_depth: number;
  concurrency: number;
};

/**
 * Creates a request queue which limits the amount of concurrent requests which
 * are active at any time. Requests beyond the queue depth are answered with 429.
 * A depth of 0 only admits requests while a slot is free.
 */
export const createRequestQueueHook = (params: CreateRequestQueueParams): fastify.onRequestHookHandler => {
  const request_queue = a.queue<() => Promise<void>>((event, done) => {
    event().finally(done);
  }, params.concurrency);

  return (request, reply, next) => {
    if (
      (params.max_queue_depth == 0 && request_queue.running() == params.concurrency) ||
      (params.max_queue_depth > 0 && request_queue.length() >= params.max_queue_depth)
    ) {
      logger.warn(`${request.method} ${request.url}`, {
        status: 429,
        method: request.method,
        path: request.url,
        route: request.routeOptions.url,
        queue_overflow: true
      });
      const { status, headers, data } = serviceErrorToResponse(new TooManyRequestsError(request_queue.length()));
      return reply.status(status).headers(headers).send(data);
    }

    const finished = new Promise<void>((resolve) => {
      reply.then(
        () => resolve(),
        () => resolve()
      );
    });

    request_queue.push(() => {
      next();
      return finished;
    });
  };
};
