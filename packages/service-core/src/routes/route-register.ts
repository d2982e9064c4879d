import type fastify from 'fastify';
import * as uuid from 'uuid';

import { errors, logger, RouteNotFound, router, ServiceError } from '@changeplane/lib-services-framework';
import { ErrorResponse } from '@changeplane/service-types';
import { FastifyReply } from 'fastify';
import { Context, ContextProvider, RequestEndpoint, RequestEndpointHandlerPayload } from './router.js';

export type FastifyEndpoint<I, O, C> = RequestEndpoint<I, O, C> & {
  plugins?: fastify.FastifyPluginAsync[];
};

const toRecord = (value: unknown): Record<string, unknown> => {
  if (typeof value != 'object' || value == null || Array.isArray(value) || Buffer.isBuffer(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
};

/**
 * Registers endpoint definitions as routes on a Fastify app instance.
 *
 * Path parameters, query and body are merged into one params object before validation.
 */
export function registerFastifyRoutes(
  app: fastify.FastifyInstance,
  contextProvider: ContextProvider,
  endpoints: FastifyEndpoint<any, any, Context>[]
) {
  for (const e of endpoints) {
    // Create a new context for each route
    app.register(async function (fastify) {
      fastify.route({
        url: e.path,
        method: e.method,
        handler: async (request, reply) => {
          const startTime = new Date();
          let response: router.RouterResponse;
          const requestLogger = logger.child({
            route: e.path,
            rid: `h/${uuid.v7()}`
          });
          try {
            const context = await contextProvider(request, { logger: requestLogger });
            // Path parameters name the resource and are never overridden by the body or query
            const combined = {
              ...toRecord(request.body),
              ...toRecord(request.query),
              ...toRecord(request.params)
            };

            const payload: RequestEndpointHandlerPayload = {
              context: context,
              params: combined,
              request
            };

            const endpointResponse = await router.executeEndpoint(e, payload);

            if (router.RouterResponse.isRouterResponse(endpointResponse)) {
              response = endpointResponse;
            } else {
              response = new router.RouterResponse({
                status: 200,
                data: endpointResponse
              });
            }
          } catch (ex) {
            const serviceError = errors.asServiceError(ex);
            if ((serviceError.errorData.status ?? 500) >= 500) {
              requestLogger.error(`Request failed`, serviceError);
            } else {
              requestLogger.info(`Request rejected: ${serviceError.message}`);
            }

            response = serviceErrorToResponse(serviceError);
          }

          try {
            await respond(reply, response);
          } finally {
            await response.afterSend({ clientClosed: request.socket.closed });
            requestLogger.info(`${e.method} ${request.url}`, {
              duration_ms: Math.round(new Date().valueOf() - startTime.valueOf() + Number.EPSILON),
              status: response.status,
              method: e.method,
              path: request.url
            });
          }
        }
      });

      e.plugins?.forEach((plugin) => fastify.register(plugin));
    });
  }
}

/**
 * Registers a custom not-found handler to ensure 404 error responses have the same schema as other service errors.
 */
export function registerFastifyNotFoundHandler(app: fastify.FastifyInstance) {
  app.setNotFoundHandler(async (request, reply) => {
    await respond(reply, serviceErrorToResponse(new RouteNotFound(request.originalUrl, request.method)));
  });
}

export function serviceErrorToResponse(error: ServiceError): router.RouterResponse<ErrorResponse> {
  const { code, description, details, status } = error.errorData;
  return new router.RouterResponse({
    status: status || 500,
    headers: {
      'Content-Type': 'application/json'
    },
    data: {
      error_code: code,
      error_msg: details ? `${description}: ${details}` : description
    }
  });
}

async function respond(reply: FastifyReply, response: router.RouterResponse) {
  Object.keys(response.headers).forEach((key) => {
    reply.header(key, response.headers[key]);
  });
  reply.status(response.status);
  await reply.send(response.data);
}

