import type fastify from 'fastify';

import { CHANGEFEED_ROUTES } from './endpoints/changefeeds.js';
import { CLUSTER_ROUTES } from './endpoints/cluster.js';
import { PROBES_ROUTES } from './endpoints/probes.js';
import { SYSTEM_ROUTES } from './endpoints/system.js';
import { TABLE_ROUTES } from './endpoints/tables.js';
import { createRequestQueueHook, CreateRequestQueueParams } from './hooks.js';
import { registerFastifyNotFoundHandler, registerFastifyRoutes } from './route-register.js';
import { ContextProvider, RouteDefinition, RouterServiceContext } from './router.js';

/**
 * A list of route definitions to be registered as endpoints.
 * Supplied concurrency limits will be applied to the grouped routes.
 */
export type RouteRegistrationOptions = {
  routes: RouteDefinition[];
  queueOptions: CreateRequestQueueParams;
};

/**
 * HTTP routes separated into the Control API and health probes.
 * Probes are not queued behind API requests.
 */
export type RouteDefinitions = {
  api?: Partial<RouteRegistrationOptions>;
  probes?: Partial<RouteRegistrationOptions>;
};

export type FastifyServerConfig = {
  service_context: RouterServiceContext;
  routes?: RouteDefinitions;
};

export const CONTROL_API_ROUTES: RouteDefinition[] = [
  ...CHANGEFEED_ROUTES,
  ...TABLE_ROUTES,
  ...CLUSTER_ROUTES,
  ...SYSTEM_ROUTES
];

export const DEFAULT_ROUTE_OPTIONS = {
  api: {
    routes: CONTROL_API_ROUTES,
    queueOptions: {
      concurrency: 10,
      max_queue_depth: 20
    }
  },
  probes: {
    routes: PROBES_ROUTES,
    queueOptions: {
      concurrency: 10,
      max_queue_depth: 0
    }
  }
};

/**
 * Registers default routes on a Fastify server. Consumers can optionally configure
 * concurrency queue limits or override routes.
 */
export function configureFastifyServer(server: fastify.FastifyInstance, options: FastifyServerConfig) {
  const { service_context, routes = DEFAULT_ROUTE_OPTIONS } = options;

  const contextProvider: ContextProvider = async (_request, { logger }) => {
    return {
      service_context,
      logger
    };
  };

  /**
   * Fastify creates an encapsulated context for each `.register` call.
   * Separate contexts keep the concurrency limits of the API and probe routes apart.
   */
  server.register(async function (childContext) {
    registerFastifyRoutes(childContext, contextProvider, routes.api?.routes ?? DEFAULT_ROUTE_OPTIONS.api.routes);
    // Limit the active concurrent requests
    childContext.addHook(
      'onRequest',
      createRequestQueueHook(routes.api?.queueOptions ?? DEFAULT_ROUTE_OPTIONS.api.queueOptions)
    );
  });

  server.register(async function (childContext) {
    registerFastifyRoutes(
      childContext,
      contextProvider,
      routes.probes?.routes ?? DEFAULT_ROUTE_OPTIONS.probes.routes
    );
    childContext.addHook(
      'onRequest',
      createRequestQueueHook(routes.probes?.queueOptions ?? DEFAULT_ROUTE_OPTIONS.probes.queueOptions)
    );
  });

  registerFastifyNotFoundHandler(server);
}
