import { Logger, router } from '@changeplane/lib-services-framework';
import type { ServiceContext } from '../system/ServiceContext.js';

/**
 * The parts of the {@link ServiceContext} routes depend on.
 */
export type RouterServiceContext = Pick<ServiceContext, 'controlAPI'>;

/**
 * Common context for routes
 */
export type Context = {
  service_context: RouterServiceContext;

  logger: Logger;
};

export type BasicRouterRequest = {
  headers: Record<string, string | string[] | undefined>;
  protocol: string;
  hostname: string;
};

export type ContextProviderOptions = {
  logger: Logger;
};

export type ContextProvider = (request: BasicRouterRequest, options: ContextProviderOptions) => Promise<Context>;

export type RequestEndpoint<
  I,
  O,
  C = Context,
  Payload = RequestEndpointHandlerPayload<I, C, BasicRouterRequest>
> = router.Endpoint<I, O, C, Payload> & {};

export type RequestEndpointHandlerPayload<
  I = any,
  C = Context,
  Request = BasicRouterRequest
> = router.EndpointHandlerPayload<I, C> & {
  request: Request;
};

export type RouteDefinition<I = any, O = any> = RequestEndpoint<I, O>;

/**
 * Helper function for making generics work well when defining routes
 */
export function routeDefinition<I, O, C = Context, Extension = {}>(
  params: RequestEndpoint<I, O, C> & Extension
): RequestEndpoint<I, O, C> & Extension {
  return params;
}

/**
 * Answer for operations that were validated and queued. The outcome is observed by polling.
 */
export const accepted = <T>(data: T) => new router.RouterResponse({ status: 202, data });
