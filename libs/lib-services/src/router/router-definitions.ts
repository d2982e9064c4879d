import { MicroValidator } from '../schema/definitions.js';

/**
 * HTTP methods the Control API and probe routes are served on.
 */
export enum HTTPMethod {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  DELETE = 'DELETE'
}

/**
 * What a handler receives: the validated request parameters and the per-request context.
 */
export type EndpointHandlerPayload<P, C> = {
  params: P;
  context: C;
};

export type EndpointHandler<P, O> = (payload: P) => O | Promise<O>;

/**
 * A route: where it is served, how its parameters are validated and what handles it.
 * `P` defaults to the plain payload; HTTP routers extend it with their request object.
 */
export type Endpoint<I, O, C, P = EndpointHandlerPayload<I, C>, H = EndpointHandler<P, O>> = {
  path: string;
  method: HTTPMethod;
  /**
   * Checked before the handler runs. Failing validation answers with `CDC:ErrAPIInvalidParam`.
   */
  validator?: MicroValidator<I>;
  handler: H;
};
