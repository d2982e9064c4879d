import { router, schema } from '@changeplane/lib-services-framework';
import { api_routes } from '@changeplane/service-types';

import { accepted, routeDefinition } from '../router.js';

export const resignOwner = routeDefinition({
  path: '/api/v1/owner/resign',
  method: router.HTTPMethod.POST,
  handler: async (payload) => {
    await payload.context.service_context.controlAPI.resignOwner();
    return accepted({});
  }
});

export const listCaptures = routeDefinition({
  path: '/api/v1/captures',
  method: router.HTTPMethod.GET,
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.listCaptures();
  }
});

export const listProcessors = routeDefinition({
  path: '/api/v1/processors',
  method: router.HTTPMethod.GET,
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.listProcessors();
  }
});

export const getProcessor = routeDefinition({
  path: '/api/v1/processors/:changefeed_id/:capture_id',
  method: router.HTTPMethod.GET,
  validator: schema.createTsCodecValidator(api_routes.GetProcessorRequest, { allowAdditional: true }),
  handler: async (payload) => {
    const { changefeed_id, capture_id } = payload.params;
    return payload.context.service_context.controlAPI.getProcessor(changefeed_id, capture_id);
  }
});

export const CLUSTER_ROUTES = [resignOwner, listCaptures, listProcessors, getProcessor];
