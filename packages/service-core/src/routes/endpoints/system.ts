import { router, schema } from '@changeplane/lib-services-framework';
import { api_routes } from '@changeplane/service-types';

import { routeDefinition } from '../router.js';

export const health = routeDefinition({
  path: '/api/v1/health',
  method: router.HTTPMethod.GET,
  handler: async (payload) => {
    await payload.context.service_context.controlAPI.health();
    return {};
  }
});

export const status = routeDefinition({
  path: '/api/v1/status',
  method: router.HTTPMethod.GET,
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.status();
  }
});

export const setLogLevel = routeDefinition({
  path: '/api/v1/log',
  method: router.HTTPMethod.POST,
  validator: schema.createTsCodecValidator(api_routes.SetLogLevelRequest, { allowAdditional: true }),
  handler: async (payload) => {
    payload.context.service_context.controlAPI.setLogLevel(payload.params.log_level);
    return {};
  }
});

export const SYSTEM_ROUTES = [health, status, setLogLevel];
