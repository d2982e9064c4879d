import { router, schema } from '@changeplane/lib-services-framework';
import { api_routes } from '@changeplane/service-types';

import { serialize } from '../../api/api-index.js';
import { accepted, routeDefinition } from '../router.js';

export enum ChangefeedRoutes {
  CHANGEFEEDS = '/api/v1/changefeeds',
  CHANGEFEED = '/api/v1/changefeeds/:changefeed_id',
  PAUSE = '/api/v1/changefeeds/:changefeed_id/pause',
  RESUME = '/api/v1/changefeeds/:changefeed_id/resume',
  ADMIN_JOBS = '/api/v1/changefeeds/:changefeed_id/admin_jobs'
}

const changefeedIdValidator = schema.createTsCodecValidator(api_routes.ChangefeedIdParams, { allowAdditional: true });

export const createChangefeed = routeDefinition({
  path: ChangefeedRoutes.CHANGEFEEDS,
  method: router.HTTPMethod.POST,
  validator: schema.createTsCodecValidator(api_routes.CreateChangefeedRequest, { allowAdditional: true }),
  handler: async (payload) => {
    const info = await payload.context.service_context.controlAPI.createChangefeed(payload.params);
    payload.context.logger.info(`Created changefeed ${info.id}`);
    return accepted(serialize.serializeChangefeed(info));
  }
});

export const listChangefeeds = routeDefinition({
  path: ChangefeedRoutes.CHANGEFEEDS,
  method: router.HTTPMethod.GET,
  validator: schema.createTsCodecValidator(api_routes.ListChangefeedsRequest, { allowAdditional: true }),
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.listChangefeeds(payload.params.state);
  }
});

export const getChangefeed = routeDefinition({
  path: ChangefeedRoutes.CHANGEFEED,
  method: router.HTTPMethod.GET,
  validator: changefeedIdValidator,
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.getChangefeed(payload.params.changefeed_id);
  }
});

export const updateChangefeed = routeDefinition({
  path: ChangefeedRoutes.CHANGEFEED,
  method: router.HTTPMethod.PUT,
  validator: schema.createTsCodecValidator(api_routes.UpdateChangefeedRequest, { allowAdditional: true }),
  handler: async (payload) => {
    await payload.context.service_context.controlAPI.updateChangefeed(payload.params);
    return accepted({});
  }
});

export const pauseChangefeed = routeDefinition({
  path: ChangefeedRoutes.PAUSE,
  method: router.HTTPMethod.POST,
  validator: changefeedIdValidator,
  handler: async (payload) => {
    const job = await payload.context.service_context.controlAPI.pauseChangefeed(payload.params.changefeed_id);
    return accepted(serialize.serializeAdminJob(job));
  }
});

export const resumeChangefeed = routeDefinition({
  path: ChangefeedRoutes.RESUME,
  method: router.HTTPMethod.POST,
  validator: changefeedIdValidator,
  handler: async (payload) => {
    const job = await payload.context.service_context.controlAPI.resumeChangefeed(payload.params.changefeed_id);
    return accepted(serialize.serializeAdminJob(job));
  }
});

export const removeChangefeed = routeDefinition({
  path: ChangefeedRoutes.CHANGEFEED,
  method: router.HTTPMethod.DELETE,
  validator: changefeedIdValidator,
  handler: async (payload) => {
    const job = await payload.context.service_context.controlAPI.removeChangefeed(payload.params.changefeed_id);
    return accepted(serialize.serializeAdminJob(job));
  }
});

export const listAdminJobs = routeDefinition({
  path: ChangefeedRoutes.ADMIN_JOBS,
  method: router.HTTPMethod.GET,
  validator: changefeedIdValidator,
  handler: async (payload) => {
    return payload.context.service_context.controlAPI.listAdminJobs(payload.params.changefeed_id);
  }
});

export const CHANGEFEED_ROUTES = [
  createChangefeed,
  listChangefeeds,
  getChangefeed,
  updateChangefeed,
  pauseChangefeed,
  resumeChangefeed,
  removeChangefeed,
  listAdminJobs
];
