import { router, schema } from '@changeplane/lib-services-framework';
import { api_routes } from '@changeplane/service-types';

import { serialize } from '../../api/api-index.js';
import { accepted, routeDefinition } from '../router.js';

export const moveTable = routeDefinition({
  path: '/api/v1/changefeeds/:changefeed_id/tables/move_table',
  method: router.HTTPMethod.POST,
  validator: schema.createTsCodecValidator(api_routes.MoveTableRequest, { allowAdditional: true }),
  handler: async (payload) => {
    const job = await payload.context.service_context.controlAPI.moveTable(payload.params);
    return accepted(serialize.serializeAdminJob(job));
  }
});

export const rebalanceTables = routeDefinition({
  path: '/api/v1/changefeeds/:changefeed_id/tables/rebalance_table',
  method: router.HTTPMethod.POST,
  validator: schema.createTsCodecValidator(api_routes.ChangefeedIdParams, { allowAdditional: true }),
  handler: async (payload) => {
    const job = await payload.context.service_context.controlAPI.rebalanceTables(payload.params.changefeed_id);
    return accepted(serialize.serializeAdminJob(job));
  }
});

export const TABLE_ROUTES = [moveTable, rebalanceTables];
