import { container, type ProbeState, router } from '@changeplane/lib-services-framework';
import { routeDefinition } from '../router.js';

export enum ProbeRoutes {
  STARTUP = '/probes/startup',
  LIVENESS = '/probes/liveness',
  READINESS = '/probes/readiness'
}

/**
 * Answers with the current probe state, and 200 or 400 depending on `healthy`.
 */
const probeRoute = (path: ProbeRoutes, healthy: (state: ProbeState) => boolean) =>
  routeDefinition({
    path,
    method: router.HTTPMethod.GET,
    handler: async () => {
      const state = container.probes.state();
      return new router.RouterResponse({ status: healthy(state) ? 200 : 400, data: { ...state } });
    }
  });

export const startupCheck = probeRoute(ProbeRoutes.STARTUP, (state) => state.started);

// Liveness also requires a recent touch, which the state alone does not tell
export const livenessCheck = probeRoute(ProbeRoutes.LIVENESS, () => container.probes.isAlive());

export const readinessCheck = probeRoute(ProbeRoutes.READINESS, (state) => state.ready);

export const PROBES_ROUTES = [startupCheck, livenessCheck, readinessCheck];
