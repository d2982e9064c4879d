import { logger } from '@changeplane/lib-services-framework';

import { RouteDefinition } from './router.js';

export type RouterSetupResponse = {
  onShutdown: () => Promise<void>;
};

export type RouterEngineRoutes = {
  api_routes: RouteDefinition[];
  probe_routes: RouteDefinition[];
};

/**
 * Starts an HTTP server for the given routes. Returns how to stop it.
 */
export type RouterSetup = (routes: RouterEngineRoutes) => Promise<RouterSetupResponse>;

/**
 * Collects the routes modules register and starts the HTTP server which serves them.
 * No server is started when nothing was registered.
 */
export class RouterEngine {
  readonly routes: RouterEngineRoutes = { api_routes: [], probe_routes: [] };
  private stopServer: (() => Promise<void>) | null = null;

  registerRoutes(routes: Partial<RouterEngineRoutes>) {
    this.routes.api_routes.push(...(routes.api_routes ?? []));
    this.routes.probe_routes.push(...(routes.probe_routes ?? []));
  }

  get hasRoutes() {
    return this.routes.api_routes.length + this.routes.probe_routes.length > 0;
  }

  get running() {
    return this.stopServer != null;
  }

  async start(setup: RouterSetup) {
    const { api_routes, probe_routes } = this.routes;
    if (!this.hasRoutes) {
      logger.info('No routes registered, not starting the HTTP server');
      return;
    }
    const { onShutdown } = await setup(this.routes);
    this.stopServer = onShutdown;
    logger.info(`HTTP server started with ${api_routes.length} API and ${probe_routes.length} probe route(s)`);
  }

  async shutDown() {
    const stop = this.stopServer;
    this.stopServer = null;
    if (stop) {
      await stop();
      logger.info('HTTP server stopped');
    }
  }
}
