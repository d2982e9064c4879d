import cors from '@fastify/cors';
import * as framework from '@changeplane/lib-services-framework';
import * as core from '@changeplane/service-core';
import fastify from 'fastify';

/**
 * Registers the Control API, the health probes and the in-memory coordination store.
 */
export class CoreModule extends core.modules.AbstractModule {
  constructor() {
    super({
      name: 'Core'
    });
  }

  public async initialize(context: core.ServiceContextContainer): Promise<void> {
    context.storageEngine.registerProvider(new core.storage.MemoryStorageProvider());

    this.registerAPIRoutes(context);

    // Configures a Fastify server which serves the registered routes
    this.configureRouterImplementation(context);

    this.configureHealthChecks(context);
  }

  protected registerAPIRoutes(context: core.ServiceContextContainer) {
    context.routerEngine.registerRoutes({
      api_routes: core.routes.CONTROL_API_ROUTES
    });
  }

  /**
   * Configures the HTTP server which will handle routes once the router engine is started.
   * Registered after the capture, so requests only arrive once the Control API exists.
   */
  protected configureRouterImplementation(context: core.ServiceContextContainer) {
    context.lifeCycleEngine.withLifecycle(context.routerEngine, {
      start: async (routerEngine) => {
        await routerEngine.start(async (routes) => {
          const server = fastify.fastify();

          server.register(cors, {
            origin: '*',
            allowedHeaders: ['Content-Type', 'User-Agent'],
            exposedHeaders: ['Content-Type'],
            // Cache time for preflight response
            maxAge: 3600
          });

          const { api_parameters } = context.configuration;
          core.routes.configureFastifyServer(server, {
            service_context: context,
            routes: {
              api: {
                routes: routes.api_routes,
                queueOptions: {
                  concurrency: api_parameters.max_concurrent_requests,
                  max_queue_depth: api_parameters.max_queue_depth
                }
              },
              probes: { routes: routes.probe_routes }
            }
          });

          const { port } = context.configuration;

          await server.listen({
            host: '0.0.0.0',
            port
          });

          framework.logger.info(`Running on port ${port}`);

          return {
            onShutdown: async () => {
              framework.logger.info('Shutting down HTTP server...');
              await server.close();
              framework.logger.info('HTTP server stopped');
            }
          };
        });
      }
    });
  }

  protected configureHealthChecks(context: core.ServiceContextContainer) {
    const {
      configuration: {
        healthcheck: { probes }
      }
    } = context;

    if (probes.use_http) {
      context.routerEngine.registerRoutes({
        probe_routes: core.routes.endpoints.PROBES_ROUTES
      });
    }

    if (!framework.container.getOptional(framework.ContainerImplementation.PROBES)) {
      framework.container.register(framework.ContainerImplementation.PROBES, framework.createInMemoryProbe());
    }
  }
}
