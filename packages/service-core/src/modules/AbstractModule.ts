import { Logger, logger } from '@changeplane/lib-services-framework';
import { ServiceContextContainer } from '../system/ServiceContext.js';

export interface AbstractModuleOptions {
  name: string;
}

/**
 * A module contributes storage providers, routes or source and pipeline implementations
 * to a {@link ServiceContextContainer} before it starts.
 */
export abstract class AbstractModule {
  protected logger: Logger;

  protected constructor(protected options: AbstractModuleOptions) {
    this.logger = logger.child({ name: `Module:${options.name}` });
  }

  /**
   *  Initialize the module using any required services from the ServiceContext
   */
  public abstract initialize(context: ServiceContextContainer): Promise<void>;

  public get name() {
    return this.options.name;
  }
}
