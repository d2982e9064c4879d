import { ServiceAssertionError } from '@changeplane/service-errors';
import _ from 'lodash';
import { createInMemoryProbe, createTerminationHandler, ProbeModule, TerminationHandler } from './signals/signals-index.js';

export enum ContainerImplementation {
  PROBES = 'probes',
  TERMINATION_HANDLER = 'termination-handler'
}

export type ContainerImplementationTypes = {
  [ContainerImplementation.PROBES]: ProbeModule;
  [ContainerImplementation.TERMINATION_HANDLER]: TerminationHandler;
};

export type RegisterDefaultsOptions = {
  skip?: ContainerImplementation[];
};

export type ContainerImplementationDefaultGenerators = {
  [type in ContainerImplementation]: () => ContainerImplementationTypes[type];
};

const DEFAULT_GENERATORS: ContainerImplementationDefaultGenerators = {
  [ContainerImplementation.PROBES]: () => createInMemoryProbe(),
  [ContainerImplementation.TERMINATION_HANDLER]: () => createTerminationHandler()
};

/**
 * A container which provides means for registering and getting process-wide
 * implementations.
 */
export class Container {
  protected implementations: Partial<ContainerImplementationTypes> = {};

  /**
   * Manager for system health probes
   */
  get probes() {
    return this.getImplementation(ContainerImplementation.PROBES);
  }

  /**
   * Handler for termination of the Node process
   */
  get terminationHandler() {
    return this.getImplementation(ContainerImplementation.TERMINATION_HANDLER);
  }

  /**
   * Gets an implementation given an identifier.
   * An exception is thrown if the implementation has not been registered.
   */
  getImplementation<T extends ContainerImplementation>(identifier: T): ContainerImplementationTypes[T] {
    const implementation = this.getOptional(identifier);
    if (!implementation) {
      throw new ServiceAssertionError(`Implementation for ${identifier} has not been registered.`);
    }
    return implementation;
  }

  /**
   * Gets an implementation given an identifier.
   * Null is returned if the implementation has not been registered yet.
   */
  getOptional<T extends ContainerImplementation>(identifier: T): ContainerImplementationTypes[T] | null {
    return this.implementations[identifier] ?? null;
  }

  /**
   * Registers default implementations
   */
  registerDefaults(options?: RegisterDefaultsOptions) {
    const types = _.difference(Object.values(ContainerImplementation), options?.skip ?? []);
    if (types.includes(ContainerImplementation.PROBES)) {
      this.register(ContainerImplementation.PROBES, DEFAULT_GENERATORS[ContainerImplementation.PROBES]());
    }
    if (types.includes(ContainerImplementation.TERMINATION_HANDLER)) {
      this.register(
        ContainerImplementation.TERMINATION_HANDLER,
        DEFAULT_GENERATORS[ContainerImplementation.TERMINATION_HANDLER]()
      );
    }
  }

  register<T extends ContainerImplementation>(identifier: T, implementation: ContainerImplementationTypes[T]) {
    this.implementations[identifier] = implementation;
  }
}

export const container = new Container();
