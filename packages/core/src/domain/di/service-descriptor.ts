/**
 * @fileoverview IServiceDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the metadata structure for registered services.
 * A provider consumes its descriptor list exactly once, when it is built.
 *
 * @version 1.0.0
 */

import { type IServiceProvider } from './di.interface';
import { type ServiceIdentifier, type Constructor, getServiceName } from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Factory function type for creating service instances.
 *
 * @template T - The service instance type
 *
 * @remarks
 * The factory receives the provider that is executing the resolution: the
 * requesting scope for Transient and Scoped registrations, the root provider
 * for Singletons.
 *
 * @example Factory with dependencies
 * ```typescript
 * const loggerFactory: ServiceFactory<ILogger> = (provider) => {
 *   const config = provider.getRequiredService(IConfig);
 *   return new ConsoleLogger(config.logLevel);
 * };
 * ```
 */
export type ServiceFactory<T> = (provider: IServiceProvider) => T;

/**
 * IServiceDescriptor - Complete metadata for a registered service.
 *
 * @template T - The service instance type
 *
 * @remarks
 * **Three Registration Patterns:**
 *
 * 1. **Class-based**: `implementationType`, dependencies from `static inject`
 * 2. **Factory-based**: `factory`
 * 3. **Instance-based**: `implementationInstance`, always Singleton
 *
 * **Invariants:**
 *
 * - Exactly one of `implementationType`, `factory` and `implementationInstance`
 * - Registering the same identifier twice keeps both; singular resolution
 *   uses the last one, enumerable resolution returns both in order
 */
export interface IServiceDescriptor<T = unknown> {
  /**
   * The identifier used to request this service.
   */
  readonly serviceIdentifier: ServiceIdentifier<T>;

  /**
   * The lifecycle scope of this service.
   */
  readonly lifetime: ServiceLifetime;

  /**
   * The concrete implementation class.
   */
  readonly implementationType?: Constructor<T> | undefined;

  /**
   * Factory function for creating instances.
   */
  readonly factory?: ServiceFactory<T> | undefined;

  /**
   * Pre-created instance.
   */
  readonly implementationInstance?: T | undefined;
}

/**
 * Create a IServiceDescriptor for a class-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createClassDescriptor(
 *   IRequestContext,
 *   ServiceLifetime.Scoped,
 *   RequestContext,
 * );
 * ```
 */
export function createClassDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  implementationType: Constructor<T>,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    implementationType,
  };
}

/**
 * Create a IServiceDescriptor for a factory-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createFactoryDescriptor(
 *   IConfig,
 *   ServiceLifetime.Singleton,
 *   () => loadConfigFromEnv(),
 * );
 * ```
 */
export function createFactoryDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<T>,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    factory,
  };
}

/**
 * Create a IServiceDescriptor for a pre-created instance.
 *
 * @remarks
 * Instance registrations are always Singleton (the instance already exists).
 * A disposable instance is disposed together with the root provider.
 */
export function createInstanceDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  instance: T,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime: ServiceLifetime.Singleton,
    implementationInstance: instance,
  };
}

/**
 * Validate a IServiceDescriptor.
 *
 * @throws TypeError if the descriptor does not carry exactly one way to
 * produce an instance
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const sources = [
    descriptor.implementationType,
    descriptor.factory,
    descriptor.implementationInstance,
  ].filter((source) => source !== undefined);

  if (sources.length === 0) {
    throw new TypeError(
      `IServiceDescriptor for '${name}' must have an implementationType, ` +
        'a factory or an implementationInstance',
    );
  }

  if (sources.length > 1) {
    throw new TypeError(
      `IServiceDescriptor for '${name}' must have only one of ` +
        'implementationType, factory and implementationInstance',
    );
  }

  if (descriptor.implementationType !== undefined && typeof descriptor.implementationType !== 'function') {
    throw new TypeError(`implementationType for '${name}' must be a constructor function`);
  }

  if (descriptor.factory !== undefined && typeof descriptor.factory !== 'function') {
    throw new TypeError(`factory for '${name}' must be a function`);
  }

  if (!Object.values(ServiceLifetime).includes(descriptor.lifetime)) {
    throw new TypeError(`Unknown lifetime '${String(descriptor.lifetime)}' for '${name}'`);
  }
}
