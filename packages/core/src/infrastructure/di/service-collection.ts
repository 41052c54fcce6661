/**
 * @fileoverview ServiceCollection - Service Registration Implementation
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements IServiceCollection with a fluent API for
 * registering services in the DI container. The collection is an ordered
 * descriptor list: registering an identifier again adds to it rather than
 * replacing what is there.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type ServiceFactory,
  type IServiceCollection,
  type IServiceProvider,
  type IBuildOptions,
  ServiceLifetime,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
  ContainerSealedError,
} from '../../domain/di';

import { ServiceProvider } from './service-provider';

/**
 * ServiceCollection - Fluent API for service registration.
 *
 * @remarks
 * **Usage Pattern:**
 *
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services
 *   .addSingleton(ILogger, ConsoleLogger)
 *   .addScoped(IRequestContext, RequestContext)
 *   .addTransient(IWidget, Widget);
 *
 * const provider = services.build();
 * ```
 *
 * **Sealing:**
 *
 * build() seals the collection. The provider gets its own copy of the
 * descriptor list, and any later registration throws ContainerSealedError.
 *
 * @example Several implementations of one identifier
 * ```typescript
 * const provider = new ServiceCollection()
 *   .addSingleton(IHandler, AuditHandler)
 *   .addSingleton(IHandler, MetricsHandler)
 *   .build();
 *
 * provider.getService(IHandler);   // MetricsHandler (last wins)
 * provider.getServices(IHandler);  // [AuditHandler, MetricsHandler]
 * ```
 */
export class ServiceCollection implements IServiceCollection {
  /**
   * Registered descriptors, in registration order.
   */
  private readonly descriptors: IServiceDescriptor[] = [];

  /**
   * Whether the collection has been built (sealed).
   */
  private sealed = false;

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Ensure the collection hasn't been sealed.
   * @throws ContainerSealedError if sealed
   */
  private ensureNotSealed(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
  }

  /**
   * Register a service descriptor.
   */
  private register<T>(descriptor: IServiceDescriptor<T>): this {
    this.ensureNotSealed();
    validateDescriptor(descriptor);

    this.descriptors.push(descriptor);

    return this;
  }

  // ============================================================================
  // Descriptor Registration
  // ============================================================================

  /**
   * Append a descriptor.
   */
  add(descriptor: IServiceDescriptor): this {
    return this.register(descriptor);
  }

  /**
   * Append a descriptor unless its identifier is already registered.
   */
  tryAdd(descriptor: IServiceDescriptor): this {
    this.ensureNotSealed();
    return this.has(descriptor.serviceIdentifier) ? this : this.register(descriptor);
  }

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  /**
   * Register a singleton service.
   *
   * @remarks
   * Two overloads:
   * 1. Self-registration: `addSingleton(ConfigService)`
   * 2. Interface-to-impl: `addSingleton(IConfig, ConfigService)`
   */
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingleton<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Singleton, impl));
  }

  /**
   * Register a singleton using a factory function.
   */
  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Singleton, factory));
  }

  /**
   * Register a pre-created instance as singleton.
   */
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    return this.register(createInstanceDescriptor(identifier, instance));
  }

  // ============================================================================
  // Scoped Registration
  // ============================================================================

  /**
   * Register a scoped service.
   */
  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScoped<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Scoped, impl));
  }

  /**
   * Register a scoped service using a factory function.
   */
  addScopedFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Scoped, factory));
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  /**
   * Register a transient service.
   */
  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransient<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Transient, impl));
  }

  /**
   * Register a transient service using a factory function.
   */
  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Transient, factory));
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Check if a service is registered.
   */
  has(identifier: ServiceIdentifier): boolean {
    return this.descriptors.some((descriptor) => descriptor.serviceIdentifier === identifier);
  }

  /**
   * Get all registered descriptors.
   */
  getDescriptors(): readonly IServiceDescriptor[] {
    return this.descriptors.slice();
  }

  /**
   * Get the descriptor singular resolution would use: the last one.
   */
  getDescriptor(identifier: ServiceIdentifier): IServiceDescriptor | undefined {
    for (let i = this.descriptors.length - 1; i >= 0; i--) {
      const descriptor = this.descriptors[i];
      if (descriptor?.serviceIdentifier === identifier) {
        return descriptor;
      }
    }
    return undefined;
  }

  /**
   * Remove every registration of an identifier.
   *
   * @returns Whether anything was removed
   */
  remove(identifier: ServiceIdentifier): boolean {
    this.ensureNotSealed();
    const before = this.descriptors.length;
    const kept = this.descriptors.filter((descriptor) => descriptor.serviceIdentifier !== identifier);
    this.descriptors.splice(0, before, ...kept);
    return kept.length !== before;
  }

  /**
   * Clear all registrations.
   */
  clear(): void {
    this.ensureNotSealed();
    this.descriptors.length = 0;
  }

  /**
   * Build the root service provider and seal the collection.
   */
  build(options?: IBuildOptions): IServiceProvider {
    this.sealed = true;

    return new ServiceProvider(this.descriptors.slice(), options);
  }

  /**
   * Whether build() has been called.
   */
  isSealed(): boolean {
    return this.sealed;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Normalize registration arguments.
   *
   * Handles two overload patterns:
   * 1. `add*(Implementation)` - self-registration
   * 2. `add*(Identifier, Implementation)` - interface-to-impl
   */
  private normalizeArgs<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): [ServiceIdentifier<T>, Constructor<T>] {
    if (implementation !== undefined) {
      // Pattern: add*(Identifier, Implementation)
      return [identifierOrImpl, implementation];
    }

    // Pattern: add*(Implementation) - self-registration
    if (typeof identifierOrImpl === 'function') {
      return [identifierOrImpl, identifierOrImpl];
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or [identifier, implementation], ` +
        `got ${typeof identifierOrImpl}`,
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a new ServiceCollection.
 *
 * @returns New ServiceCollection instance
 *
 * @example
 * ```typescript
 * const services = createServiceCollection();
 * services.addSingleton(SystemClock);
 * const provider = services.build();
 * ```
 */
export function createServiceCollection(): IServiceCollection {
  return new ServiceCollection();
}
