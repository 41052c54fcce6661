/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the core interfaces for dependency injection.
 * These contracts define WHAT the container does; the engine in
 * `infrastructure/di` defines HOW.
 *
 * ## Provider Hierarchy
 *
 * ```
 * root provider ──── Singleton cache (whole hierarchy)
 * │                  Scoped cache (root used as a scope)
 * │
 * ├─ scope A ─────── Scoped cache, transient disposables
 * └─ scope B ─────── Scoped cache, transient disposables
 * ```
 *
 * Every scope shares the root's registrations and compiled resolution plans.
 *
 * @version 1.0.0
 */

import { type IServiceDescriptor, type ServiceFactory } from './service-descriptor';
import {
  type ServiceIdentifier,
  type EnumerableIdentifier,
  type Constructor,
} from './service-identifier';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Interface for objects that need cleanup when disposed.
 *
 * @remarks
 * **Automatic Disposal:**
 *
 * - Transient services: disposed with the provider that resolved them
 * - Scoped services: disposed with their scope
 * - Singleton services: disposed with the root provider
 *
 * @example
 * ```typescript
 * class DatabaseSession implements IDisposable {
 *   dispose(): void {
 *     this.connection.release();
 *   }
 * }
 * ```
 */
export interface IDisposable {
  /**
   * Release resources held by this object.
   *
   * @remarks
   * Called at most once by the container. A returned promise is awaited by
   * `disposeAsync()` only.
   */
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// IServiceCollection - Service Registration
// ============================================================================

/**
 * IServiceCollection - Fluent API for registering services.
 *
 * @remarks
 * **Registration Patterns:**
 *
 * 1. **Self-Registration**: `services.addSingleton(ConfigService)`
 * 2. **Interface-to-Implementation**: `services.addScoped(IUserRepository, UserRepository)`
 * 3. **Factory**: `services.addSingletonFactory(IConfig, () => loadConfig())`
 * 4. **Instance**: `services.addSingletonInstance(IConfig, { port: 3000 })`
 *
 * Registrations are additive. The last registration of an identifier wins for
 * `getService`; `getServices` returns all of them in registration order.
 *
 * @example
 * ```typescript
 * const provider = new ServiceCollection()
 *   .addSingleton(ILogger, ConsoleLogger)
 *   .addScoped(IRequestContext, RequestContext)
 *   .addTransient(IWidget, Widget)
 *   .build();
 * ```
 */
export interface IServiceCollection {
  /**
   * Append a descriptor.
   */
  add(descriptor: IServiceDescriptor): this;

  /**
   * Append a descriptor only if its identifier has no registration yet.
   */
  tryAdd(descriptor: IServiceDescriptor): this;

  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this;

  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScopedFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  /**
   * Check if a service is registered.
   */
  has(identifier: ServiceIdentifier): boolean;

  /**
   * Get all registered descriptors, in registration order.
   */
  getDescriptors(): readonly IServiceDescriptor[];

  /**
   * Build the root service provider.
   *
   * @remarks
   * After calling build(), no more services can be registered.
   * The collection is "sealed".
   */
  build(options?: IBuildOptions): IServiceProvider;
}

// ============================================================================
// IServiceProvider - Service Resolution
// ============================================================================

/**
 * IServiceProvider - Resolve services from the container.
 *
 * @remarks
 * **Absent vs. failed:**
 *
 * - An unregistered identifier resolves to `undefined`
 * - An enumerable identifier always resolves to an array, possibly empty
 * - A dependency cycle throws {@link CircularDependencyError}
 * - Errors thrown by constructors and factories propagate unchanged
 *
 * @example
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const widget = scope.getRequiredService(IWidget);
 *   widget.render();
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export interface IServiceProvider extends IDisposable {
  /**
   * Resolve a service, or `undefined` if the identifier has no registration.
   *
   * @throws CircularDependencyError if resolution would revisit a service
   * @throws ScopeDisposedError if this provider has been disposed
   */
  getService<T>(identifier: EnumerableIdentifier<T>): T[];
  getService<T>(identifier: ServiceIdentifier<T>): T | undefined;

  /**
   * Resolve a service that must be registered.
   *
   * @throws ServiceNotRegisteredError if the identifier has no registration
   */
  getRequiredService<T>(identifier: EnumerableIdentifier<T>): T[];
  getRequiredService<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Resolve every registration of an identifier, in registration order.
   */
  getServices<T>(identifier: ServiceIdentifier<T>): T[];

  /**
   * Check if an identifier can be resolved.
   */
  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Create a child scope sharing this provider's registrations and root.
   */
  createScope(): IServiceProvider;

  /**
   * Dispose transient and cached instances owned by this provider.
   *
   * @remarks
   * Idempotent: the second and later calls do nothing.
   */
  dispose(): void;

  /**
   * Like dispose(), awaiting each asynchronous disposal in turn.
   */
  disposeAsync(): Promise<void>;
}

// ============================================================================
// Factory Types
// ============================================================================

/**
 * Factory for creating service scopes.
 *
 * @remarks
 * Resolve it with `SERVICE_SCOPE_FACTORY_TOKEN`. The scopes it creates are
 * children of the provider the factory was resolved from.
 */
export interface IServiceScopeFactory {
  createScope(): IServiceProvider;
}

// ============================================================================
// Build Options
// ============================================================================

/**
 * How a provider executes its resolution plans.
 */
export enum ServiceProviderMode {
  /**
   * Interpret each plan, then compile it once it has been used twice.
   */
  Dynamic = 'dynamic',

  /**
   * Always interpret; never compile.
   */
  Runtime = 'runtime',

  /**
   * Compile each plan the first time it is built.
   */
  Compiled = 'compiled',
}

/**
 * Options for building the service provider.
 */
export interface IBuildOptions {
  /**
   * Execution strategy for resolution plans.
   *
   * Default: {@link ServiceProviderMode.Dynamic}
   */
  mode?: ServiceProviderMode;
}
