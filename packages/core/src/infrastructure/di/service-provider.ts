/**
 * @fileoverview ServiceProvider - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements the per-scope runtime: it plans, caches and serves
 * object graphs, and disposes what it owns.
 *
 * ## Resolution Algorithm
 *
 * ```
 * getService(identifier)
 *   1. Look up the realized accessor in the shared table
 *   2. If absent, plan it:
 *      a. identifier already on the chain → CircularDependencyError
 *      b. entry found → base call site of entry.last, wrapped by lifetime
 *      c. no entry, enumerable identifier → empty array leaf
 *      d. otherwise → missing accessor (undefined)
 *   3. Invoke the accessor against this provider:
 *      - Transient: run, capture if disposable
 *      - Scoped:    get-or-create in this provider's store
 *      - Singleton: get-or-create in the root's store
 * ```
 *
 * ## Zero-Reflection Pattern
 *
 * Dependencies are read from `static inject` property:
 *
 * ```typescript
 * class Widget {
 *   static inject = [ILogger, IRequestContext] as const;
 *   constructor(logger: ILogger, context: IRequestContext) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

import {
  type EnumerableIdentifier,
  type IBuildOptions,
  type IServiceDescriptor,
  type IServiceProvider,
  type ServiceIdentifier,
  CircularDependencyError,
  DisposalError,
  ScopeDisposedError,
  ServiceLifetime,
  ServiceNotRegisteredError,
  ServiceProviderMode,
  enumerableOf,
  isDisposable,
  isEnumerableIdentifier,
} from '../../domain/di';

import {
  type CallSite,
  type CallSiteChain,
  describeCallSiteChain,
  emptyEnumerableCallSite,
  scopedCallSite,
  singletonCallSite,
  transientCallSite,
} from './call-site';
import { type RealizedService, MISSING_SERVICE, realizeService } from './realized-service';
import { ResolvedServices } from './resolved-services';
import { type IService } from './service';
import { ServiceTable } from './service-table';

/**
 * ServiceProvider - IServiceProvider implementation.
 *
 * @remarks
 * **Root and Scopes:**
 *
 * The root is built from descriptors and is its own `root`. A scope is built
 * from a parent and shares the parent's table, options and root. There is no
 * other difference: the root also acts as a scope for Scoped registrations.
 *
 * **Lifecycle Management:**
 *
 * - Singleton: cached in `root.resolvedServices`
 * - Scoped: cached in this provider's `resolvedServices`
 * - Transient: never cached; captured for disposal if disposable
 *
 * **Circular Dependency Detection:**
 *
 * Happens while planning, by chain membership, before any constructor runs.
 *
 * @example
 * ```typescript
 * const provider = new ServiceProvider(descriptors);
 *
 * const logger = provider.getRequiredService(ILogger);
 *
 * const scope = provider.createScope();
 * try {
 *   const widget = scope.getRequiredService(IWidget);
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export class ServiceProvider implements IServiceProvider {
  /**
   * The root of this provider's hierarchy; the root points at itself.
   * @internal
   */
  readonly root: ServiceProvider;

  /**
   * Registrations and realized accessors, shared across the hierarchy.
   * @internal
   */
  readonly table: ServiceTable;

  /**
   * Instances and disposables owned by this provider.
   * @internal
   */
  readonly resolvedServices = new ResolvedServices();

  private readonly options: Required<IBuildOptions>;

  constructor(descriptors: Iterable<IServiceDescriptor>, options?: IBuildOptions);
  constructor(parent: ServiceProvider);
  constructor(source: Iterable<IServiceDescriptor> | ServiceProvider, options?: IBuildOptions) {
    if (source instanceof ServiceProvider) {
      this.root = source.root;
      this.table = source.table;
      this.options = source.options;
    } else {
      this.root = this;
      this.table = new ServiceTable(source);
      this.options = {
        mode: options?.mode ?? ServiceProviderMode.Dynamic,
      };
    }
  }

  // ============================================================================
  // IServiceProvider Implementation
  // ============================================================================

  /**
   * Resolve a service by its identifier.
   *
   * @returns The instance, `undefined` if not registered, or an array for an
   * enumerable identifier
   */
  getService<T>(identifier: EnumerableIdentifier<T>): T[];
  getService<T>(identifier: ServiceIdentifier<T>): T | undefined;
  getService(identifier: ServiceIdentifier): unknown {
    this.ensureNotDisposed();

    const realized = this.table.getOrAddRealizedService(identifier, this.createServiceAccessor);
    return realized.invoke(this);
  }

  /**
   * Resolve a service that must be registered.
   */
  getRequiredService<T>(identifier: EnumerableIdentifier<T>): T[];
  getRequiredService<T>(identifier: ServiceIdentifier<T>): T;
  getRequiredService(identifier: ServiceIdentifier): unknown {
    const service = this.getService(identifier);
    if (service === undefined) {
      throw new ServiceNotRegisteredError(identifier);
    }
    return service;
  }

  /**
   * Resolve every registration of an identifier, in registration order.
   */
  getServices<T>(identifier: ServiceIdentifier<T>): T[] {
    return this.getService(enumerableOf(identifier));
  }

  /**
   * Check if a service is registered.
   *
   * @remarks
   * An enumerable identifier counts as registered when its element is.
   */
  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.table.tryGetEntry(identifier) !== undefined;
  }

  /**
   * Create a new scope sharing this provider's registrations and root.
   */
  createScope(): ServiceProvider {
    this.ensureNotDisposed();
    return new ServiceProvider(this);
  }

  /**
   * Dispose transients captured by this provider, then its cached instances.
   *
   * @remarks
   * Every instance is visited even when some throw. One failure is rethrown
   * as-is; several are thrown together as a {@link DisposalError}. A
   * `dispose()` that returns a promise is not awaited; use
   * {@link disposeAsync} for that.
   */
  dispose(): void {
    const disposables = this.resolvedServices.drain();
    if (disposables === undefined) {
      return;
    }

    const errors: unknown[] = [];
    for (const disposable of disposables) {
      try {
        const result = disposable.dispose();
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            console.error('Error disposing service:', error);
          });
        }
      } catch (error) {
        errors.push(error);
      }
    }

    throwDisposalErrors(errors);
  }

  /**
   * Like {@link dispose}, awaiting each disposal in turn.
   */
  async disposeAsync(): Promise<void> {
    const disposables = this.resolvedServices.drain();
    if (disposables === undefined) {
      return;
    }

    const errors: unknown[] = [];
    for (const disposable of disposables) {
      try {
        await disposable.dispose();
      } catch (error) {
        errors.push(error);
      }
    }

    throwDisposalErrors(errors);
  }

  // ============================================================================
  // Planning
  // ============================================================================

  /**
   * Build the call site for an identifier.
   *
   * @param callSiteChain - Identifiers on the current planning path; left as
   * it was found on every exit
   * @returns The plan, or `undefined` if the identifier cannot be resolved
   * @throws CircularDependencyError if the identifier is already on the chain
   *
   * @internal
   */
  getServiceCallSite(
    identifier: ServiceIdentifier,
    callSiteChain: CallSiteChain,
  ): CallSite | undefined {
    if (callSiteChain.has(identifier)) {
      throw new CircularDependencyError(identifier, describeCallSiteChain(callSiteChain));
    }

    callSiteChain.add(identifier);
    try {
      const entry = this.table.tryGetEntry(identifier);
      if (entry !== undefined) {
        return this.getResolveCallSite(entry.last, callSiteChain);
      }

      if (isEnumerableIdentifier(identifier)) {
        return emptyEnumerableCallSite(identifier.elementIdentifier);
      }

      return undefined;
    } finally {
      callSiteChain.delete(identifier);
    }
  }

  /**
   * Build a registration's base call site and wrap it by lifetime.
   *
   * @internal
   */
  getResolveCallSite(service: IService, callSiteChain: CallSiteChain): CallSite {
    const callSite = service.createCallSite(this, callSiteChain);

    switch (service.lifetime) {
      case ServiceLifetime.Transient:
        return transientCallSite(callSite);

      case ServiceLifetime.Scoped:
        return scopedCallSite(service, callSite);

      case ServiceLifetime.Singleton:
        return singletonCallSite(service, callSite);

      default: {
        const lifetime: never = service.lifetime;
        throw new Error(`Unknown lifetime: ${String(lifetime)}`);
      }
    }
  }

  // ============================================================================
  // Execution Support
  // ============================================================================

  /**
   * Hand a transient result to this provider for disposal.
   *
   * @remarks
   * The provider itself is never captured, or disposing it would reach
   * itself through its own list.
   *
   * @internal
   */
  captureDisposable(service: unknown): unknown {
    if (service !== this && isDisposable(service)) {
      this.resolvedServices.addTransient(service);
    }
    return service;
  }

  private readonly createServiceAccessor = (identifier: ServiceIdentifier): RealizedService => {
    const callSite = this.getServiceCallSite(identifier, new Set());
    if (callSite === undefined) {
      return MISSING_SERVICE;
    }
    return realizeService(this.table, identifier, callSite, this.options.mode);
  };

  /**
   * Ensure provider hasn't been disposed.
   */
  private ensureNotDisposed(): void {
    if (this.resolvedServices.isDisposed) {
      throw new ScopeDisposedError();
    }
  }
}

function throwDisposalErrors(errors: readonly unknown[]): void {
  if (errors.length === 1) {
    throw errors[0];
  }
  if (errors.length > 1) {
    throw new DisposalError(errors);
  }
}
