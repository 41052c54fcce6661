/**
 * @fileoverview ServiceLifetime - Service Lifecycle Management
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the lifetimes that control when service instances are
 * created, which provider caches them, and which provider disposes them.
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created and destroyed.
 *
 * @remarks
 * **Lifecycle Overview:**
 *
 * | Lifetime  | Created                 | Cached in            | Disposed by          |
 * |-----------|-------------------------|----------------------|----------------------|
 * | Singleton | First request anywhere  | Root provider        | Root provider        |
 * | Scoped    | First request in scope  | The requesting scope | That scope           |
 * | Transient | Every request           | Never                | The resolving provider |
 *
 * A Singleton requested through a scope is still built against the root, so
 * every transient it pulls in is owned by the root as well.
 *
 * @example Choosing the right lifetime
 * ```typescript
 * services.addSingleton(ILogger, ConsoleLogger);            // one per container
 * services.addScoped(IRequestContext, RequestContext);      // one per scope
 * services.addTransient(IWidget, Widget);                   // always new
 * ```
 */
export enum ServiceLifetime {
  /**
   * Singleton: Single instance shared across the container hierarchy.
   *
   * @remarks
   * - Created once on first resolution, from any provider
   * - Stored in the root provider's instance cache
   * - Disposed only when the root provider is disposed
   */
  Singleton = 'singleton',

  /**
   * Scoped: One instance per provider.
   *
   * @remarks
   * - Created once per scope (the root counts as a scope of its own)
   * - Stored in the requesting provider's instance cache
   * - Disposed when that provider is disposed
   *
   * ```typescript
   * const scope = provider.createScope();
   * try {
   *   const context = scope.getRequiredService(IRequestContext);
   * } finally {
   *   scope.dispose(); // Disposes the scoped RequestContext
   * }
   * ```
   */
  Scoped = 'scoped',

  /**
   * Transient: New instance created on every resolution.
   *
   * @remarks
   * Disposable transients are captured by the provider that resolved them and
   * disposed together with it. Resolving many disposable transients from a
   * long-lived provider keeps them alive until that provider is disposed.
   */
  Transient = 'transient',
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
    default:
      return 'Unknown';
  }
}
