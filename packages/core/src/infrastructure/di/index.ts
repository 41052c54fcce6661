/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete DI container implementations.
 * Use these in your application's composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { createServiceCollection, withScope } from '@scopewise/core/infrastructure/di';
 *
 * const services = createServiceCollection();
 * services
 *   .addSingleton(ILogger, ConsoleLogger)
 *   .addScoped(IRequestContext, RequestContext)
 *   .addTransient(IWidget, Widget);
 *
 * const provider = services.build();
 *
 * await withScope(provider, (scope) => {
 *   scope.getRequiredService(IWidget).render();
 * });
 * ```
 */

// ============================================================================
// ServiceCollection - Service Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';

// ============================================================================
// ServiceProvider - Service Resolution
// ============================================================================

export { ServiceProvider } from './service-provider';

// ============================================================================
// Scopes
// ============================================================================

export { ServiceScopeFactory, withScope } from './service-scope';

// ============================================================================
// Resolution Plans - Advanced
// ============================================================================

export {
  type CallSite,
  type CallSiteChain,
  type ConstantCallSite,
  type FactoryCallSite,
  type ConstructorCallSite,
  type ServiceProviderCallSite,
  type ScopeFactoryCallSite,
  type EnumerableCallSite,
  type EmptyEnumerableCallSite,
  type TransientCallSite,
  type ScopedCallSite,
  type SingletonCallSite,
} from './call-site';
export { type ServiceAccessor, compileCallSite } from './call-site-compiler';
export { resolveCallSite } from './call-site-runtime';
export { type RealizedService } from './realized-service';
export { type IService, ServiceEntry } from './service';
