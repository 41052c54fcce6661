/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports DI-related interfaces, types, and error classes.
 * These are technology-agnostic contracts that the Infrastructure layer implements.
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type EnumerableIdentifier,
  type Constructor,
  type IInjectableConstructor,
  isServiceIdentifier,
  isEnumerableIdentifier,
  enumerableOf,
  getServiceName,
  hasInjectProperty,
  getInjectDependencies,
  createToken,
  // Pre-defined tokens
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export { ServiceLifetime, getLifetimeName } from './service-lifetime';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type IServiceDescriptor,
  type ServiceFactory,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
} from './service-descriptor';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IServiceCollection,
  type IServiceProvider,
  type IServiceScopeFactory,
  type IBuildOptions,
  ServiceProviderMode,
  isDisposable,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeDisposedError,
  ContainerSealedError,
  DisposalError,
} from './di.errors';
