/**
 * @fileoverview ServiceIdentifier - Unified Service Identification
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the type-safe identifiers used to register and request
 * services: constructor functions, symbols, strings, and the closed
 * "enumerable of T" identifier produced by {@link enumerableOf}.
 *
 * ## Identity Semantics
 *
 * Identifiers are used directly as `Map` keys, so two identifiers are the same
 * service only if they are the same value:
 *
 * ```typescript
 * const ILogger = createToken<ILogger>('ILogger');
 *
 * services.addSingleton(ILogger, ConsoleLogger);
 * provider.getService(ILogger);              // ConsoleLogger
 * provider.getService(Symbol('ILogger'));    // undefined - different symbol
 * provider.getService(enumerableOf(ILogger)); // [ConsoleLogger]
 * ```
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Closed "enumerable of T" identifier.
 *
 * @remarks
 * Requesting it resolves every registration of `elementIdentifier`, in
 * registration order. An element with no registrations resolves to an empty
 * array, never to `undefined`.
 *
 * Never construct one by hand; use {@link enumerableOf} so that the
 * identifier is interned.
 */
export interface EnumerableIdentifier<T = unknown> {
  readonly kind: 'enumerable';
  readonly elementIdentifier: ServiceIdentifier<T>;
}

/**
 * ServiceIdentifier - Unified type for identifying services in the container.
 *
 * @template T - The service instance type
 *
 * @remarks
 * **Four Forms of Identification:**
 *
 * 1. **Constructor<T>**: class-based, gives type inference for free
 * 2. **symbol**: interface abstraction, see {@link createToken}
 * 3. **string**: configuration-driven registration
 * 4. **EnumerableIdentifier**: all registrations of another identifier
 *
 * @example
 * ```typescript
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * services.addSingleton(IClock, SystemClock);
 * const clock = provider.getRequiredService(IClock); // typed as IClock
 * ```
 */
export type ServiceIdentifier<T = unknown> =
  | Constructor<T>
  | symbol
  | string
  | EnumerableIdentifier;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(UserService); // true (constructor)
 * isServiceIdentifier(Symbol('ILogger')); // true (symbol)
 * isServiceIdentifier('my-service'); // true (string)
 * isServiceIdentifier(enumerableOf(UserService)); // true
 * isServiceIdentifier(42); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  switch (typeof value) {
    case 'symbol':
    case 'string':
    case 'function':
      return true;
    default:
      return isEnumerableIdentifier(value);
  }
}

/**
 * Interned enumerable identifiers, keyed by element identifier.
 * @internal
 */
const enumerableIdentifiers = new Map<ServiceIdentifier, EnumerableIdentifier>();

/**
 * Get the enumerable identifier for an element identifier.
 *
 * @param elementIdentifier - Identifier whose registrations should be collected
 * @returns The interned identifier; repeated calls return the same object
 *
 * @example
 * ```typescript
 * services
 *   .addSingleton(IHandler, AuditHandler)
 *   .addSingleton(IHandler, MetricsHandler);
 *
 * const handlers = provider.getService(enumerableOf(IHandler));
 * // [AuditHandler, MetricsHandler]
 * ```
 */
export function enumerableOf<T>(elementIdentifier: ServiceIdentifier<T>): EnumerableIdentifier<T> {
  const existing = enumerableIdentifiers.get(elementIdentifier);
  if (existing !== undefined && isEnumerableOf(existing, elementIdentifier)) {
    return existing;
  }

  const identifier: EnumerableIdentifier<T> = { kind: 'enumerable', elementIdentifier };
  Object.freeze(identifier);
  enumerableIdentifiers.set(elementIdentifier, identifier);
  return identifier;
}

function isEnumerableOf<T>(
  identifier: EnumerableIdentifier,
  elementIdentifier: ServiceIdentifier<T>,
): identifier is EnumerableIdentifier<T> {
  return identifier.elementIdentifier === elementIdentifier;
}

/**
 * Check if a value is an enumerable identifier.
 */
export function isEnumerableIdentifier(value: unknown): value is EnumerableIdentifier {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'enumerable' &&
    'elementIdentifier' in value
  );
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used for error messages and debugging.
 *
 * @example
 * ```typescript
 * getServiceName(UserService); // 'UserService'
 * getServiceName(Symbol('ILogger')); // 'Symbol(ILogger)'
 * getServiceName('my-service'); // 'my-service'
 * getServiceName(enumerableOf(UserService)); // 'Enumerable<UserService>'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }

  if (typeof identifier === 'string') {
    return identifier;
  }

  if (typeof identifier === 'function') {
    return identifier.name || 'AnonymousClass';
  }

  return `Enumerable<${getServiceName(identifier.elementIdentifier)}>`;
}

// ============================================================================
// Injectable Constructors (Static Inject Pattern)
// ============================================================================

/**
 * Type for a constructor with static inject property.
 *
 * @remarks
 * **Zero-Reflection Dependency Declaration:**
 *
 * Instead of decorators and reflect-metadata, dependencies are declared with a
 * static `inject` array whose order matches the constructor parameters:
 *
 * ```typescript
 * class Widget {
 *   static inject = [ILogger, IRequestContext] as const;
 *
 *   constructor(
 *     readonly logger: ILogger,
 *     readonly context: IRequestContext,
 *   ) {}
 * }
 * ```
 */
export interface IInjectableConstructor<T = unknown> extends Constructor<T> {
  /**
   * Static array of dependency identifiers.
   * Order must match constructor parameter order.
   */
  inject?: readonly ServiceIdentifier[];
}

/**
 * Check if a constructor has static inject property.
 */
export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Get dependencies from a constructor's static inject property.
 *
 * @returns Array of dependency identifiers, empty when none are declared
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token (Symbol) for interface abstraction.
 *
 * @template T - The interface type this token represents
 * @param description - Description for debugging
 *
 * @example
 * ```typescript
 * interface IRequestContext { readonly requestId: string; }
 *
 * const IRequestContext = createToken<IRequestContext>('IRequestContext');
 *
 * services.addScoped(IRequestContext, RequestContext);
 * const context = scope.getRequiredService(IRequestContext);
 * // context is typed as IRequestContext
 * ```
 */
export function createToken<T>(description: string): ServiceIdentifier<T> {
  return Symbol(description);
}

// ============================================================================
// Pre-defined Core Tokens
// ============================================================================

/**
 * Token for the service provider itself.
 *
 * @remarks
 * Resolves to the provider that is executing the resolution: the scope when
 * requested from a scope, the root when requested by a Singleton.
 *
 * ```typescript
 * class PluginHost {
 *   static inject = [SERVICE_PROVIDER_TOKEN] as const;
 *   constructor(private readonly provider: IServiceProvider) {}
 * }
 * ```
 */
export const SERVICE_PROVIDER_TOKEN = Symbol('IServiceProvider');

/**
 * Token for the scope factory.
 *
 * @remarks
 * Resolves to an {@link IServiceScopeFactory} bound to the requesting provider.
 *
 * ```typescript
 * class BackgroundJobRunner {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
 *
 *   constructor(private readonly scopes: IServiceScopeFactory) {}
 *
 *   run(job: Job): void {
 *     const scope = this.scopes.createScope();
 *     try {
 *       scope.getRequiredService(IJobHandler).handle(job);
 *     } finally {
 *       scope.dispose();
 *     }
 *   }
 * }
 * ```
 */
export const SERVICE_SCOPE_FACTORY_TOKEN = Symbol('IServiceScopeFactory');
