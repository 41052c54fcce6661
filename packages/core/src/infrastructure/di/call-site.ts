/**
 * @fileoverview Call Sites - Resolution Plan Nodes
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A call site describes how to produce one value. Call sites are built once
 * per requested identifier, never mutated, and executed either by the
 * interpreter (`call-site-runtime.ts`) or by the closures produced by the
 * compiler (`call-site-compiler.ts`).
 *
 * ## Plan Shape
 *
 * ```
 * transient                      Widget (Transient)
 * └─ constructor Widget
 *    ├─ singleton                ILogger (Singleton)
 *    │  └─ constructor ConsoleLogger
 *    └─ scoped                   IRequestContext (Scoped)
 *       └─ constructor RequestContext
 * ```
 *
 * The set of kinds is closed: adding one means adding an arm to both the
 * interpreter and the compiler, and the `never` checks there enforce it.
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type IServiceProvider,
  type ServiceIdentifier,
  getServiceName,
} from '../../domain/di';

import type { IService } from './service';

/**
 * A pre-built value.
 */
export interface ConstantCallSite {
  readonly kind: 'constant';
  readonly value: unknown;
}

/**
 * A user factory, called with the executing provider.
 */
export interface FactoryCallSite {
  readonly kind: 'factory';
  readonly factory: (provider: IServiceProvider) => unknown;
}

/**
 * A class instantiation with one call site per `static inject` entry.
 */
export interface ConstructorCallSite {
  readonly kind: 'constructor';
  readonly implementationType: Constructor;
  readonly parameterCallSites: readonly CallSite[];
}

/**
 * The executing provider itself.
 */
export interface ServiceProviderCallSite {
  readonly kind: 'serviceProvider';
}

/**
 * A scope factory bound to the executing provider.
 */
export interface ScopeFactoryCallSite {
  readonly kind: 'scopeFactory';
}

/**
 * A fresh array holding one value per registration of an element identifier.
 */
export interface EnumerableCallSite {
  readonly kind: 'enumerable';
  readonly elementIdentifier: ServiceIdentifier;
  readonly itemCallSites: readonly CallSite[];
}

/**
 * The shared, frozen empty array for an element with no registrations.
 */
export interface EmptyEnumerableCallSite {
  readonly kind: 'emptyEnumerable';
  readonly elementIdentifier: ServiceIdentifier;
  readonly value: readonly unknown[];
}

/**
 * Runs `inner` and hands a disposable result to the executing provider.
 */
export interface TransientCallSite {
  readonly kind: 'transient';
  readonly inner: CallSite;
}

/**
 * Get-or-create of `inner` in the executing provider's instance cache.
 */
export interface ScopedCallSite {
  readonly kind: 'scoped';
  readonly key: IService;
  readonly inner: CallSite;
}

/**
 * Get-or-create of `inner` in the root provider's instance cache.
 */
export interface SingletonCallSite {
  readonly kind: 'singleton';
  readonly key: IService;
  readonly inner: CallSite;
}

/**
 * Closed union of every resolution plan node.
 */
export type CallSite =
  | ConstantCallSite
  | FactoryCallSite
  | ConstructorCallSite
  | ServiceProviderCallSite
  | ScopeFactoryCallSite
  | EnumerableCallSite
  | EmptyEnumerableCallSite
  | TransientCallSite
  | ScopedCallSite
  | SingletonCallSite;

/**
 * Identifiers currently being planned on this call stack, outermost first.
 *
 * @remarks
 * Only ever holds the current recursive path: every identifier is removed
 * again when its plan is finished or fails.
 */
export type CallSiteChain = Set<ServiceIdentifier>;

/**
 * Render a chain as a resolution path for error messages.
 */
export function describeCallSiteChain(chain: CallSiteChain): string[] {
  return Array.from(chain, getServiceName);
}

// ============================================================================
// Constructors
// ============================================================================

export function constantCallSite(value: unknown): ConstantCallSite {
  return { kind: 'constant', value };
}

export function factoryCallSite(factory: (provider: IServiceProvider) => unknown): FactoryCallSite {
  return { kind: 'factory', factory };
}

export function constructorCallSite(
  implementationType: Constructor,
  parameterCallSites: readonly CallSite[],
): ConstructorCallSite {
  return { kind: 'constructor', implementationType, parameterCallSites };
}

export const SERVICE_PROVIDER_CALL_SITE: ServiceProviderCallSite = { kind: 'serviceProvider' };

export const SCOPE_FACTORY_CALL_SITE: ScopeFactoryCallSite = { kind: 'scopeFactory' };

export function enumerableCallSite(
  elementIdentifier: ServiceIdentifier,
  itemCallSites: readonly CallSite[],
): EnumerableCallSite {
  return { kind: 'enumerable', elementIdentifier, itemCallSites };
}

/**
 * Build the leaf for an enumerable whose element has no registrations.
 *
 * @remarks
 * The array is created here, once per plan, and returned by every execution.
 */
export function emptyEnumerableCallSite(elementIdentifier: ServiceIdentifier): EmptyEnumerableCallSite {
  return { kind: 'emptyEnumerable', elementIdentifier, value: Object.freeze([]) };
}

export function transientCallSite(inner: CallSite): TransientCallSite {
  return { kind: 'transient', inner };
}

export function scopedCallSite(key: IService, inner: CallSite): ScopedCallSite {
  return { kind: 'scoped', key, inner };
}

export function singletonCallSite(key: IService, inner: CallSite): SingletonCallSite {
  return { kind: 'singleton', key, inner };
}
