/**
 * @fileoverview Call Site Runtime - Plan Interpreter
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Walks a call-site tree node by node. Every accessor starts out here; see
 * `call-site-compiler.ts` for the equivalent closure form.
 *
 * @version 1.0.0
 */

import { type CallSite, type ScopedCallSite, type SingletonCallSite } from './call-site';
import type { ServiceProvider } from './service-provider';
import { ServiceScopeFactory } from './service-scope';

/**
 * Execute a call site against a provider.
 *
 * @param provider - The provider the request is being served by; Singleton
 * nodes switch to its root before touching any cache
 */
export function resolveCallSite(callSite: CallSite, provider: ServiceProvider): unknown {
  switch (callSite.kind) {
    case 'constant':
      return callSite.value;

    case 'factory':
      return callSite.factory(provider);

    case 'constructor': {
      const args = callSite.parameterCallSites.map((parameter) =>
        resolveCallSite(parameter, provider),
      );
      return new callSite.implementationType(...args);
    }

    case 'serviceProvider':
      return provider;

    case 'scopeFactory':
      return new ServiceScopeFactory(provider);

    case 'enumerable':
      return callSite.itemCallSites.map((item) => resolveCallSite(item, provider));

    case 'emptyEnumerable':
      return callSite.value;

    case 'transient':
      return provider.captureDisposable(resolveCallSite(callSite.inner, provider));

    case 'scoped':
      return resolveCached(callSite, provider);

    case 'singleton':
      return resolveCached(callSite, provider.root);

    default: {
      const unknownCallSite: never = callSite;
      throw new Error(`Unknown call site: ${JSON.stringify(unknownCallSite)}`);
    }
  }
}

function resolveCached(
  callSite: ScopedCallSite | SingletonCallSite,
  provider: ServiceProvider,
): unknown {
  return provider.resolvedServices.getOrAdd(callSite.key, () =>
    resolveCallSite(callSite.inner, provider),
  );
}
