/**
 * @fileoverview Call Site Compiler - Plans as Specialised Closures
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Turns a call-site tree into a tree of closures, one per node, each doing
 * only its own node's work. The `switch` on `kind` runs once here instead of
 * on every resolution.
 *
 * Compiled accessors must stay indistinguishable from the interpreter in
 * `call-site-runtime.ts`: the same instance store, the same root redirection
 * for Singletons and the same transient capture.
 *
 * @version 1.0.0
 */

import { type CallSite } from './call-site';
import type { ServiceProvider } from './service-provider';
import { ServiceScopeFactory } from './service-scope';

/**
 * A runnable entry point producing one value for the given provider.
 */
export type ServiceAccessor = (provider: ServiceProvider) => unknown;

/**
 * Compile a call site into an accessor.
 */
export function compileCallSite(callSite: CallSite): ServiceAccessor {
  switch (callSite.kind) {
    case 'constant':
    case 'emptyEnumerable': {
      const { value } = callSite;
      return () => value;
    }

    case 'factory': {
      const { factory } = callSite;
      return (provider) => factory(provider);
    }

    case 'constructor': {
      const { implementationType } = callSite;
      const parameters = callSite.parameterCallSites.map(compileCallSite);

      if (parameters.length === 0) {
        return () => new implementationType();
      }
      return (provider) => new implementationType(...parameters.map((parameter) => parameter(provider)));
    }

    case 'serviceProvider':
      return (provider) => provider;

    case 'scopeFactory':
      return (provider) => new ServiceScopeFactory(provider);

    case 'enumerable': {
      const items = callSite.itemCallSites.map(compileCallSite);
      return (provider) => items.map((item) => item(provider));
    }

    case 'transient': {
      const inner = compileCallSite(callSite.inner);
      return (provider) => provider.captureDisposable(inner(provider));
    }

    case 'scoped': {
      const { key } = callSite;
      const inner = compileCallSite(callSite.inner);
      return (provider) => provider.resolvedServices.getOrAdd(key, () => inner(provider));
    }

    case 'singleton': {
      const { key } = callSite;
      const inner = compileCallSite(callSite.inner);
      return (provider) => {
        const { root } = provider;
        return root.resolvedServices.getOrAdd(key, () => inner(root));
      };
    }

    default: {
      const unknownCallSite: never = callSite;
      throw new Error(`Unknown call site: ${JSON.stringify(unknownCallSite)}`);
    }
  }
}
