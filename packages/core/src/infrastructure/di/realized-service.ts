/**
 * @fileoverview Realized Services - Interpret, Then Compile
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A realized service is the accessor cached in the {@link ServiceTable} for
 * one identifier. Which accessor it starts as depends on the provider mode:
 *
 * ```
 * Dynamic   interpreted ──(2nd call)──▶ microtask ──▶ compiled
 * Runtime   interpreted
 * Compiled  compiled
 * ```
 *
 * In Dynamic mode the compiled accessor replaces the interpreted one in the
 * table. Callers already holding the interpreted accessor finish with it;
 * both produce the same results.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, ServiceProviderMode, getServiceName } from '../../domain/di';

import { type CallSite } from './call-site';
import { type ServiceAccessor, compileCallSite } from './call-site-compiler';
import { resolveCallSite } from './call-site-runtime';
import type { ServiceTable } from './service-table';

/**
 * A cached accessor and the form it is in.
 */
export interface RealizedService {
  readonly kind: 'interpreted' | 'compiled' | 'missing';
  readonly invoke: ServiceAccessor;
}

/**
 * Accessor for an identifier that has no plan: always `undefined`.
 */
export const MISSING_SERVICE: RealizedService = {
  kind: 'missing',
  invoke: () => undefined,
};

/**
 * Build the accessor for a planned identifier.
 */
export function realizeService(
  table: ServiceTable,
  identifier: ServiceIdentifier,
  callSite: CallSite,
  mode: ServiceProviderMode,
): RealizedService {
  switch (mode) {
    case ServiceProviderMode.Dynamic:
      return adaptiveService(table, identifier, callSite);

    case ServiceProviderMode.Runtime:
      return interpretedService(callSite);

    case ServiceProviderMode.Compiled:
      return compiledService(callSite);

    default: {
      const unknownMode: never = mode;
      throw new TypeError(`Unknown service provider mode: ${String(unknownMode)}`);
    }
  }
}

function interpretedService(callSite: CallSite): RealizedService {
  return {
    kind: 'interpreted',
    invoke: (provider) => resolveCallSite(callSite, provider),
  };
}

function compiledService(callSite: CallSite): RealizedService {
  return {
    kind: 'compiled',
    invoke: compileCallSite(callSite),
  };
}

/**
 * Interpreted accessor that schedules its own compilation on the second call.
 *
 * @remarks
 * The counter only ever reaches 2 once, so compilation is scheduled once per
 * accessor. A failed compilation is logged and the interpreted accessor stays.
 */
function adaptiveService(
  table: ServiceTable,
  identifier: ServiceIdentifier,
  callSite: CallSite,
): RealizedService {
  let callCount = 0;

  return {
    kind: 'interpreted',
    invoke: (provider) => {
      callCount += 1;
      if (callCount === 2) {
        queueMicrotask(() => {
          try {
            table.replaceRealizedService(identifier, compiledService(callSite));
          } catch (error) {
            console.error(
              `Error compiling resolution plan for '${getServiceName(identifier)}':`,
              error,
            );
          }
        });
      }

      return resolveCallSite(callSite, provider);
    },
  };
}
