/**
 * @fileoverview Service Scopes - Scope Factory and Helpers
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A scope is a child provider: it shares the root's registrations and
 * Singleton store, and owns its own Scoped instances and transient
 * disposables.
 *
 * ```
 * root ─┬─ createScope() ── scope A ── dispose()  → A's Scoped + transients
 *       └─ createScope() ── scope B ── dispose()  → B's Scoped + transients
 * root.dispose()                                  → Singletons + root's own
 * ```
 *
 * @version 1.0.0
 */

import { type IServiceProvider, type IServiceScopeFactory } from '../../domain/di';

/**
 * IServiceScopeFactory bound to one provider.
 *
 * @remarks
 * This is what `SERVICE_SCOPE_FACTORY_TOKEN` resolves to. It is Scoped, so
 * each provider hands out one factory, bound to itself.
 */
export class ServiceScopeFactory implements IServiceScopeFactory {
  constructor(private readonly provider: IServiceProvider) {}

  createScope(): IServiceProvider {
    return this.provider.createScope();
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Run a function within a new scope.
 *
 * @remarks
 * Convenience function that creates a scope, runs the callback,
 * and ensures disposal, awaiting any asynchronous `dispose()`.
 *
 * If the callback fails, its error is the one rethrown; a disposal failure
 * on that path is logged. If only disposal fails, that error propagates.
 *
 * @example
 * ```typescript
 * const total = await withScope(provider, async (scope) => {
 *   const orders = scope.getRequiredService(IOrderRepository);
 *   return orders.countOpen();
 * });
 * ```
 */
export async function withScope<T>(
  provider: IServiceProvider,
  callback: (scope: IServiceProvider) => T | Promise<T>,
): Promise<T> {
  const scope = provider.createScope();
  let result: T;
  try {
    result = await callback(scope);
  } catch (error) {
    try {
      await scope.disposeAsync();
    } catch (disposeError) {
      console.error('Error disposing scope:', disposeError);
    }
    throw error;
  }

  await scope.disposeAsync();
  return result;
}
