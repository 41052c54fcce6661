/**
 * @fileoverview ResolvedServices - Per-Provider Instance Store
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Everything a provider owns lives here: the Scoped/Singleton instance cache,
 * the captured transient disposables and the disposed flag. The store is the
 * only place that decides whether an instance is built, so the at-most-once
 * guarantee is enforced in one spot.
 *
 * Resolution is synchronous. Once `getOrAdd` finds a key absent it runs the
 * factory to completion before anything else can observe the store, so no
 * second caller can slip in between the check and the insert. The only
 * re-entry possible is from inside the factory itself, which is rejected.
 *
 * @version 1.0.0
 */

import {
  type IDisposable,
  CircularDependencyError,
  ScopeDisposedError,
  getServiceName,
  isDisposable,
} from '../../domain/di';

import type { IService } from './service';

export class ResolvedServices {
  private readonly instances = new Map<IService, unknown>();

  /**
   * Keys whose factory is running on the current call stack.
   */
  private readonly pending = new Set<IService>();

  private transientDisposables: IDisposable[] = [];

  private disposed = false;

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Return the cached instance for `key`, or build, cache and return it.
   *
   * @throws ScopeDisposedError if the store has been drained
   * @throws CircularDependencyError if `create` asks for `key` again
   */
  getOrAdd(key: IService, create: () => unknown): unknown {
    if (this.disposed) {
      throw new ScopeDisposedError();
    }

    if (this.instances.has(key)) {
      return this.instances.get(key);
    }

    if (this.pending.has(key)) {
      const name = getServiceName(key.serviceIdentifier);
      throw new CircularDependencyError(key.serviceIdentifier, [name]);
    }

    this.pending.add(key);
    try {
      const instance = create();
      if (this.disposed) {
        // Drained while building: nothing else will ever dispose it.
        disposeOrphan(instance);
        throw new ScopeDisposedError();
      }
      this.instances.set(key, instance);
      return instance;
    } finally {
      this.pending.delete(key);
    }
  }

  /**
   * Take ownership of a transient instance.
   */
  addTransient(instance: IDisposable): void {
    if (this.disposed) {
      throw new ScopeDisposedError();
    }
    this.transientDisposables.push(instance);
  }

  /**
   * Mark the store disposed and hand over everything it owned.
   *
   * @returns Each disposable once: transients in capture order, then cached
   * instances in insertion order; `undefined` if already drained
   */
  drain(): IDisposable[] | undefined {
    if (this.disposed) {
      return undefined;
    }
    this.disposed = true;

    const seen = new Set<IDisposable>();
    for (const instance of this.transientDisposables) {
      seen.add(instance);
    }
    for (const instance of this.instances.values()) {
      if (isDisposable(instance)) {
        seen.add(instance);
      }
    }

    this.transientDisposables = [];
    this.instances.clear();

    return Array.from(seen);
  }
}

function disposeOrphan(instance: unknown): void {
  if (!isDisposable(instance)) {
    return;
  }

  try {
    const result = instance.dispose();
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        console.error('Error disposing service:', error);
      });
    }
  } catch (error) {
    console.error('Error disposing service:', error);
  }
}
