/**
 * @fileoverview DI Errors - Dependency Injection Error Classes
 *
 * @packageDocumentation
 * @module @scopewise/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines error classes for DI-related failures.
 * Each error carries the resolution path that led to it.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';

/**
 * Base error class for all DI-related errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   provider.getService(MyService);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     console.error(error.dependencyGraph);
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * The resolution path leading to this error.
   *
   * @remarks
   * ```
   * Widget -> Symbol(IRequestContext) -> Symbol(IClock) (UNREGISTERED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Formatted dependency graph for debugging.
   *
   * @remarks
   * ```
   * Widget
   *   └─ Symbol(IRequestContext)
   *     └─ Symbol(IClock) (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Build a visual dependency graph from the resolution path.
   * @internal
   */
  private buildDependencyGraph(): string {
    return this.resolutionPath
      .map((step, i) => `${'  '.repeat(i)}${i === 0 ? '' : '└─ '}${step}`)
      .join('\n');
  }
}

/**
 * Error thrown when a required service is not registered.
 *
 * @remarks
 * Raised by `getRequiredService()`, and while building a plan when a class
 * declares a dependency (via `static inject`) that cannot be resolved.
 * Plain `getService()` never throws it; it returns `undefined` instead.
 */
export class ServiceNotRegisteredError extends DIError {
  /**
   * The identifier that was not found.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The service whose activation needed the missing one, if any.
   */
  public readonly dependentIdentifier: ServiceIdentifier | undefined;

  constructor(
    identifier: ServiceIdentifier,
    resolutionPath: string[] = [],
    dependentIdentifier?: ServiceIdentifier,
  ) {
    const name = getServiceName(identifier);
    const message =
      dependentIdentifier === undefined
        ? `Service '${name}' is not registered in the container.`
        : `Unable to resolve service '${name}' while attempting to activate ` +
          `'${getServiceName(dependentIdentifier)}'.`;

    super(message, [...resolutionPath, `${name} (UNREGISTERED)`]);
    this.serviceIdentifier = identifier;
    this.dependentIdentifier = dependentIdentifier;
  }
}

/**
 * Error thrown when a circular dependency is detected.
 *
 * @remarks
 * **Example Circular Dependency:**
 * ```
 * ServiceA depends on ServiceB
 * ServiceB depends on ServiceA  ← CIRCULAR!
 * ```
 *
 * Detected while the resolution plan is built, so the first `getService()`
 * for any service on the cycle throws, however many times it is retried.
 *
 * **Solutions:**
 * 1. Refactor to break the cycle
 * 2. Inject `SERVICE_PROVIDER_TOKEN` and resolve lazily
 * 3. Extract the shared logic into a third service
 */
export class CircularDependencyError extends DIError {
  /**
   * The service that closed the cycle.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The full cycle path, ending with the repeated service.
   */
  public readonly cyclePath: string[];

  constructor(identifier: ServiceIdentifier, resolutionPath: string[]) {
    const name = getServiceName(identifier);
    const cyclePath = [...resolutionPath, name];

    super(`Circular dependency detected: ${cyclePath.join(' -> ')}`, [
      ...resolutionPath,
      `${name} (CIRCULAR!)`,
    ]);
    this.serviceIdentifier = identifier;
    this.cyclePath = cyclePath;
  }
}

/**
 * Error thrown when trying to use a disposed provider.
 */
export class ScopeDisposedError extends DIError {
  constructor() {
    super(
      'Cannot resolve services from a disposed service provider. ' +
        'Create a new scope with provider.createScope().',
    );
  }
}

/**
 * Error thrown when trying to modify a sealed collection.
 */
export class ContainerSealedError extends DIError {
  constructor() {
    super(
      'Cannot register services after the container has been built. ' +
        'Register all services before calling build().',
    );
  }
}

/**
 * Error thrown when more than one instance failed to dispose.
 *
 * @remarks
 * Disposal always visits every instance. A single failure is rethrown as-is;
 * two or more are collected here, in disposal order.
 */
export class DisposalError extends DIError {
  /**
   * The errors thrown by the disposed instances.
   */
  public readonly errors: readonly unknown[];

  constructor(errors: readonly unknown[]) {
    super(`${errors.length} error(s) occurred while disposing services`);
    this.errors = errors;
  }
}
