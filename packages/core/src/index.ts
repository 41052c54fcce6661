/**
 * @fileoverview @scopewise/core - Main Entry Point
 *
 * Dependency-injection resolution engine: lifetimes, scopes, cycle detection,
 * deterministic disposal and adaptive plan compilation.
 *
 * @packageDocumentation
 * @module @scopewise/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { createServiceCollection, createToken } from '@scopewise/core';
 *
 * // Define interface token
 * interface ILogger { log(msg: string): void; }
 * const ILogger = createToken<ILogger>('ILogger');
 *
 * // Register services
 * const services = createServiceCollection();
 * services.addSingleton(ILogger, ConsoleLogger);
 *
 * // Build and use
 * const provider = services.build();
 * const logger = provider.getRequiredService(ILogger);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts, identifiers, descriptors, errors - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// The resolution engine
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
