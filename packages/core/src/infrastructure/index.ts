/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer holds the resolution engine behind the domain
 * contracts.
 *
 * @module @scopewise/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection implementation
// ============================================================================
export * from './di';
