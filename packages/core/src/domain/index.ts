/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains the technology-agnostic DI contracts.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @scopewise/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';
