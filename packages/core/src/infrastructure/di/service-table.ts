/**
 * @fileoverview ServiceTable - Registrations and Realized Accessors
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One table per container, shared by the root provider and every scope.
 *
 * ```
 * ServiceTable
 * ├─ services           identifier -> ServiceEntry    (fixed after construction)
 * ├─ closedEnumerables  Enumerable<T> -> ServiceEntry  (memoised, grows)
 * └─ realizedServices   identifier -> RealizedService (grows, entries replaced once)
 * ```
 *
 * @version 1.0.0
 */

import {
  type EnumerableIdentifier,
  type IServiceDescriptor,
  type ServiceIdentifier,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  isEnumerableIdentifier,
  validateDescriptor,
} from '../../domain/di';

import type { RealizedService } from './realized-service';
import {
  type IGenericService,
  type IService,
  OpenEnumerableService,
  ServiceEntry,
  ServiceProviderService,
  ServiceScopeService,
  createService,
} from './service';

/**
 * ServiceTable - Immutable registry plus the accessor cache.
 *
 * @remarks
 * Built-in registrations are appended after the user's descriptors, so they
 * win singular resolution of their tokens.
 *
 * Building an accessor is pure: it only reads the registry and produces a
 * call site. A failed build (a cycle, a missing dependency) leaves nothing
 * behind and is retried on the next request.
 */
export class ServiceTable {
  private readonly services = new Map<ServiceIdentifier, ServiceEntry>();

  private readonly closedEnumerables = new Map<EnumerableIdentifier, ServiceEntry | undefined>();

  private readonly realizedServices = new Map<ServiceIdentifier, RealizedService>();

  private readonly enumerableService: IGenericService;

  constructor(descriptors: Iterable<IServiceDescriptor>) {
    for (const descriptor of descriptors) {
      validateDescriptor(descriptor);
      this.add(descriptor.serviceIdentifier, createService(descriptor));
    }

    this.add(SERVICE_PROVIDER_TOKEN, new ServiceProviderService());
    this.add(SERVICE_SCOPE_FACTORY_TOKEN, new ServiceScopeService());
    this.enumerableService = new OpenEnumerableService(this);
  }

  private add(identifier: ServiceIdentifier, service: IService): void {
    const entry = this.services.get(identifier);
    if (entry === undefined) {
      this.services.set(identifier, new ServiceEntry(service));
    } else {
      entry.add(service);
    }
  }

  // ============================================================================
  // Registry
  // ============================================================================

  /**
   * Find the registrations for an identifier.
   *
   * @remarks
   * An enumerable identifier without an exact registration is closed over its
   * element by the generic handler; the result, present or not, is memoised.
   */
  tryGetEntry(identifier: ServiceIdentifier): ServiceEntry | undefined {
    const entry = this.services.get(identifier);
    if (entry !== undefined || !isEnumerableIdentifier(identifier)) {
      return entry;
    }

    if (this.closedEnumerables.has(identifier)) {
      return this.closedEnumerables.get(identifier);
    }

    const service = this.enumerableService.getService(identifier);
    const closed = service === undefined ? undefined : new ServiceEntry(service);
    this.closedEnumerables.set(identifier, closed);
    return closed;
  }

  // ============================================================================
  // Realized Services
  // ============================================================================

  /**
   * Get the accessor for an identifier, realizing it on first request.
   */
  getOrAddRealizedService(
    identifier: ServiceIdentifier,
    create: (identifier: ServiceIdentifier) => RealizedService,
  ): RealizedService {
    const existing = this.realizedServices.get(identifier);
    if (existing !== undefined) {
      return existing;
    }

    const realized = create(identifier);
    this.realizedServices.set(identifier, realized);
    return realized;
  }

  /**
   * Swap in a new accessor; later lookups see only the new one.
   */
  replaceRealizedService(identifier: ServiceIdentifier, realized: RealizedService): void {
    this.realizedServices.set(identifier, realized);
  }

  /**
   * @internal
   */
  getRealizedService(identifier: ServiceIdentifier): RealizedService | undefined {
    return this.realizedServices.get(identifier);
  }
}
