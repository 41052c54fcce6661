/**
 * @fileoverview Services - Registrations That Know Their Own Plan
 *
 * @packageDocumentation
 * @module @scopewise/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * An {@link IService} is one registration. It knows its lifetime and how to
 * build the base call site for itself; the provider wraps that call site in
 * the lifetime node. A {@link ServiceEntry} is the ordered chain of every
 * registration for one identifier.
 *
 * | Service                   | Lifetime        | Base call site      |
 * |---------------------------|-----------------|---------------------|
 * | InstanceService           | Singleton       | constant            |
 * | FactoryService            | from descriptor | factory             |
 * | ConstructorService        | from descriptor | constructor         |
 * | ServiceProviderService    | Transient       | serviceProvider     |
 * | ServiceScopeService       | Scoped          | scopeFactory        |
 * | ClosedEnumerableService   | Transient       | enumerable          |
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type EnumerableIdentifier,
  type IServiceDescriptor,
  type IServiceProvider,
  type ServiceIdentifier,
  ServiceLifetime,
  ServiceNotRegisteredError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  getInjectDependencies,
} from '../../domain/di';

import {
  type CallSite,
  type CallSiteChain,
  SCOPE_FACTORY_CALL_SITE,
  SERVICE_PROVIDER_CALL_SITE,
  constantCallSite,
  constructorCallSite,
  describeCallSiteChain,
  enumerableCallSite,
  factoryCallSite,
} from './call-site';
import type { ServiceProvider } from './service-provider';
import type { ServiceTable } from './service-table';

/**
 * One registration.
 *
 * @remarks
 * Also serves as the key of the instance caches: a Scoped or Singleton
 * registration is cached once per provider under its own IService, so two
 * registrations of the same identifier never share an instance.
 */
export interface IService {
  readonly serviceIdentifier: ServiceIdentifier;
  readonly lifetime: ServiceLifetime;

  /**
   * Build the base (pre-lifetime) call site for this registration.
   *
   * @param provider - Used to plan dependencies; never used to execute them
   * @param callSiteChain - Identifiers on the current planning path
   */
  createCallSite(provider: ServiceProvider, callSiteChain: CallSiteChain): CallSite;
}

/**
 * Handler for a family of identifiers that are not registered one by one.
 */
export interface IGenericService {
  getService(identifier: EnumerableIdentifier): IService | undefined;
}

/**
 * Ordered registrations of one identifier.
 */
export class ServiceEntry {
  private readonly services: IService[];
  private lastService: IService;

  constructor(service: IService) {
    this.services = [service];
    this.lastService = service;
  }

  /**
   * The most recent registration; the target of singular resolution.
   */
  get last(): IService {
    return this.lastService;
  }

  /**
   * Every registration, oldest first; the target of enumerable resolution.
   */
  get all(): readonly IService[] {
    return this.services;
  }

  add(service: IService): void {
    this.services.push(service);
    this.lastService = service;
  }
}

// ============================================================================
// Descriptor-backed services
// ============================================================================

export class InstanceService implements IService {
  readonly lifetime = ServiceLifetime.Singleton;

  constructor(
    readonly serviceIdentifier: ServiceIdentifier,
    private readonly instance: unknown,
  ) {}

  createCallSite(): CallSite {
    return constantCallSite(this.instance);
  }
}

export class FactoryService implements IService {
  constructor(
    readonly serviceIdentifier: ServiceIdentifier,
    readonly lifetime: ServiceLifetime,
    private readonly factory: (provider: IServiceProvider) => unknown,
  ) {}

  createCallSite(): CallSite {
    return factoryCallSite(this.factory);
  }
}

/**
 * Class registration; dependencies come from the class's `static inject`.
 */
export class ConstructorService implements IService {
  constructor(
    readonly serviceIdentifier: ServiceIdentifier,
    readonly lifetime: ServiceLifetime,
    private readonly implementationType: Constructor,
  ) {}

  createCallSite(provider: ServiceProvider, callSiteChain: CallSiteChain): CallSite {
    const parameterCallSites = getInjectDependencies(this.implementationType).map((dependency) => {
      const callSite = provider.getServiceCallSite(dependency, callSiteChain);
      if (callSite === undefined) {
        throw new ServiceNotRegisteredError(
          dependency,
          describeCallSiteChain(callSiteChain),
          this.serviceIdentifier,
        );
      }
      return callSite;
    });

    return constructorCallSite(this.implementationType, parameterCallSites);
  }
}

/**
 * Turn a validated descriptor into its service.
 */
export function createService(descriptor: IServiceDescriptor): IService {
  const { serviceIdentifier, lifetime } = descriptor;

  if (descriptor.implementationType !== undefined) {
    return new ConstructorService(serviceIdentifier, lifetime, descriptor.implementationType);
  }

  if (descriptor.factory !== undefined) {
    return new FactoryService(serviceIdentifier, lifetime, descriptor.factory);
  }

  return new InstanceService(serviceIdentifier, descriptor.implementationInstance);
}

// ============================================================================
// Built-in services
// ============================================================================

/**
 * Resolves to the executing provider.
 *
 * @remarks
 * Transient, so it is never cached; the transient capture skips it because
 * the value is the provider itself.
 */
export class ServiceProviderService implements IService {
  readonly serviceIdentifier = SERVICE_PROVIDER_TOKEN;
  readonly lifetime = ServiceLifetime.Transient;

  createCallSite(): CallSite {
    return SERVICE_PROVIDER_CALL_SITE;
  }
}

/**
 * Resolves to a scope factory, one per provider.
 */
export class ServiceScopeService implements IService {
  readonly serviceIdentifier = SERVICE_SCOPE_FACTORY_TOKEN;
  readonly lifetime = ServiceLifetime.Scoped;

  createCallSite(): CallSite {
    return SCOPE_FACTORY_CALL_SITE;
  }
}

/**
 * Closes "enumerable of T" over any element identifier that has registrations.
 */
export class OpenEnumerableService implements IGenericService {
  constructor(private readonly table: ServiceTable) {}

  getService(identifier: EnumerableIdentifier): IService | undefined {
    const entry = this.table.tryGetEntry(identifier.elementIdentifier);
    return entry === undefined ? undefined : new ClosedEnumerableService(identifier, entry);
  }
}

export class ClosedEnumerableService implements IService {
  readonly lifetime = ServiceLifetime.Transient;

  constructor(
    readonly serviceIdentifier: EnumerableIdentifier,
    private readonly entry: ServiceEntry,
  ) {}

  createCallSite(provider: ServiceProvider, callSiteChain: CallSiteChain): CallSite {
    const itemCallSites = this.entry.all.map((service) =>
      provider.getResolveCallSite(service, callSiteChain),
    );

    return enumerableCallSite(this.serviceIdentifier.elementIdentifier, itemCallSites);
  }
}
