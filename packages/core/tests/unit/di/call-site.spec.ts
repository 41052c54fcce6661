/**
 * @fileoverview Call Site Unit Tests
 *
 * Tests for resolution plans and the two ways of executing them.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ServiceLifetime,
  ServiceProviderMode,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  CircularDependencyError,
  ServiceNotRegisteredError,
  type IServiceDescriptor,
  type ServiceIdentifier,
  createToken,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  enumerableOf,
} from '../../../src/domain/di';
import {
  type CallSite,
  type CallSiteChain,
  ServiceProvider,
  ServiceScopeFactory,
  compileCallSite,
  resolveCallSite,
} from '../../../src/infrastructure/di';
import { describeCallSiteChain } from '../../../src/infrastructure/di/call-site';

// ============================================================================
// Test Fixtures
// ============================================================================

interface ILogger {
  readonly lines: string[];
}

interface IRequestContext {
  readonly requestId: number;
}

const ILogger = createToken<ILogger>('ILogger');
const IRequestContext = createToken<IRequestContext>('IRequestContext');
const IWidget = createToken<Widget>('IWidget');

class ConsoleLogger implements ILogger {
  readonly lines: string[] = [];
}

let nextRequestId = 0;

class RequestContext implements IRequestContext {
  readonly requestId = ++nextRequestId;
  disposed = false;

  dispose(): void {
    this.disposed = true;
  }
}

class Widget {
  static inject = [ILogger, IRequestContext] as const;

  disposed = false;

  constructor(
    readonly logger: ILogger,
    readonly context: IRequestContext,
  ) {}

  dispose(): void {
    this.disposed = true;
  }
}

class Orphan {
  static inject = [IRequestContext] as const;

  constructor(readonly context: IRequestContext) {}
}

class Dashboard {}

const descriptors: IServiceDescriptor[] = [
  createClassDescriptor(ILogger, ServiceLifetime.Singleton, ConsoleLogger),
  createClassDescriptor(IRequestContext, ServiceLifetime.Scoped, RequestContext),
  createClassDescriptor(IWidget, ServiceLifetime.Transient, Widget),
];

function planFor(provider: ServiceProvider, identifier: ServiceIdentifier): CallSite {
  const callSite = provider.getServiceCallSite(identifier, new Set());
  if (callSite === undefined) {
    throw new Error(`No plan for ${String(identifier)}`);
  }
  return callSite;
}

function asWidget(value: unknown): Widget {
  if (!(value instanceof Widget)) {
    throw new Error('Expected a Widget');
  }
  return value;
}

// ============================================================================
// Planning Tests
// ============================================================================

describe('call site planning', () => {
  let provider: ServiceProvider;

  beforeEach(() => {
    provider = new ServiceProvider(descriptors, { mode: ServiceProviderMode.Runtime });
  });

  it('should wrap each registration in its lifetime', () => {
    const loggerService = provider.table.tryGetEntry(ILogger)?.last;
    const contextService = provider.table.tryGetEntry(IRequestContext)?.last;

    expect(planFor(provider, IWidget)).toMatchObject({
      kind: 'transient',
      inner: {
        kind: 'constructor',
        implementationType: Widget,
        parameterCallSites: [
          {
            kind: 'singleton',
            key: loggerService,
            inner: { kind: 'constructor', implementationType: ConsoleLogger, parameterCallSites: [] },
          },
          {
            kind: 'scoped',
            key: contextService,
            inner: { kind: 'constructor', implementationType: RequestContext },
          },
        ],
      },
    });
  });

  it('should plan instance and factory registrations as leaves', () => {
    const logger = new ConsoleLogger();
    const factory = (): IRequestContext => ({ requestId: 0 });
    const leaves = new ServiceProvider([
      createInstanceDescriptor(ILogger, logger),
      createFactoryDescriptor(IRequestContext, ServiceLifetime.Transient, factory),
    ]);

    expect(planFor(leaves, ILogger)).toMatchObject({
      kind: 'singleton',
      inner: { kind: 'constant', value: logger },
    });
    expect(planFor(leaves, IRequestContext)).toMatchObject({
      kind: 'transient',
      inner: { kind: 'factory', factory },
    });
  });

  it('should plan every registration of an enumerable in order', () => {
    const handlers = new ServiceProvider([
      createClassDescriptor(ILogger, ServiceLifetime.Singleton, ConsoleLogger),
      createFactoryDescriptor(ILogger, ServiceLifetime.Transient, () => new ConsoleLogger()),
    ]);

    expect(planFor(handlers, enumerableOf(ILogger))).toMatchObject({
      kind: 'transient',
      inner: {
        kind: 'enumerable',
        elementIdentifier: ILogger,
        itemCallSites: [
          { kind: 'singleton', inner: { kind: 'constructor' } },
          { kind: 'transient', inner: { kind: 'factory' } },
        ],
      },
    });
  });

  it('should plan an empty enumerable for an unregistered element', () => {
    const callSite = planFor(provider, enumerableOf(Orphan));

    expect(callSite).toEqual({ kind: 'emptyEnumerable', elementIdentifier: Orphan, value: [] });
    if (callSite.kind === 'emptyEnumerable') {
      expect(Object.isFrozen(callSite.value)).toBe(true);
    }
  });

  it('should plan the built-in services', () => {
    expect(planFor(provider, SERVICE_PROVIDER_TOKEN)).toEqual({
      kind: 'transient',
      inner: { kind: 'serviceProvider' },
    });
    expect(planFor(provider, SERVICE_SCOPE_FACTORY_TOKEN)).toMatchObject({
      kind: 'scoped',
      inner: { kind: 'scopeFactory' },
    });
  });

  it('should return undefined for an unregistered identifier', () => {
    expect(provider.getServiceCallSite(Orphan, new Set())).toBeUndefined();
  });

  describe('call site chain', () => {
    let chain: CallSiteChain;

    beforeEach(() => {
      chain = new Set();
    });

    it('should be left empty after a successful plan', () => {
      provider.getServiceCallSite(IWidget, chain);

      expect(chain.size).toBe(0);
    });

    it('should be left empty after a missing dependency', () => {
      const partial = new ServiceProvider([
        createClassDescriptor(Orphan, ServiceLifetime.Transient, Orphan),
      ]);

      expect(() => partial.getServiceCallSite(Orphan, chain)).toThrow(ServiceNotRegisteredError);
      expect(chain.size).toBe(0);
    });

    it('should be left as found after a cycle', () => {
      chain.add(Dashboard);
      chain.add(IWidget);

      expect(() => provider.getServiceCallSite(IWidget, chain)).toThrow(CircularDependencyError);
      expect(Array.from(chain)).toEqual([Dashboard, IWidget]);
    });

    it('should report the path in the cycle error', () => {
      chain.add(Dashboard);
      chain.add(IWidget);

      expect(() => provider.getServiceCallSite(IWidget, chain)).toThrow(
        'Circular dependency detected: Dashboard -> Symbol(IWidget) -> Symbol(IWidget)',
      );
    });

    it('should be described by service names in order', () => {
      chain.add(Dashboard);
      chain.add(enumerableOf(ILogger));

      expect(describeCallSiteChain(chain)).toEqual(['Dashboard', 'Enumerable<Symbol(ILogger)>']);
    });
  });
});

// ============================================================================
// Execution Tests
// ============================================================================

type Execute = (callSite: CallSite, provider: ServiceProvider) => unknown;

const executors: { name: string; execute: Execute }[] = [
  { name: 'interpreter', execute: resolveCallSite },
  { name: 'compiler', execute: (callSite, provider) => compileCallSite(callSite)(provider) },
];

describe.each(executors)('call site execution ($name)', ({ execute }) => {
  let root: ServiceProvider;

  beforeEach(() => {
    root = new ServiceProvider(descriptors, { mode: ServiceProviderMode.Runtime });
  });

  it('should build a new transient on every run', () => {
    const scope = root.createScope();
    const plan = planFor(root, IWidget);

    const first = asWidget(execute(plan, scope));
    const second = asWidget(execute(plan, scope));

    expect(first).not.toBe(second);
  });

  it('should cache scoped instances in the executing provider', () => {
    const plan = planFor(root, IWidget);
    const scopeA = root.createScope();
    const scopeB = root.createScope();

    const a1 = asWidget(execute(plan, scopeA));
    const a2 = asWidget(execute(plan, scopeA));
    const b1 = asWidget(execute(plan, scopeB));

    expect(a1.context).toBe(a2.context);
    expect(a1.context).not.toBe(b1.context);
    expect(a1.context).toBe(scopeA.getService(IRequestContext));
  });

  it('should cache singletons in the root', () => {
    const plan = planFor(root, IWidget);

    const widget = asWidget(execute(plan, root.createScope()));

    expect(widget.logger).toBe(root.getService(ILogger));
  });

  it('should run singleton factories against the root', () => {
    let seen: unknown;
    const provider = new ServiceProvider([
      createFactoryDescriptor(ILogger, ServiceLifetime.Singleton, (sp) => {
        seen = sp;
        return new ConsoleLogger();
      }),
    ]);

    execute(planFor(provider, ILogger), provider.createScope());

    expect(seen).toBe(provider);
  });

  it('should hand disposable transients to the executing provider', () => {
    const scope = root.createScope();

    const widget = asWidget(execute(planFor(root, IWidget), scope));
    scope.dispose();

    expect(widget.disposed).toBe(true);
  });

  it('should resolve the executing provider', () => {
    const scope = root.createScope();

    expect(execute(planFor(root, SERVICE_PROVIDER_TOKEN), scope)).toBe(scope);
  });

  it('should bind scope factories to the executing provider', () => {
    const scope = root.createScope();

    const factory = execute(planFor(root, SERVICE_SCOPE_FACTORY_TOKEN), scope);

    expect(factory).toBeInstanceOf(ServiceScopeFactory);
    expect(factory).toBe(scope.getService(SERVICE_SCOPE_FACTORY_TOKEN));
    expect(factory).not.toBe(root.getService(SERVICE_SCOPE_FACTORY_TOKEN));
  });

  it('should build a fresh array for each enumerable run', () => {
    const plan = planFor(root, enumerableOf(ILogger));

    const first = execute(plan, root);
    const second = execute(plan, root);

    expect(first).toEqual([root.getService(ILogger)]);
    expect(first).not.toBe(second);
  });

  it('should return the same empty array on every run', () => {
    const plan = planFor(root, enumerableOf(Orphan));

    expect(execute(plan, root)).toBe(execute(plan, root));
  });
});
