/**
 * @fileoverview Scoped Lifetimes Integration Tests
 *
 * End-to-end tests for a request-per-scope application: Singleton, Scoped
 * and Transient services resolved together from a built collection, across
 * several scopes, before and after plans are compiled.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  createToken,
  type IServiceProvider,
  type IDisposable,
  type IServiceScopeFactory,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  ScopeDisposedError,
  enumerableOf,
} from '../../../src/domain/di';
import { ServiceCollection, withScope } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

// Interface tokens
const ILogger = createToken<ILoggerInterface>('ILogger');
const IDatabase = createToken<IDatabaseInterface>('IDatabase');
const IUnitOfWork = createToken<IUnitOfWorkInterface>('IUnitOfWork');
const IUserRepository = createToken<IUserRepositoryInterface>('IUserRepository');
const IAuditSink = createToken<IAuditSinkInterface>('IAuditSink');

interface ILoggerInterface extends IDisposable {
  readonly instanceId: number;
  readonly messages: string[];
  readonly disposeCount: number;
  log(message: string): void;
}

interface IDatabaseInterface {
  readonly instanceId: string;
  query(sql: string): Promise<unknown>;
}

interface IUnitOfWorkInterface extends IDisposable {
  readonly instanceId: string;
  isCommitted: boolean;
  isRolledBack: boolean;
  disposed: boolean;
  begin(): Promise<void>;
  commit(): Promise<void>;
}

interface IUserRepositoryInterface {
  save(user: unknown): Promise<void>;
}

interface IAuditSinkInterface {
  readonly target: string;
}

// Implementations

let loggerInstanceCount = 0;

class ConsoleLogger implements ILoggerInterface {
  public readonly instanceId: number;
  public readonly messages: string[] = [];
  public disposeCount = 0;

  constructor() {
    this.instanceId = ++loggerInstanceCount;
  }

  log(message: string): void {
    this.messages.push(message);
  }

  dispose(): void {
    this.disposeCount++;
  }
}

let dbInstanceCount = 0;

class PostgresDatabase implements IDatabaseInterface {
  public readonly instanceId: string;
  public readonly statements: string[] = [];

  constructor() {
    this.instanceId = `db-${++dbInstanceCount}`;
  }

  async query(sql: string): Promise<unknown> {
    this.statements.push(sql);
    return { sql, rows: [] };
  }
}

let uowInstanceCount = 0;

class SqlUnitOfWork implements IUnitOfWorkInterface {
  static inject = [IDatabase] as const;

  public readonly instanceId: string;
  public isCommitted = false;
  public isRolledBack = false;
  public disposed = false;

  constructor(public readonly db: IDatabaseInterface) {
    this.instanceId = `uow-${++uowInstanceCount}`;
  }

  async begin(): Promise<void> {
    await this.db.query('BEGIN');
  }

  async commit(): Promise<void> {
    await this.db.query('COMMIT');
    this.isCommitted = true;
  }

  dispose(): void {
    if (!this.isCommitted) {
      // Uncommitted work is rolled back
      this.isRolledBack = true;
    }
    this.disposed = true;
  }
}

class UserRepository implements IUserRepositoryInterface {
  static inject = [IDatabase, ILogger] as const;

  constructor(
    public readonly db: IDatabaseInterface,
    public readonly logger: ILoggerInterface,
  ) {}

  async save(_user: unknown): Promise<void> {
    this.logger.log('Saving user');
    await this.db.query('INSERT INTO users VALUES ($1)');
  }
}

class UserService {
  static inject = [IUserRepository, IUnitOfWork, ILogger] as const;

  constructor(
    public readonly userRepo: IUserRepositoryInterface,
    public readonly uow: IUnitOfWorkInterface,
    public readonly logger: ILoggerInterface,
  ) {}

  async createUser(name: string): Promise<void> {
    this.logger.log(`Creating user: ${name}`);
    await this.uow.begin();
    await this.userRepo.save({ name });
    await this.uow.commit();
  }
}

let widgetInstanceCount = 0;

class Widget {
  static inject = [ILogger, IUnitOfWork] as const;

  public readonly instanceId: number;
  public disposeCount = 0;

  constructor(
    public readonly logger: ILoggerInterface,
    public readonly uow: IUnitOfWorkInterface,
  ) {
    this.instanceId = ++widgetInstanceCount;
  }

  dispose(): void {
    this.disposeCount++;
  }
}

class FileAuditSink implements IAuditSinkInterface {
  readonly target = 'file';
}

class QueueAuditSink implements IAuditSinkInterface {
  readonly target = 'queue';
}

function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

// ============================================================================
// Tests
// ============================================================================

describe('Scoped lifetimes integration', () => {
  let services: ServiceCollection;
  let provider: IServiceProvider;

  beforeEach(() => {
    // Reset counters
    loggerInstanceCount = 0;
    dbInstanceCount = 0;
    uowInstanceCount = 0;
    widgetInstanceCount = 0;

    services = new ServiceCollection();

    // Register services
    services
      .addSingleton(ILogger, ConsoleLogger)
      .addScoped(IDatabase, PostgresDatabase)
      .addScoped(IUnitOfWork, SqlUnitOfWork)
      .addScoped(IUserRepository, UserRepository)
      .addScoped(UserService)
      .addTransient(Widget)
      .addSingleton(IAuditSink, FileAuditSink)
      .addScoped(IAuditSink, QueueAuditSink);

    provider = services.build();
  });

  // ============================================================================
  // Lifetimes Across Scopes
  // ============================================================================

  describe('lifetimes across scopes', () => {
    it('should build one Singleton, one Scoped per scope and one Transient per request', () => {
      const scopeA = provider.createScope();
      const scopeB = provider.createScope();

      const widgets = [
        scopeA.getRequiredService(Widget),
        scopeA.getRequiredService(Widget),
        scopeB.getRequiredService(Widget),
        scopeB.getRequiredService(Widget),
      ];

      expect(new Set(widgets).size).toBe(4);
      expect(new Set(widgets.map((widget) => widget.uow)).size).toBe(2);
      expect(new Set(widgets.map((widget) => widget.logger)).size).toBe(1);

      expect(widgetInstanceCount).toBe(4);
      expect(uowInstanceCount).toBe(2);
      expect(loggerInstanceCount).toBe(1);
    });

    it('should share the scoped graph inside one scope', () => {
      const scope = provider.createScope();

      const userService = scope.getRequiredService(UserService);

      expect(userService.uow).toBe(scope.getRequiredService(IUnitOfWork));
      expect(userService.userRepo).toBe(scope.getRequiredService(IUserRepository));
      expect(userService.logger).toBe(provider.getRequiredService(ILogger));
    });

    it('should run a unit of work against the scope database', async () => {
      await withScope(provider, async (scope) => {
        const userService = scope.getRequiredService(UserService);

        await userService.createUser('alice');

        expect(userService.uow.isCommitted).toBe(true);
        expect(userService.logger.messages).toEqual(['Creating user: alice', 'Saving user']);
        expect(scope.getRequiredService(IDatabase).instanceId).toBe('db-1');
      });
    });

    it('should resolve the last registration singly and all of them together', () => {
      const scope = provider.createScope();

      expect(scope.getRequiredService(IAuditSink).target).toBe('queue');
      expect(scope.getServices(IAuditSink).map((sink) => sink.target)).toEqual(['file', 'queue']);
      expect(scope.getService(enumerableOf(IAuditSink))[1]).toBe(scope.getService(IAuditSink));
    });
  });

  // ============================================================================
  // Built-in Services
  // ============================================================================

  describe('built-in services', () => {
    it('should resolve each provider to itself', () => {
      const scope = provider.createScope();

      expect(provider.getService(SERVICE_PROVIDER_TOKEN)).toBe(provider);
      expect(scope.getService(SERVICE_PROVIDER_TOKEN)).toBe(scope);
    });

    it('should create sibling scopes from a resolved scope factory', () => {
      const factory = provider.getRequiredService<IServiceScopeFactory>(SERVICE_SCOPE_FACTORY_TOKEN);
      const scopeA = factory.createScope();
      const scopeB = factory.createScope();

      expect(scopeA.getRequiredService(IUnitOfWork)).not.toBe(scopeB.getRequiredService(IUnitOfWork));
      expect(scopeA.getRequiredService(ILogger)).toBe(scopeB.getRequiredService(ILogger));
    });
  });

  // ============================================================================
  // Plan Compilation
  // ============================================================================

  describe('plan compilation', () => {
    it('should behave the same on the first and fiftieth request', async () => {
      const scope = provider.createScope();
      const widgets: Widget[] = [];

      for (let i = 0; i < 50; i++) {
        widgets.push(scope.getRequiredService(Widget));
        await flushMicrotasks();
      }

      const first = widgets[0];
      const last = widgets[49];

      expect(first).toBeInstanceOf(Widget);
      expect(last).toBeInstanceOf(Widget);
      expect(last).not.toBe(first);
      expect(last?.uow).toBe(first?.uow);
      expect(last?.logger).toBe(first?.logger);
      expect(new Set(widgets).size).toBe(50);
      expect(uowInstanceCount).toBe(1);
    });

    it('should dispose transients built before and after compilation', async () => {
      const scope = provider.createScope();
      const widgets: Widget[] = [];

      for (let i = 0; i < 5; i++) {
        widgets.push(scope.getRequiredService(Widget));
        await flushMicrotasks();
      }
      scope.dispose();

      expect(widgets.map((widget) => widget.disposeCount)).toEqual([1, 1, 1, 1, 1]);
    });
  });

  // ============================================================================
  // Disposal
  // ============================================================================

  describe('disposal', () => {
    it('should roll back uncommitted work when the scope ends', async () => {
      let uow: IUnitOfWorkInterface | undefined;

      await withScope(provider, (scope) => {
        uow = scope.getRequiredService(IUnitOfWork);
      });

      expect(uow?.disposed).toBe(true);
      expect(uow?.isRolledBack).toBe(true);
    });

    it('should dispose the scope when the callback throws', async () => {
      let uow: IUnitOfWorkInterface | undefined;

      await expect(
        withScope(provider, (scope) => {
          uow = scope.getRequiredService(IUnitOfWork);
          throw new Error('request failed');
        }),
      ).rejects.toThrow('request failed');

      expect(uow?.disposed).toBe(true);
    });

    it('should keep the callback error when disposal also fails', async () => {
      const disposalFailure = new Error('disposal failed');
      const ILease = createToken<IDisposable>('ILease');
      const leased = new ServiceCollection()
        .addScopedFactory(ILease, () => ({
          dispose: () => {
            throw disposalFailure;
          },
        }))
        .build();
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      await expect(
        withScope(leased, (scope) => {
          scope.getRequiredService(ILease);
          throw new Error('request failed');
        }),
      ).rejects.toThrow('request failed');

      expect(errorSpy).toHaveBeenCalledWith('Error disposing scope:', disposalFailure);
    });

    it('should reject with the disposal error when the callback succeeds', async () => {
      const disposalFailure = new Error('disposal failed');
      const ILease = createToken<IDisposable>('ILease');
      const leased = new ServiceCollection()
        .addScopedFactory(ILease, () => ({
          dispose: () => {
            throw disposalFailure;
          },
        }))
        .build();

      await expect(
        withScope(leased, (scope) => {
          scope.getRequiredService(ILease);
          return 'done';
        }),
      ).rejects.toBe(disposalFailure);
    });

    it('should return the callback result', async () => {
      const instanceId = await withScope(provider, (scope) => scope.getRequiredService(IDatabase).instanceId);

      expect(instanceId).toBe('db-1');
    });

    it('should leave singletons alive until the root is disposed', () => {
      const scope = provider.createScope();
      const logger = scope.getRequiredService(ILogger);

      scope.dispose();
      expect(logger.disposeCount).toBe(0);

      provider.dispose();
      provider.dispose();
      expect(logger.disposeCount).toBe(1);
    });

    it('should keep sibling scopes usable after one is disposed', () => {
      const scopeA = provider.createScope();
      const scopeB = provider.createScope();

      scopeA.dispose();

      expect(() => scopeA.getService(IDatabase)).toThrow(ScopeDisposedError);
      expect(scopeB.getRequiredService(IDatabase)).toBeInstanceOf(PostgresDatabase);
    });
  });
});
