import type { MapperError } from '../common/errors';
import type { OperationType } from '../common/types';
import type { ExecuteContext } from '../execution/execute-context';
import type { ExecuteResult } from '../execution/execute-result';

export enum InterceptorType {
  Tenant = 'Tenant',
  Pagination = 'Pagination',
  DataPermission = 'DataPermission',
  FieldFill = 'FieldFill',
  Performance = 'Performance',
  Cache = 'Cache',
  Encryption = 'Encryption',
  Audit = 'Audit',
  SoftDelete = 'SoftDelete',
  OptimisticLock = 'OptimisticLock',
  VersionControl = 'VersionControl',
  Metrics = 'Metrics',
  Tracing = 'Tracing',
  Logging = 'Logging',
  Custom = 'Custom',
}

/**
 * Hook around every statement; hooks are synchronous
 * Lower `order` runs earlier in the before-phase and later in the after-phase
 */
export interface Interceptor {
  readonly name: string;
  readonly type: InterceptorType;
  readonly order: number;
  supportsOperation(operation: OperationType): boolean;
  willIgnoreTable(table: string): boolean;
  before(context: ExecuteContext): void;
  /**
   * May return a replacement result
   */
  after(context: ExecuteContext, result: ExecuteResult): ExecuteResult | void;
  onError(context: ExecuteContext, error: MapperError): void;
}

/**
 * No-op defaults; subclasses override the hooks they need
 */
export abstract class BaseInterceptor implements Interceptor {
  abstract readonly name: string;
  abstract readonly type: InterceptorType;
  readonly order: number = 100;

  protected readonly ignoredTables = new Set<string>();
  protected operations?: ReadonlySet<OperationType>;

  supportsOperation(operation: OperationType): boolean {
    return this.operations === undefined || this.operations.has(operation);
  }

  willIgnoreTable(table: string): boolean {
    return this.ignoredTables.has(table);
  }

  ignoreTable(table: string): this {
    this.ignoredTables.add(table);
    return this;
  }

  restrictOperations(operations: Iterable<OperationType>): this {
    this.operations = new Set(operations);
    return this;
  }

  before(_context: ExecuteContext): void {
    // nothing by default
  }

  after(_context: ExecuteContext, _result: ExecuteResult): ExecuteResult | void {
    // nothing by default
  }

  onError(_context: ExecuteContext, _error: MapperError): void {
    // nothing by default
  }
}
