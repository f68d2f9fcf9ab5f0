import type { OperationType } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { DetectionResult } from '../security/sql-injection.detector';
import type { Value } from '../value/value';
import type { Wrapper } from '../wrapper/wrapper';

export interface ExecuteMetrics {
  parseTimeMs: number;
  executeTimeMs: number;
  totalTimeMs: number;
  rowsAffected: number;
  /** Heap growth across the operation, in bytes */
  memoryUsage: number;
}

export interface ExecuteContextInit {
  sql: string;
  params: Value[];
  operation: OperationType;
  table?: TableName;
  entityType?: string;
  wrapper?: Wrapper;
  connectionId?: string;
  /** Spliced RawSql expressions that came from values, masked before the injection scan */
  trustedFragments?: string[];
}

/**
 * Per-operation envelope handed to every interceptor
 * Interceptors may rewrite finalSql / finalParams; the originals stay untouched
 */
export class ExecuteContext {
  readonly originalSql: string;
  readonly originalParams: readonly Value[];
  finalSql: string;
  finalParams: Value[];
  readonly operation: OperationType;
  readonly table?: TableName;
  readonly entityType?: string;
  readonly wrapper?: Wrapper;
  readonly trustedFragments: readonly string[];
  readonly startTime = performance.now();
  readonly metadata = new Map<string, unknown>();
  readonly executedInterceptors: string[] = [];
  readonly skipNext = new Set<string>();
  connectionId?: string;
  stopPropagation = false;
  detectionResult?: DetectionResult;
  readonly metrics: ExecuteMetrics = {
    parseTimeMs: 0,
    executeTimeMs: 0,
    totalTimeMs: 0,
    rowsAffected: 0,
    memoryUsage: 0,
  };

  private readonly startHeap = process.memoryUsage().heapUsed;
  private executeStart?: number;

  constructor(init: ExecuteContextInit) {
    this.originalSql = init.sql;
    this.finalSql = init.sql;
    this.originalParams = [...init.params];
    this.finalParams = [...init.params];
    this.operation = init.operation;
    this.table = init.table;
    this.entityType = init.entityType;
    this.wrapper = init.wrapper;
    this.connectionId = init.connectionId;
    this.trustedFragments = init.trustedFragments ?? [];
  }

  get tableName(): string | undefined {
    return this.table?.name;
  }

  markParseComplete(): void {
    this.metrics.parseTimeMs = performance.now() - this.startTime;
  }

  markExecuteStart(): void {
    this.executeStart = performance.now();
  }

  markExecuteComplete(rowsAffected: number): void {
    const now = performance.now();
    this.metrics.executeTimeMs = this.executeStart === undefined ? 0 : now - this.executeStart;
    this.metrics.totalTimeMs = now - this.startTime;
    this.metrics.rowsAffected = rowsAffected;
    this.metrics.memoryUsage = Math.max(0, process.memoryUsage().heapUsed - this.startHeap);
  }

  /**
   * Skip the interceptor with this name or type for the rest of the operation
   */
  skipInterceptor(nameOrType: string): void {
    this.skipNext.add(nameOrType);
  }

  /**
   * Stop the before-phase after the current interceptor
   */
  stop(): void {
    this.stopPropagation = true;
  }

  elapsedMs(): number {
    return performance.now() - this.startTime;
  }
}
