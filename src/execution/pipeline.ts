import { Logger } from '@nestjs/common';
import { DatabaseError, MapperError, SqlInjectionDetectedError, errorMessage } from '../common/errors';
import { SqlSecurityPolicy, type OperationType } from '../common/types';
import type { DriverConnection } from '../driver/driver';
import type { InterceptorChain } from '../interceptor/interceptor-chain';
import type { TableName } from '../metadata/table-name';
import { SqlInjectionDetector, Verdict } from '../security/sql-injection.detector';
import type { Value } from '../value/value';
import type { Wrapper } from '../wrapper/wrapper';
import { ExecuteContext } from './execute-context';
import { ExecuteResult } from './execute-result';

/**
 * One statement ready for dispatch, already in the dialect's placeholder style
 */
export interface Statement {
  sql: string;
  params: Value[];
  operation: OperationType;
  /** `query` expects a result set; `execute` reports affected rows */
  mode: 'query' | 'execute';
  table?: TableName;
  entityType?: string;
  wrapper?: Wrapper;
  trusted?: string[];
}

export interface PipelineOptions {
  chain: InterceptorChain;
  detector?: SqlInjectionDetector;
  policy?: SqlSecurityPolicy;
}

/**
 * Runs one statement: before-hooks, injection check, driver call, after-hooks
 * Nothing here suspends except the driver call itself
 */
export class ExecutionPipeline {
  private readonly logger = new Logger(ExecutionPipeline.name);
  readonly chain: InterceptorChain;
  private readonly detector: SqlInjectionDetector;
  private readonly policy: SqlSecurityPolicy;

  constructor(options: PipelineOptions) {
    this.chain = options.chain;
    this.detector = options.detector ?? new SqlInjectionDetector();
    this.policy = options.policy ?? SqlSecurityPolicy.Deny;
  }

  /**
   * Same detector and policy over another chain
   */
  withChain(chain: InterceptorChain): ExecutionPipeline {
    return new ExecutionPipeline({ chain, detector: this.detector, policy: this.policy });
  }

  async run(connection: DriverConnection, statement: Statement): Promise<ExecuteResult> {
    const context = new ExecuteContext({
      sql: statement.sql,
      params: statement.params,
      operation: statement.operation,
      table: statement.table,
      entityType: statement.entityType,
      wrapper: statement.wrapper,
      connectionId: connection.id,
      trustedFragments: statement.trusted,
    });
    context.markParseComplete();

    this.guard(context, () => this.chain.runBefore(context));
    this.guard(context, () => this.inspect(context));

    context.markExecuteStart();
    let result: ExecuteResult;
    try {
      result = statement.mode === 'query'
        ? ExecuteResult.rows(await connection.query(context.finalSql, context.finalParams))
        : await connection
            .execute(context.finalSql, context.finalParams)
            .then(outcome => ExecuteResult.affected(outcome.affected, outcome.lastInsertId));
    } catch (error) {
      const failure = withOperation(error, context);
      this.chain.runOnError(context, failure);
      throw failure;
    }
    context.markExecuteComplete(ExecuteResult.affectedOf(result));

    const final = this.chain.runAfter(context, result);
    if (this.chain.config.enableMetrics) {
      const { parseTimeMs, executeTimeMs, totalTimeMs, rowsAffected } = context.metrics;
      this.logger.verbose(
        `[${context.operation}] parse=${parseTimeMs.toFixed(3)}ms execute=${executeTimeMs.toFixed(3)}ms ` +
          `total=${totalTimeMs.toFixed(3)}ms rows=${rowsAffected}`,
      );
    }
    return final;
  }

  /**
   * Scan the final SQL; Deny aborts before the driver sees the statement
   */
  private inspect(context: ExecuteContext): void {
    const { result, verdict } = this.detector.inspect(
      context.finalSql,
      context.finalParams,
      context.trustedFragments,
      this.policy,
    );
    context.detectionResult = result;
    if (!result) {
      return;
    }
    if (verdict === Verdict.Deny) {
      throw new SqlInjectionDetectedError(result.reasons, { sql: context.finalSql, operation: context.operation });
    }
    if (verdict === Verdict.Warn) {
      this.logger.warn(`Suspicious SQL [${result.severity}]: ${result.reasons.join('; ')} in ${context.finalSql}`);
    }
  }

  private guard(context: ExecuteContext, step: () => void): void {
    try {
      step();
    } catch (error) {
      const failure = withOperation(error, context);
      this.chain.runOnError(context, failure);
      throw failure;
    }
  }
}

/**
 * Attach the operation to a driver failure that does not carry one yet
 */
function withOperation(error: unknown, context: ExecuteContext): MapperError {
  if (error instanceof DatabaseError && error.operation === undefined) {
    return new DatabaseError(error.message, {
      sql: error.sql ?? context.finalSql,
      operation: context.operation,
      cause: error.cause ?? error,
    });
  }
  if (error instanceof MapperError) {
    return error;
  }
  return new DatabaseError(errorMessage(error), { sql: context.finalSql, operation: context.operation, cause: error });
}
