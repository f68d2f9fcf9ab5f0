import { Logger, type LogLevel } from '@nestjs/common';
import type { MapperError } from '../common/errors';
import { truncateForLog, toNestLogLevel } from '../common/logging.utils';
import { MapperLogLevel } from '../common/types';
import type { ExecuteContext } from '../execution/execute-context';
import { ExecuteResult } from '../execution/execute-result';
import { describeValues } from '../value/format';
import { BaseInterceptor, InterceptorType } from './interceptor';

export interface LoggingInterceptorOptions {
  level?: MapperLogLevel;
  slowQueryThresholdMs?: number;
  /** Longest parameter line written before truncation */
  maxParameterLength?: number;
}

/**
 * Statement log in the familiar `==> Preparing` / `<== Total` shape
 */
export class LoggingInterceptor extends BaseInterceptor {
  static readonly NAME = 'logging';

  readonly name = LoggingInterceptor.NAME;
  readonly type = InterceptorType.Logging;
  readonly order = 90;

  private readonly logger = new Logger(LoggingInterceptor.name);
  private readonly level: LogLevel;
  private readonly slowQueryThresholdMs: number;
  private readonly maxParameterLength: number;

  constructor(options: LoggingInterceptorOptions = {}) {
    super();
    this.level = toNestLogLevel(options.level ?? MapperLogLevel.Debug);
    this.slowQueryThresholdMs = options.slowQueryThresholdMs ?? 1000;
    this.maxParameterLength = options.maxParameterLength ?? 1000;
  }

  before(context: ExecuteContext): void {
    this.write(`==> Preparing: ${context.finalSql}`);
    this.write(`==> Parameters: ${truncateForLog(describeValues(context.finalParams), this.maxParameterLength)}`);
  }

  after(context: ExecuteContext, result: ExecuteResult): void {
    const cost = context.elapsedMs();
    this.write(`<== Total: ${ExecuteResult.affectedOf(result)}, Cost: ${cost.toFixed(2)} ms`);
    if (cost > this.slowQueryThresholdMs) {
      this.logger.warn(`<== Slow Query! Cost: ${cost.toFixed(2)} ms, SQL: ${context.finalSql}`);
    }
  }

  onError(context: ExecuteContext, error: MapperError): void {
    this.logger.error(`<== ERROR: ${error.message} [${context.operation}] ${context.finalSql}`);
  }

  private write(message: string): void {
    switch (this.level) {
      case 'verbose':
        this.logger.verbose(message);
        break;
      case 'debug':
        this.logger.debug(message);
        break;
      case 'log':
        this.logger.log(message);
        break;
      case 'warn':
        this.logger.warn(message);
        break;
      default:
        this.logger.error(message);
        break;
    }
  }
}
