import { Logger } from '@nestjs/common';
import { InterceptorError, errorMessage, type MapperError } from '../common/errors';
import type { ExecuteContext } from '../execution/execute-context';
import type { ExecuteResult } from '../execution/execute-result';
import { DEFAULT_INTERCEPTOR_CONFIG, type InterceptorConfig } from './interceptor.config';
import { InterceptorType, type Interceptor } from './interceptor';

type Phase = 'before' | 'after' | 'onError';

/**
 * Immutable ordered set of interceptors
 */
export class InterceptorChain {
  private readonly logger = new Logger(InterceptorChain.name);
  private readonly ordered: readonly Interceptor[];

  constructor(interceptors: Interceptor[] = [], readonly config: InterceptorConfig = DEFAULT_INTERCEPTOR_CONFIG) {
    if (interceptors.length > config.maxInterceptorDepth) {
      throw new InterceptorError(
        'chain',
        `Interceptor chain too deep: ${interceptors.length} interceptors, limit ${config.maxInterceptorDepth}`,
      );
    }
    // Array.prototype.sort is stable, so equal orders keep registration order
    this.ordered = [...interceptors].sort((a, b) => a.order - b.order);
  }

  static empty(): InterceptorChain {
    return new InterceptorChain();
  }

  get interceptors(): readonly Interceptor[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * New chain with one more interceptor; this one is left unchanged
   */
  with(interceptor: Interceptor): InterceptorChain {
    return new InterceptorChain([...this.ordered, interceptor], this.config);
  }

  find(name: string): Interceptor | undefined {
    return this.ordered.find(interceptor => interceptor.name === name);
  }

  /**
   * Run before-hooks in ascending order; a hook that throws aborts with InterceptorError
   */
  runBefore(context: ExecuteContext): void {
    for (const interceptor of this.ordered) {
      if (!this.isEligible(interceptor, context)) {
        continue;
      }
      this.invoke(interceptor, 'before', context, () => interceptor.before(context));
      context.executedInterceptors.push(interceptor.name);
      if (context.stopPropagation) {
        this.trace(`${interceptor.name} stopped propagation`);
        break;
      }
    }
  }

  /**
   * Run after-hooks in reverse over the interceptors whose before-hook ran
   */
  runAfter(context: ExecuteContext, result: ExecuteResult): ExecuteResult {
    let current = result;
    for (const interceptor of this.executed(context)) {
      const replaced = this.invoke(interceptor, 'after', context, () => interceptor.after(context, current));
      if (replaced) {
        current = replaced;
      }
    }
    return current;
  }

  /**
   * Notify executed interceptors of a failure; a throwing hook is logged and does not mask the original error
   */
  runOnError(context: ExecuteContext, error: MapperError): void {
    for (const interceptor of this.executed(context)) {
      try {
        this.invoke(interceptor, 'onError', context, () => interceptor.onError(context, error));
      } catch (hookError) {
        this.logger.error(`onError hook failed: ${errorMessage(hookError)}`);
      }
    }
  }

  private executed(context: ExecuteContext): Interceptor[] {
    const names = new Set(context.executedInterceptors);
    return this.ordered.filter(interceptor => names.has(interceptor.name)).reverse();
  }

  private isEligible(interceptor: Interceptor, context: ExecuteContext): boolean {
    const table = context.table;
    if (table?.ignores(interceptor.name)) {
      return false;
    }
    if (!interceptor.supportsOperation(context.operation)) {
      return false;
    }
    if (table && interceptor.willIgnoreTable(table.name)) {
      return false;
    }
    const key = interceptor.type === InterceptorType.Custom ? interceptor.name : interceptor.type;
    return !context.skipNext.has(key) && !context.skipNext.has(interceptor.name);
  }

  private invoke<T>(interceptor: Interceptor, phase: Phase, context: ExecuteContext, hook: () => T): T {
    this.trace(`-> ${interceptor.name}.${phase}`);
    const started = performance.now();
    let outcome: T;
    try {
      outcome = hook();
    } catch (error) {
      if (error instanceof InterceptorError) {
        throw error;
      }
      throw new InterceptorError(interceptor.name, errorMessage(error), {
        sql: context.finalSql,
        operation: context.operation,
        cause: error,
      });
    }
    const elapsed = performance.now() - started;
    if (elapsed > this.config.timeoutMs) {
      this.logger.warn(`Interceptor '${interceptor.name}' ${phase} took ${elapsed.toFixed(1)}ms (limit ${this.config.timeoutMs}ms)`);
    }
    this.trace(`<- ${interceptor.name}.${phase} (${elapsed.toFixed(3)}ms)`);
    return outcome;
  }

  private trace(message: string): void {
    if (this.config.enableTracing) {
      this.logger.verbose(message);
    }
  }
}
