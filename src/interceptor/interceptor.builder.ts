import { InterceptorError, type MapperError } from '../common/errors';
import type { OperationType } from '../common/types';
import type { ExecuteContext } from '../execution/execute-context';
import type { ExecuteResult } from '../execution/execute-result';
import { InterceptorChain } from './interceptor-chain';
import { DEFAULT_INTERCEPTOR_CONFIG, InterceptorPresets, type InterceptorConfig } from './interceptor.config';
import type { Interceptor, InterceptorType } from './interceptor';
import { LoggingInterceptor, type LoggingInterceptorOptions } from './logging.interceptor';

interface InterceptorSettings {
  enabled?: boolean;
  order?: number;
  tables: Set<string>;
  operations?: Set<OperationType>;
}

/**
 * Interceptor with builder overrides layered on top
 */
class ConfiguredInterceptor implements Interceptor {
  constructor(private readonly inner: Interceptor, private readonly settings: InterceptorSettings) {}

  get name(): string {
    return this.inner.name;
  }

  get type(): InterceptorType {
    return this.inner.type;
  }

  get order(): number {
    return this.settings.order ?? this.inner.order;
  }

  supportsOperation(operation: OperationType): boolean {
    const allowed = this.settings.operations;
    return (allowed === undefined || allowed.has(operation)) && this.inner.supportsOperation(operation);
  }

  willIgnoreTable(table: string): boolean {
    return this.settings.tables.has(table) || this.inner.willIgnoreTable(table);
  }

  before(context: ExecuteContext): void {
    this.inner.before(context);
  }

  after(context: ExecuteContext, result: ExecuteResult): ExecuteResult | void {
    return this.inner.after(context, result);
  }

  onError(context: ExecuteContext, error: MapperError): void {
    this.inner.onError(context, error);
  }
}

/**
 * Assembles an InterceptorChain; logging is registered and enabled by default
 */
export class InterceptorBuilder {
  private readonly registered = new Map<string, { interceptor: Interceptor; enabled: boolean }>();
  private readonly settings = new Map<string, InterceptorSettings>();
  private config: InterceptorConfig = DEFAULT_INTERCEPTOR_CONFIG;

  constructor(logging: LoggingInterceptorOptions | false = {}) {
    if (logging !== false) {
      this.register(new LoggingInterceptor(logging));
    }
  }

  static development(): InterceptorBuilder {
    return new InterceptorBuilder().withConfig(InterceptorPresets.development());
  }

  static production(): InterceptorBuilder {
    return new InterceptorBuilder().withConfig(InterceptorPresets.production());
  }

  static highSecurity(): InterceptorBuilder {
    return new InterceptorBuilder().withConfig(InterceptorPresets.highSecurity());
  }

  /**
   * Add an interceptor; registering a name twice replaces the earlier one
   */
  register(interceptor: Interceptor, enabled = true): this {
    this.registered.set(interceptor.name, { interceptor, enabled });
    return this;
  }

  enable(name: string): this {
    this.settingsFor(name).enabled = true;
    return this;
  }

  disable(name: string): this {
    this.settingsFor(name).enabled = false;
    return this;
  }

  withOrder(name: string, order: number): this {
    this.settingsFor(name).order = order;
    return this;
  }

  ignoreTable(name: string, table: string): this {
    this.settingsFor(name).tables.add(table);
    return this;
  }

  withOperations(name: string, operations: Iterable<OperationType>): this {
    this.settingsFor(name).operations = new Set(operations);
    return this;
  }

  withConfig(config: Partial<InterceptorConfig>): this {
    this.config = { ...this.config, ...config };
    return this;
  }

  build(): InterceptorChain {
    for (const name of this.settings.keys()) {
      if (!this.registered.has(name)) {
        throw new InterceptorError(name, `Interceptor '${name}' not found`);
      }
    }
    const active: Interceptor[] = [];
    for (const [name, entry] of this.registered) {
      const settings = this.settings.get(name);
      if (!(settings?.enabled ?? entry.enabled)) {
        continue;
      }
      active.push(settings ? new ConfiguredInterceptor(entry.interceptor, settings) : entry.interceptor);
    }
    return new InterceptorChain(active, this.config);
  }

  private settingsFor(name: string): InterceptorSettings {
    let settings = this.settings.get(name);
    if (!settings) {
      settings = { tables: new Set() };
      this.settings.set(name, settings);
    }
    return settings;
  }
}
