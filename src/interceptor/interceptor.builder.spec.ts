import { OperationType } from '../common/types';
import { BaseInterceptor, InterceptorType } from './interceptor';
import { InterceptorBuilder } from './interceptor.builder';
import { InterceptorPresets } from './interceptor.config';
import { LoggingInterceptor } from './logging.interceptor';

class AuditInterceptor extends BaseInterceptor {
  readonly name = 'audit';
  readonly type = InterceptorType.Audit;
  readonly order = 40;
}

describe('InterceptorBuilder', () => {
  it('should enable logging by default', () => {
    const chain = new InterceptorBuilder().build();

    expect(chain.size).toBe(1);
    expect(chain.find(LoggingInterceptor.NAME)).toBeInstanceOf(LoggingInterceptor);
  });

  it('should build an empty chain without logging', () => {
    expect(new InterceptorBuilder(false).build().size).toBe(0);
    expect(new InterceptorBuilder().disable('logging').build().size).toBe(0);
  });

  it('should include interceptors registered disabled once enabled', () => {
    const builder = new InterceptorBuilder(false).register(new AuditInterceptor(), false);

    expect(builder.build().size).toBe(0);
    expect(builder.enable('audit').build().find('audit')?.type).toBe(InterceptorType.Audit);
  });

  it('should apply order overrides when sorting', () => {
    const chain = new InterceptorBuilder()
      .register(new AuditInterceptor())
      .withOrder('logging', 5)
      .build();

    expect(chain.interceptors.map(interceptor => [interceptor.name, interceptor.order])).toEqual([
      ['logging', 5],
      ['audit', 40],
    ]);
  });

  it('should layer table and operation restrictions over the interceptor', () => {
    const audit = new InterceptorBuilder(false)
      .register(new AuditInterceptor())
      .ignoreTable('audit', 'sessions')
      .withOperations('audit', [OperationType.Insert, OperationType.Update])
      .build()
      .find('audit');

    expect(audit?.willIgnoreTable('sessions')).toBe(true);
    expect(audit?.willIgnoreTable('users')).toBe(false);
    expect(audit?.supportsOperation(OperationType.Update)).toBe(true);
    expect(audit?.supportsOperation(OperationType.Select)).toBe(false);
  });

  it('should reject settings for unregistered interceptors', () => {
    expect(() => new InterceptorBuilder().withOrder('cache', 1).build())
      .toThrow("Interceptor error [cache]: Interceptor 'cache' not found");
  });

  it('should carry preset configuration into the chain', () => {
    expect(InterceptorBuilder.development().build().config).toEqual(InterceptorPresets.development());
    expect(InterceptorBuilder.highSecurity().build().config.maxInterceptorDepth).toBe(15);
    expect(new InterceptorBuilder().withConfig({ timeoutMs: 250 }).build().config).toEqual({
      maxInterceptorDepth: 10,
      timeoutMs: 250,
      enableMetrics: true,
      enableTracing: false,
    });
  });
});
