export interface InterceptorConfig {
  maxInterceptorDepth: number;
  /** Hooks slower than this are reported */
  timeoutMs: number;
  enableMetrics: boolean;
  enableTracing: boolean;
}

export const DEFAULT_INTERCEPTOR_CONFIG: InterceptorConfig = {
  maxInterceptorDepth: 10,
  timeoutMs: 5000,
  enableMetrics: true,
  enableTracing: false,
};

export const InterceptorPresets = {
  development(): InterceptorConfig {
    return { maxInterceptorDepth: 20, timeoutMs: 10000, enableMetrics: true, enableTracing: true };
  },

  production(): InterceptorConfig {
    return { maxInterceptorDepth: 10, timeoutMs: 5000, enableMetrics: true, enableTracing: false };
  },

  highSecurity(): InterceptorConfig {
    return { maxInterceptorDepth: 15, timeoutMs: 8000, enableMetrics: true, enableTracing: true };
  },
};
