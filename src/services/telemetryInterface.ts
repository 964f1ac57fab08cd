export type Attributes = Record<string, string | number | boolean>;

export interface TelemetryConfig {
  enabled: boolean;
  serviceName: string;
  serviceVersion: string;
  tracing?: {
    enabled: boolean;
  };
  metrics?: {
    enabled: boolean;
  };
}

export interface Span {
  setAttributes(attributes: Attributes): void;
  /** code: 0 unset, 1 ok, 2 error */
  setStatus(status: { code: number; message?: string }): void;
  recordException(exception: Error): void;
  end(): void;
}

export interface TelemetryService {
  isEnabled(): boolean;

  startSpan(name: string, attributes?: Attributes): Span | undefined;

  incrementCounter(name: string, value?: number, attributes?: Attributes): void;
  recordHistogram(name: string, value: number, attributes?: Attributes): void;
  setGauge(name: string, value: number, attributes?: Attributes): void;
}
