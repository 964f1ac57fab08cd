import {
  trace,
  metrics,
  SpanStatusCode,
  Counter,
  Histogram,
  Meter,
  ObservableResult,
  Tracer,
} from '@opentelemetry/api';
import { Logger } from '../utils/logger';
import { Attributes, Span, TelemetryConfig, TelemetryService } from './telemetryInterface';

/**
 * TelemetryService backed by the global OpenTelemetry API.
 *
 * Spans and instruments are no-ops until the host process registers an SDK
 * (tracer/meter provider); the loader itself never starts exporters.
 */
export class OpenTelemetryService implements TelemetryService {
  private readonly logger: Logger;
  private readonly config: TelemetryConfig;
  private readonly tracer?: Tracer;
  private readonly meter?: Meter;

  private counters = new Map<string, Counter>();
  private histograms = new Map<string, Histogram>();
  // Last value per gauge and attribute set, reported on collection
  private gaugeValues = new Map<string, Map<string, { value: number; attributes?: Attributes }>>();

  constructor(config: TelemetryConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;

    if (!config.enabled) {
      return;
    }

    if (config.tracing?.enabled !== false) {
      this.tracer = trace.getTracer(config.serviceName, config.serviceVersion);
    }

    if (config.metrics?.enabled !== false) {
      this.meter = metrics.getMeter(config.serviceName, config.serviceVersion);
    }

    this.logger.debug(
      `OpenTelemetry API bound (tracing: ${this.tracer !== undefined}, metrics: ${this.meter !== undefined})`
    );
  }

  public isEnabled(): boolean {
    return this.config.enabled;
  }

  public startSpan(name: string, attributes?: Attributes): Span | undefined {
    if (!this.tracer) {
      return undefined;
    }

    const span = this.tracer.startSpan(name, { attributes });

    return {
      setAttributes: (attrs: Attributes): void => {
        span.setAttributes(attrs);
      },
      setStatus: (status: { code: number; message?: string }): void => {
        span.setStatus({ code: toStatusCode(status.code), message: status.message });
      },
      recordException: (exception: Error): void => {
        span.recordException(exception);
      },
      end: (): void => {
        span.end();
      },
    };
  }

  public incrementCounter(name: string, value: number = 1, attributes?: Attributes): void {
    if (!this.meter) return;

    let counter = this.counters.get(name);
    if (!counter) {
      counter = this.meter.createCounter(name);
      this.counters.set(name, counter);
    }
    counter.add(value, attributes);
  }

  public recordHistogram(name: string, value: number, attributes?: Attributes): void {
    if (!this.meter) return;

    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = this.meter.createHistogram(name);
      this.histograms.set(name, histogram);
    }
    histogram.record(value, attributes);
  }

  public setGauge(name: string, value: number, attributes?: Attributes): void {
    if (!this.meter) return;

    let values = this.gaugeValues.get(name);
    if (!values) {
      const created = new Map<string, { value: number; attributes?: Attributes }>();
      this.gaugeValues.set(name, created);
      values = created;

      const gauge = this.meter.createObservableGauge(name);
      gauge.addCallback((result: ObservableResult) => {
        for (const entry of created.values()) {
          result.observe(entry.value, entry.attributes);
        }
      });
    }
    values.set(JSON.stringify(attributes ?? {}), { value, attributes });
  }
}

function toStatusCode(code: number): SpanStatusCode {
  switch (code) {
    case 1:
      return SpanStatusCode.OK;
    case 2:
      return SpanStatusCode.ERROR;
    default:
      return SpanStatusCode.UNSET;
  }
}
