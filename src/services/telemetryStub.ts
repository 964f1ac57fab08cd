/* eslint-disable @typescript-eslint/no-unused-vars */

import { Attributes, Span, TelemetryService } from './telemetryInterface';

/**
 * No-op TelemetryService used when telemetry is disabled or no service is injected.
 */
export class TelemetryStub implements TelemetryService {
  isEnabled(): boolean {
    return false;
  }

  startSpan(_name: string, _attributes?: Attributes): Span | undefined {
    return undefined;
  }

  incrementCounter(_name: string, _value: number = 1, _attributes?: Attributes): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _attributes?: Attributes): void {
    // No-op
  }

  setGauge(_name: string, _value: number, _attributes?: Attributes): void {
    // No-op
  }
}
