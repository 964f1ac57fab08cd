import { Logger } from '../utils/logger';
import { TelemetryService } from './telemetryInterface';
import { TelemetryStub } from './telemetryStub';

/**
 * Base class for services that take a logger and an optional telemetry service.
 * The logger is scoped to the service name; missing telemetry falls back to the stub.
 */
export abstract class BaseService {
  protected readonly logger: Logger;
  protected readonly telemetry: TelemetryService;

  constructor(scope: string, logger?: Logger, telemetry?: TelemetryService) {
    this.logger = (logger ?? new Logger()).child(scope);
    this.telemetry = telemetry ?? new TelemetryStub();
  }
}
