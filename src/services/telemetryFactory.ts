import { Logger } from '../utils/logger';
import { TelemetryConfig, TelemetryService } from './telemetryInterface';
import { OpenTelemetryService } from './telemetry';
import { TelemetryStub } from './telemetryStub';

/**
 * Picks the OpenTelemetry-backed service when telemetry is enabled, the stub otherwise.
 */
export function createTelemetryService(config: TelemetryConfig, logger: Logger): TelemetryService {
  if (!config.enabled) {
    logger.debug('Telemetry disabled in configuration, using telemetry stub');
    return new TelemetryStub();
  }

  logger.debug(`Using OpenTelemetry for service ${config.serviceName}@${config.serviceVersion}`);
  return new OpenTelemetryService(config, logger);
}
