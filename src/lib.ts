// Public API
export * from './loader';
export * from './vault';
export { Logger, type LogLevel } from './utils/logger';
export type { TelemetryService, TelemetryConfig, Span } from './services/telemetryInterface';
export { OpenTelemetryService } from './services/telemetry';
export { TelemetryStub } from './services/telemetryStub';
export { createTelemetryService } from './services/telemetryFactory';
export { ConfigLoader } from './config/configLoader';
export { SecretLoaderApp, type SecretLoaderAppOptions } from './app';
export type { AppConfig, AuthMethod, AuthSectionConfig, CliOptions, LoaderSectionConfig, SecretConfig } from './types/config';
