// Config
export {
	ServiceConfigModule,
	SERVICE_CONFIG,
	loadServiceConfig,
} from "./config/config.module.js";
export type {
	ServiceConfig,
	ServiceConfigOptions,
} from "./config/config.module.js";
export {
	ConfigError,
	MissingEnvVarError,
	ValidationError,
	requireEnv,
	intFromEnv,
	boolFromEnv,
} from "./config/errors.js";

// Telemetry
export { TelemetryModule } from "./telemetry/telemetry.module.js";
export { TelemetryService } from "./telemetry/telemetry.service.js";
export { LoggerService, LOGGER, redactObject } from "./telemetry/logger.service.js";
export type {
	LogContext,
	TieredLogContext,
} from "./telemetry/logger.service.js";
export { EventLogger, EVENT_LOGGER } from "./telemetry/events.js";
export type { DrainCounts } from "./telemetry/events.js";
export {
	LogTier,
	type LoggingConfig,
	shouldForwardLog,
	parseLogTiers,
	PRODUCTION_LOGGING_CONFIG,
	LOCAL_LOGGING_CONFIG,
} from "./telemetry/log-tier.js";
export type {
	BoardsyncEvent,
	BaseEvent,
	ServiceTags,
	EventName,
} from "./telemetry/events.types.js";

// Health
export { HealthModule } from "./health/health.module.js";
export { HealthController } from "./health/health.controller.js";
export {
	HealthService,
	HEALTH_SERVICE,
	HEALTH_CHECKS,
} from "./health/health.service.js";
export type { HealthCheck, HealthResponse } from "./health/health.service.js";

// Lifecycle
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
export { LifecycleService } from "./lifecycle/lifecycle.service.js";
export type { ShutdownSignal } from "./lifecycle/lifecycle.service.js";

// Errors
export {
	ServiceError,
	RetryableServiceError,
	NonRetryableServiceError,
	classifyError,
	isBufferingRestriction,
	errorMessage,
} from "./errors/error-classifier.js";
export type { ErrorClassification } from "./errors/error-classifier.js";
