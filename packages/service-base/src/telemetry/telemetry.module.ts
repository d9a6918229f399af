import { Global, Module } from "@nestjs/common";
import {
	SERVICE_CONFIG,
	type ServiceConfig,
} from "../config/config.module.js";
import { EVENT_LOGGER } from "./events.js";
import { LOGGER, LoggerService } from "./logger.service.js";
import { TelemetryService } from "./telemetry.service.js";

@Global()
@Module({
	providers: [
		{
			provide: TelemetryService,
			useFactory: (config: ServiceConfig) => {
				const service = new TelemetryService();
				service.initialize(config);
				return service;
			},
			inject: [SERVICE_CONFIG],
		},
		{
			provide: LOGGER,
			useFactory: (config: ServiceConfig) => new LoggerService(config),
			inject: [SERVICE_CONFIG],
		},
		{
			provide: EVENT_LOGGER,
			useFactory: (logger: LoggerService) => logger.createEventLogger(),
			inject: [LOGGER],
		},
	],
	exports: [TelemetryService, LOGGER, EVENT_LOGGER],
})
export class TelemetryModule {}
