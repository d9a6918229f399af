import { Module } from "@nestjs/common";
import { EVENT_LOGGER, type EventLogger } from "../telemetry/events.js";
import { HealthController } from "./health.controller.js";
import {
	HEALTH_CHECKS,
	HEALTH_SERVICE,
	type HealthCheck,
	HealthService,
} from "./health.service.js";

@Module({
	controllers: [HealthController],
	providers: [
		{
			provide: HEALTH_SERVICE,
			useFactory: (eventLogger: EventLogger, checks?: HealthCheck[]) =>
				new HealthService(checks ?? [], eventLogger),
			inject: [EVENT_LOGGER, { token: HEALTH_CHECKS, optional: true }],
		},
	],
	exports: [HEALTH_SERVICE],
})
export class HealthModule {}
