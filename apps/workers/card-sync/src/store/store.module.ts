import {
	EVENT_LOGGER,
	type EventLogger,
	LOGGER,
	type LoggerService,
	TelemetryService,
} from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { CARD_REPOSITORY, type CardRepository } from "../db/card.repository.js";
import { CLOCK, type Clock, systemClock } from "./clock.js";
import { STATE_STORE, StateStore } from "./state-store.service.js";
import { STORE_CONFIG, StoreConfig } from "./store.config.js";

@Module({
	providers: [
		{
			provide: STORE_CONFIG,
			useFactory: () => new StoreConfig(),
		},
		{
			provide: CLOCK,
			useValue: systemClock,
		},
		{
			provide: STATE_STORE,
			useFactory: (
				repository: CardRepository,
				config: StoreConfig,
				clock: Clock,
				logger: LoggerService,
				telemetry: TelemetryService,
				eventLogger: EventLogger,
			) =>
				new StateStore(repository, config, clock, logger, telemetry, eventLogger),
			inject: [
				CARD_REPOSITORY,
				STORE_CONFIG,
				CLOCK,
				LOGGER,
				TelemetryService,
				EVENT_LOGGER,
			],
		},
	],
	exports: [STATE_STORE, STORE_CONFIG, CLOCK],
})
export class StoreModule {}
