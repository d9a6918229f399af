import {
	EVENT_LOGGER,
	type EventLogger,
	LOGGER,
	LifecycleService,
	type LoggerService,
	TelemetryService,
} from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { ExtractionModule } from "../extraction/extraction.module.js";
import {
	type CardExtractor,
	EXTRACTION_SERVICE,
} from "../extraction/extraction.service.js";
import { CLOCK, type Clock } from "../store/clock.js";
import { STATE_STORE, type StateStore } from "../store/state-store.service.js";
import { StoreModule } from "../store/store.module.js";
import { type CardSource, TRELLO_CLIENT } from "../trello/trello.client.js";
import { TrelloModule } from "../trello/trello.module.js";
import { EVENT_PROCESSOR, EventProcessor } from "./event-processor.service.js";

@Module({
	imports: [StoreModule, TrelloModule, ExtractionModule],
	providers: [
		{
			provide: EVENT_PROCESSOR,
			useFactory: (
				store: StateStore,
				cards: CardSource,
				extractor: CardExtractor,
				clock: Clock,
				logger: LoggerService,
				telemetry: TelemetryService,
				eventLogger: EventLogger,
				lifecycle: LifecycleService,
			) => {
				const processor = new EventProcessor(
					store,
					cards,
					extractor,
					clock,
					logger,
					telemetry,
					eventLogger,
				);
				lifecycle.registerInFlightSource(() => processor.inFlightCount);
				lifecycle.onShutdown(() => processor.whenIdle());
				return processor;
			},
			inject: [
				STATE_STORE,
				TRELLO_CLIENT,
				EXTRACTION_SERVICE,
				CLOCK,
				LOGGER,
				TelemetryService,
				EVENT_LOGGER,
				LifecycleService,
			],
		},
	],
	exports: [EVENT_PROCESSOR],
})
export class ProcessorModule {}
