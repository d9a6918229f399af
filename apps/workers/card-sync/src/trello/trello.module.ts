import { TelemetryService } from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { TRELLO_CLIENT, TrelloClient } from "./trello.client.js";
import { TRELLO_CONFIG, TrelloConfig } from "./trello.config.js";

@Module({
	providers: [
		{
			provide: TRELLO_CONFIG,
			useFactory: () => new TrelloConfig(),
		},
		{
			provide: TRELLO_CLIENT,
			useFactory: (config: TrelloConfig, telemetry: TelemetryService) =>
				new TrelloClient(config, telemetry),
			inject: [TRELLO_CONFIG, TelemetryService],
		},
	],
	exports: [TRELLO_CLIENT],
})
export class TrelloModule {}
