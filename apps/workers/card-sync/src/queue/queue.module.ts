import { LOGGER, type LoggerService } from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { STATE_STORE, type StateStore } from "../store/state-store.service.js";
import { STORE_CONFIG, type StoreConfig } from "../store/store.config.js";
import { StoreModule } from "../store/store.module.js";
import { QueueDrainController } from "./queue-drain.controller.js";
import { QUEUE_DRAIN, QueueDrainService } from "./queue-drain.service.js";

@Module({
	imports: [StoreModule],
	controllers: [QueueDrainController],
	providers: [
		{
			provide: QUEUE_DRAIN,
			useFactory: (store: StateStore, config: StoreConfig, logger: LoggerService) =>
				new QueueDrainService(store, config, logger),
			inject: [STATE_STORE, STORE_CONFIG, LOGGER],
		},
	],
})
export class QueueModule {}
