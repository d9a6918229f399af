import {
	HealthModule,
	LifecycleModule,
	ServiceConfigModule,
	TelemetryModule,
} from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { BigQueryModule } from "./db/bigquery.module.js";
import { QueueModule } from "./queue/queue.module.js";
import { WebhookModule } from "./webhook/webhook.module.js";

@Module({
	imports: [
		// Shared infrastructure from service-base
		ServiceConfigModule.forRoot(),
		TelemetryModule,
		LifecycleModule,
		BigQueryModule.forRoot(),
		HealthModule,

		// Card sync
		WebhookModule,
		QueueModule,
	],
})
export class AppModule {}
