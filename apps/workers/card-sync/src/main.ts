import "reflect-metadata";
import {
	EVENT_LOGGER,
	type EventLogger,
	LOGGER,
	type LoggerService,
	SERVICE_CONFIG,
	type ServiceConfig,
} from "@boardsync/service-base";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { AppModule } from "./app.module.js";
import { EXTRACTION_CONFIG, type ExtractionConfig } from "./extraction/extraction.config.js";
import { STORE_CONFIG, type StoreConfig } from "./store/store.config.js";

async function bootstrap() {
	const app = await NestFactory.create<NestExpressApplication>(AppModule, {
		bufferLogs: true,
		bodyParser: false,
	});

	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);
	app.enableShutdownHooks();

	// Webhook bodies are parsed in the controller so bad JSON becomes a 400
	app.useBodyParser("text", { type: "*/*", limit: "1mb" });

	const config = app.get<ServiceConfig>(SERVICE_CONFIG);
	const extraction = app.get<ExtractionConfig>(EXTRACTION_CONFIG);
	const store = app.get<StoreConfig>(STORE_CONFIG);

	await app.listen(config.port);

	app.get<EventLogger>(EVENT_LOGGER).serviceStarted(config.port, {
		extraction_provider: extraction.provider,
		extraction_model: extraction.model,
		enrichment: extraction.enrich,
		queue_drain_interval_ms: String(store.drainIntervalMs),
	});
}

bootstrap().catch((err) => {
	console.error("Failed to start card-sync service:", err);
	process.exit(1);
});
