import Anthropic from "@anthropic-ai/sdk";
import {
	LOGGER,
	type LoggerService,
	TelemetryService,
} from "@boardsync/service-base";
import { Module } from "@nestjs/common";
import { EXTRACTION_CONFIG, ExtractionConfig } from "./extraction.config.js";
import { EXTRACTION_SERVICE, ExtractionService } from "./extraction.service.js";
import { AnthropicCompletionProvider } from "./providers/anthropic.provider.js";
import {
	COMPLETION_PROVIDER,
	type CompletionProvider,
} from "./providers/completion-provider.interface.js";
import { LocalStubCompletionProvider } from "./providers/local-stub.provider.js";

export function createCompletionProvider(
	config: ExtractionConfig,
	telemetry: TelemetryService,
): CompletionProvider {
	if (config.provider === "anthropic" && config.apiKey) {
		const client = new Anthropic({
			apiKey: config.apiKey,
			timeout: config.timeoutMs,
			maxRetries: config.maxRetries,
		});
		return new AnthropicCompletionProvider(client, config.model, telemetry);
	}
	return new LocalStubCompletionProvider();
}

@Module({
	providers: [
		{
			provide: EXTRACTION_CONFIG,
			useFactory: () => new ExtractionConfig(),
		},
		{
			provide: COMPLETION_PROVIDER,
			useFactory: createCompletionProvider,
			inject: [EXTRACTION_CONFIG, TelemetryService],
		},
		{
			provide: EXTRACTION_SERVICE,
			useFactory: (
				config: ExtractionConfig,
				provider: CompletionProvider,
				logger: LoggerService,
				telemetry: TelemetryService,
			) => new ExtractionService(config, provider, logger, telemetry),
			inject: [EXTRACTION_CONFIG, COMPLETION_PROVIDER, LOGGER, TelemetryService],
		},
	],
	exports: [EXTRACTION_SERVICE, EXTRACTION_CONFIG, COMPLETION_PROVIDER],
})
export class ExtractionModule {}
