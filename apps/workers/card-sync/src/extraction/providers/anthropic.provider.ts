import type Anthropic from "@anthropic-ai/sdk";
import type { TelemetryService } from "@boardsync/service-base";
import type {
	CompletionProvider,
	CompletionRequest,
} from "./completion-provider.interface.js";

/**
 * Claude via the Messages API. Low temperature: the output is parsed as JSON.
 */
export class AnthropicCompletionProvider implements CompletionProvider {
	readonly name = "anthropic";

	constructor(
		private readonly client: Anthropic,
		readonly model: string,
		private readonly telemetry: TelemetryService,
	) {}

	async complete(request: CompletionRequest): Promise<string> {
		const startTime = Date.now();
		const tags = { provider: this.name, model: this.model };

		try {
			const response = await this.client.messages.create({
				model: this.model,
				max_tokens: request.maxTokens,
				temperature: 0.1,
				system: request.system,
				messages: [{ role: "user", content: request.prompt }],
			});

			this.telemetry.timing("llm.latency_ms", Date.now() - startTime, tags);
			this.telemetry.increment("llm.requests", 1, { ...tags, success: "true" });
			this.telemetry.increment("llm.tokens", response.usage.input_tokens, {
				...tags,
				direction: "input",
			});
			this.telemetry.increment("llm.tokens", response.usage.output_tokens, {
				...tags,
				direction: "output",
			});

			return response.content
				.map((block) => (block.type === "text" ? block.text : ""))
				.join("");
		} catch (error) {
			this.telemetry.increment("llm.requests", 1, { ...tags, success: "false" });
			throw error;
		}
	}
}
