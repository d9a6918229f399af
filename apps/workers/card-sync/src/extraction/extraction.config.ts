import { Injectable } from "@nestjs/common";
import {
	MissingEnvVarError,
	boolFromEnv,
	intFromEnv,
} from "@boardsync/service-base";

export const EXTRACTION_CONFIG = "EXTRACTION_CONFIG";

export type ExtractionProviderName = "anthropic" | "local-stub";

/**
 * Extraction configuration loaded from environment variables
 */
@Injectable()
export class ExtractionConfig {
	/** anthropic when an API key is present, else local-stub */
	readonly provider: ExtractionProviderName;

	readonly apiKey: string | null;

	readonly model: string;

	/** Output budget for the line-item call */
	readonly maxTokens: number;

	readonly enrich: boolean;

	readonly enrichMaxTokens: number;

	readonly timeoutMs: number;

	/** SDK-level retries for 429/5xx */
	readonly maxRetries: number;

	/** Description characters sent to the model */
	readonly descriptionMaxChars: number;

	/** Per-item description characters in the enrichment prompt */
	readonly enrichDescriptionMaxChars: number;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.apiKey = env["ANTHROPIC_API_KEY"]?.trim() || null;

		const requested = env["EXTRACTION_PROVIDER"]?.trim();
		if (requested === "anthropic" || requested === "local-stub") {
			this.provider = requested;
		} else {
			this.provider = this.apiKey ? "anthropic" : "local-stub";
		}
		if (this.provider === "anthropic" && !this.apiKey) {
			throw new MissingEnvVarError(
				"ANTHROPIC_API_KEY",
				"required when EXTRACTION_PROVIDER=anthropic",
			);
		}

		this.model = env["EXTRACTION_MODEL"] ?? "claude-3-5-haiku-20241022";
		this.maxTokens = intFromEnv(env, "EXTRACTION_MAX_TOKENS", 2048);
		this.enrich = boolFromEnv(env, "EXTRACTION_ENRICH", false);
		this.enrichMaxTokens = intFromEnv(env, "EXTRACTION_ENRICH_MAX_TOKENS", 1024);
		this.timeoutMs = intFromEnv(env, "EXTRACTION_TIMEOUT_MS", 60000);
		this.maxRetries = intFromEnv(env, "EXTRACTION_MAX_RETRIES", 2);
		this.descriptionMaxChars = intFromEnv(
			env,
			"EXTRACTION_DESCRIPTION_MAX_CHARS",
			2000,
		);
		this.enrichDescriptionMaxChars = intFromEnv(
			env,
			"EXTRACTION_ENRICH_DESCRIPTION_MAX_CHARS",
			200,
		);
	}
}
