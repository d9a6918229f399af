import { Injectable } from "@nestjs/common";
import { intFromEnv, requireEnv } from "@boardsync/service-base";

export const TRELLO_CONFIG = "TRELLO_CONFIG";

@Injectable()
export class TrelloConfig {
	readonly apiKey: string;

	readonly token: string;

	readonly baseUrl: string;

	readonly timeoutMs: number;

	/** Public URL Trello posts to, used when registering webhooks */
	readonly callbackUrl: string | null;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.apiKey = requireEnv(env, "TRELLO_API_KEY", "Trello API key");
		this.token = requireEnv(env, "TRELLO_TOKEN", "Trello API token");
		this.baseUrl = (env["TRELLO_API_BASE_URL"] ?? "https://api.trello.com/1").replace(
			/\/+$/,
			"",
		);
		this.timeoutMs = intFromEnv(env, "TRELLO_TIMEOUT_MS", 10000);
		this.callbackUrl = env["TRELLO_WEBHOOK_CALLBACK_URL"]?.trim() || null;
	}
}
