import {
	type TrelloBoard,
	type TrelloCard,
	type TrelloWebhook,
	trelloBoardSchema,
	trelloCardSchema,
	trelloWebhookSchema,
} from "@boardsync/contracts";
import {
	NonRetryableServiceError,
	RetryableServiceError,
	type TelemetryService,
} from "@boardsync/service-base";
import { z } from "zod";
import type { TrelloConfig } from "./trello.config.js";

export const TRELLO_CLIENT = "TRELLO_CLIENT";

/**
 * Read side used by the event processor
 */
export interface CardSource {
	fetchCard(cardId: string): Promise<TrelloCard>;
}

export function trelloApiError(
	status: number,
	method: string,
	path: string,
	detail: string,
): RetryableServiceError | NonRetryableServiceError {
	const message = `Trello API ${method} ${path} failed with ${status}: ${detail}`;
	const code = `TRELLO_${status}`;
	return status === 429 || status >= 500
		? new RetryableServiceError(message, code)
		: new NonRetryableServiceError(message, code);
}

type QueryValue = string | boolean | number;

/**
 * Trello REST client (key/token query auth).
 * Card reads serve the processor; webhook calls serve the operator CLI.
 */
export class TrelloClient implements CardSource {
	constructor(
		private readonly config: TrelloConfig,
		private readonly telemetry: TelemetryService,
	) {}

	async fetchCard(cardId: string): Promise<TrelloCard> {
		return this.request(
			"GET",
			`/cards/${encodeURIComponent(cardId)}`,
			trelloCardSchema,
			{ fields: "all", attachments: true, actions: "commentCard" },
		);
	}

	async getBoard(boardId: string): Promise<TrelloBoard> {
		return this.request(
			"GET",
			`/boards/${encodeURIComponent(boardId)}`,
			trelloBoardSchema,
		);
	}

	async listBoards(): Promise<TrelloBoard[]> {
		return this.request("GET", "/members/me/boards", z.array(trelloBoardSchema), {
			fields: "name,closed,url",
		});
	}

	async registerWebhook(
		modelId: string,
		callbackUrl: string,
		description = "boardsync card sync",
	): Promise<TrelloWebhook> {
		return this.request("POST", "/webhooks", trelloWebhookSchema, {
			idModel: modelId,
			callbackURL: callbackUrl,
			description,
			active: true,
		});
	}

	async listWebhooks(): Promise<TrelloWebhook[]> {
		return this.request(
			"GET",
			`/tokens/${encodeURIComponent(this.config.token)}/webhooks`,
			z.array(trelloWebhookSchema),
		);
	}

	async deleteWebhook(webhookId: string): Promise<void> {
		await this.request(
			"DELETE",
			`/webhooks/${encodeURIComponent(webhookId)}`,
			z.unknown(),
		);
	}

	private async request<T>(
		method: "GET" | "POST" | "DELETE",
		path: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		query: Record<string, QueryValue> = {},
	): Promise<T> {
		const url = new URL(`${this.config.baseUrl}${path}`);
		for (const [key, value] of Object.entries(query)) {
			url.searchParams.set(key, String(value));
		}
		url.searchParams.set("key", this.config.apiKey);
		url.searchParams.set("token", this.config.token);

		// Token-bearing paths must not reach error messages
		const displayPath = path.replace(
			encodeURIComponent(this.config.token),
			"<token>",
		);
		const startTime = Date.now();
		const endpoint = path.split("/")[1] ?? "root";
		let response: Response;
		try {
			response = await fetch(url, {
				method,
				headers: { Accept: "application/json" },
				signal: AbortSignal.timeout(this.config.timeoutMs),
			});
		} catch (error) {
			this.telemetry.increment("trello.requests", 1, {
				endpoint,
				status: "network_error",
			});
			throw new RetryableServiceError(
				`Trello API ${method} ${displayPath} failed: ${error instanceof Error ? error.message : String(error)}`,
				"TRELLO_NETWORK",
			);
		}

		this.telemetry.timing("trello.latency_ms", Date.now() - startTime, {
			endpoint,
		});
		this.telemetry.increment("trello.requests", 1, {
			endpoint,
			status: String(response.status),
		});

		if (!response.ok) {
			const detail = (await response.text().catch(() => "")).slice(0, 200);
			throw trelloApiError(
				response.status,
				method,
				displayPath,
				detail || response.statusText,
			);
		}

		const body: unknown = await response.json();
		return schema.parse(body);
	}
}
