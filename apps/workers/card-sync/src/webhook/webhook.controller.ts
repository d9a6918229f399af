import { type TrelloAction, trelloWebhookPayloadSchema } from "@boardsync/contracts";
import {
	BadRequestException,
	Body,
	Controller,
	Get,
	Head,
	HttpCode,
	HttpStatus,
	Inject,
	Post,
} from "@nestjs/common";
import {
	EVENT_PROCESSOR,
	type EventProcessor,
} from "../processor/event-processor.service.js";

export interface WebhookAcceptedResponse {
	status: "accepted";
	action_id: string;
	action_type: string;
	board_id: string | null;
	card_id: string | null;
}

/**
 * Request bodies arrive as raw text; see main.ts
 */
export function parseWebhookBody(body: unknown): TrelloAction {
	let payload: unknown = body;
	if (typeof body === "string") {
		try {
			payload = JSON.parse(body);
		} catch (error) {
			throw new BadRequestException({
				message: "Invalid JSON body",
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	const parsed = trelloWebhookPayloadSchema.safeParse(payload);
	if (!parsed.success) {
		throw new BadRequestException({
			message: "Invalid webhook payload",
			errors: parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
			),
		});
	}
	return parsed.data.action;
}

@Controller("trello")
export class WebhookController {
	constructor(
		@Inject(EVENT_PROCESSOR) private readonly processor: EventProcessor,
	) {}

	/** Trello checks the callback URL with HEAD before creating a webhook */
	@Head("webhook")
	@HttpCode(HttpStatus.OK)
	verifyHead(): void {}

	@Get("webhook")
	@HttpCode(HttpStatus.OK)
	verify(): { status: "ok" } {
		return { status: "ok" };
	}

	/**
	 * Acknowledges once the event is recorded; card processing continues
	 * in the background.
	 */
	@Post("webhook")
	@HttpCode(HttpStatus.OK)
	async receive(@Body() body: unknown): Promise<WebhookAcceptedResponse> {
		const action = parseWebhookBody(body);
		await this.processor.publish(action);

		return {
			status: "accepted",
			action_id: action.id,
			action_type: action.type,
			board_id: action.data.board?.id ?? null,
			card_id: action.data.card?.id ?? null,
		};
	}
}
