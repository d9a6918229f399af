import type { DrainCounts } from "@boardsync/service-base";
import {
	BadRequestException,
	Controller,
	HttpCode,
	HttpStatus,
	Inject,
	Post,
	Query,
} from "@nestjs/common";
import { z } from "zod";
import { QUEUE_DRAIN, type QueueDrainService } from "./queue-drain.service.js";

export const MAX_ITEMS_LIMIT = 500;

const maxItemsSchema = z.coerce.number().int().min(1).max(MAX_ITEMS_LIMIT);

export function parseMaxItems(raw: string | undefined): number | undefined {
	if (raw === undefined) {
		return undefined;
	}
	const parsed = maxItemsSchema.safeParse(raw);
	if (!parsed.success) {
		throw new BadRequestException(
			`max_items must be an integer between 1 and ${MAX_ITEMS_LIMIT}`,
		);
	}
	return parsed.data;
}

@Controller("trello/queue")
export class QueueDrainController {
	constructor(@Inject(QUEUE_DRAIN) private readonly queue: QueueDrainService) {}

	/**
	 * Re-issue deferred writes that are due. Meant for a scheduler hitting
	 * it every few minutes. A request arriving mid-drain gets that drain's
	 * counts; its own max_items is not applied.
	 */
	@Post("process")
	@HttpCode(HttpStatus.OK)
	process(@Query("max_items") maxItems?: string): Promise<DrainCounts> {
		return this.queue.drain(parseMaxItems(maxItems));
	}
}
