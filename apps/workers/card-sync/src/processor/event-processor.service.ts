import type { TrelloAction, TrelloCard } from "@boardsync/contracts";
import {
	type EventLogger,
	type LoggerService,
	type TelemetryService,
	classifyError,
	errorMessage,
} from "@boardsync/service-base";
import type { CardExtraction, CardExtractor } from "../extraction/extraction.service.js";
import type { Clock } from "../store/clock.js";
import type { StateStore } from "../store/state-store.service.js";
import type { CardSource } from "../trello/trello.client.js";
import { classifyChange } from "./change-classifier.js";
import {
	buildCardRecord,
	buildCurrentCard,
	buildEventRow,
	carryForwardCard,
	hasDescriptionEdit,
	resolveLocation,
	toLineItemRows,
} from "./card-rows.js";

export const EVENT_PROCESSOR = "EVENT_PROCESSOR";

export type PublishResult = "accepted" | "duplicate";

interface ProcessOutcome {
	extractionTriggered: boolean;
	eventType: string | null;
}

const SKIPPED: ProcessOutcome = { extractionTriggered: false, eventType: null };

/**
 * Webhook action → event log, card tables and line items.
 *
 * publish() records the event and returns; the card work runs detached so
 * the webhook is acknowledged without waiting for the model.
 */
export class EventProcessor {
	private readonly inFlight = new Set<Promise<void>>();

	constructor(
		private readonly store: StateStore,
		private readonly cards: CardSource,
		private readonly extractor: CardExtractor,
		private readonly clock: Clock,
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly eventLogger: EventLogger,
	) {}

	get inFlightCount(): number {
		return this.inFlight.size;
	}

	/**
	 * Storage errors before the detached task starts propagate, so the
	 * delivery fails and Trello sends it again.
	 */
	async publish(action: TrelloAction): Promise<PublishResult> {
		const tags = { action_type: action.type };

		if (await this.store.eventExists(action.id)) {
			this.telemetry.increment("events.duplicate", 1, tags);
			this.eventLogger.webhookDuplicate(action.id, action.type);
			return "duplicate";
		}

		await this.store.insertEvent(buildEventRow(action, this.nowIso()));
		this.telemetry.increment("events.accepted", 1, tags);
		this.eventLogger.webhookAccepted(action.id, action.type, action.data.card?.id);

		this.dispatch(action);
		return "accepted";
	}

	/** Resolves once every detached task has settled */
	async whenIdle(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	private dispatch(action: TrelloAction): void {
		const task: Promise<void> = this.process(action)
			.catch((error: unknown) => {
				this.logger.error("Detached processing task failed", undefined, {
					action_id: action.id,
					error: errorMessage(error),
				});
			})
			.finally(() => {
				this.inFlight.delete(task);
			});
		this.inFlight.add(task);
	}

	private async process(action: TrelloAction): Promise<void> {
		const startTime = Date.now();
		const cardId = action.data.card?.id;

		let outcome: ProcessOutcome;
		try {
			outcome = await this.telemetry.withSpan(
				"card_sync.process_event",
				{ action_type: action.type },
				() => this.route(action),
			);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			const classification = classifyError(failure);
			const durationMs = Date.now() - startTime;

			this.logger.critical("Event processing failed", {
				action_id: action.id,
				card_id: cardId,
				error_code: classification,
				error: failure.message,
				duration_ms: durationMs,
			});
			this.telemetry.increment("events.failed", 1, {
				action_type: action.type,
				classification,
			});
			this.eventLogger.eventFailed(
				action.id,
				action.type,
				classification,
				failure.message,
				durationMs,
				cardId,
			);
			await this.store.markEventProcessed(action.id, {
				extraction_triggered: false,
				error_message: failure.message,
			});
			return;
		}

		await this.store.markEventProcessed(action.id, {
			extraction_triggered: outcome.extractionTriggered,
			error_message: null,
		});

		const durationMs = Date.now() - startTime;
		this.telemetry.increment("events.processed", 1, { action_type: action.type });
		this.telemetry.timing("events.processing_ms", durationMs, {
			action_type: action.type,
		});
		this.eventLogger.eventProcessed(action.id, action.type, durationMs, {
			cardId,
			eventType: outcome.eventType ?? undefined,
			extractionTriggered: outcome.extractionTriggered,
		});
	}

	private route(action: TrelloAction): Promise<ProcessOutcome> {
		const cardId = action.data.card?.id;
		if (!cardId) {
			this.logger.debug("Action has no card, nothing to sync", {
				action_id: action.id,
			});
			return Promise.resolve(SKIPPED);
		}

		switch (action.type) {
			case "createCard":
				return this.handleCreate(action, cardId);
			case "updateCard":
				return this.handleUpdate(action, cardId);
			case "deleteCard":
				return this.handleDelete(action, cardId);
			default:
				this.logger.debug("Action type not synced", {
					action_id: action.id,
					action_type: action.type,
				});
				return Promise.resolve(SKIPPED);
		}
	}

	private async handleCreate(
		action: TrelloAction,
		cardId: string,
	): Promise<ProcessOutcome> {
		if (await this.store.cardExistsInMaster(cardId)) {
			this.logger.info("Card already in master, skipping create", {
				action_id: action.id,
				card_id: cardId,
			});
			return { extractionTriggered: false, eventType: "createCard" };
		}

		const card = await this.cards.fetchCard(cardId);
		const extraction = await this.extract(action, card);
		const now = this.nowIso();
		const record = buildCardRecord(card, extraction);

		await this.store.insertCardMaster({
			...record,
			first_extracted_at: now,
			first_extraction_event_id: action.id,
		});
		await this.store.upsertCardCurrent(
			buildCurrentCard(record, resolveLocation(action, card, null), {
				updatedAt: now,
				extractedAt: now,
				extractionEventId: action.id,
				eventType: "createCard",
			}),
		);

		const lineItems = toLineItemRows(card.id, extraction.line_items);
		if (lineItems.length > 0) {
			await this.store.insertLineItemsMaster(lineItems);
			await this.store.upsertLineItemsCurrent(card.id, lineItems);
		}

		return { extractionTriggered: true, eventType: "createCard" };
	}

	private async handleUpdate(
		action: TrelloAction,
		cardId: string,
	): Promise<ProcessOutcome> {
		const card = await this.cards.fetchCard(cardId);
		const previous = await this.store.getCurrentCard(cardId);
		const change = classifyChange(previous, card);
		const reextract = change.description_changed || hasDescriptionEdit(action);
		const eventType = `updateCard:${change.event_type}`;

		const attempt = reextract ? await this.extract(action, card) : null;
		// A failed extraction replaces nothing; previously extracted facts stay
		const extraction = attempt && !attempt.error ? attempt : null;
		const record = extraction
			? buildCardRecord(card, extraction)
			: carryForwardCard(card, previous);
		const now = this.nowIso();

		await this.store.upsertCardCurrent(
			buildCurrentCard(record, resolveLocation(action, card, previous), {
				updatedAt: now,
				extractedAt: extraction ? now : (previous?.last_extracted_at ?? null),
				extractionEventId: extraction
					? action.id
					: (previous?.last_extraction_event_id ?? null),
				eventType,
			}),
		);

		if (extraction) {
			await this.store.upsertLineItemsCurrent(
				card.id,
				toLineItemRows(card.id, extraction.line_items),
			);
		}

		this.logger.debug("Card updated", {
			action_id: action.id,
			card_id: card.id,
			event_type: eventType,
			extraction_triggered: reextract,
		});
		return { extractionTriggered: reextract, eventType };
	}

	private async handleDelete(
		action: TrelloAction,
		cardId: string,
	): Promise<ProcessOutcome> {
		const previous = await this.store.getCurrentCard(cardId);
		if (!previous) {
			this.logger.warn("Deleted card has no current row", {
				action_id: action.id,
				card_id: cardId,
			});
			return { extractionTriggered: false, eventType: "deleteCard" };
		}

		await this.store.upsertCardCurrent(
			{
				...previous,
				closed: true,
				last_updated_at: this.nowIso(),
				last_event_type: "deleteCard",
			},
		);
		return { extractionTriggered: false, eventType: "deleteCard" };
	}

	private async extract(
		action: TrelloAction,
		card: TrelloCard,
	): Promise<CardExtraction> {
		const extraction = await this.extractor.extract(card);
		if (extraction.error) {
			this.logger.operational("Extraction failed, extracted fields not refreshed", {
				action_id: action.id,
				card_id: card.id,
				error: extraction.error,
			});
		}
		return extraction;
	}

	private nowIso(): string {
		return this.clock.now().toISOString();
	}
}
