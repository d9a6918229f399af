import {
	type CurrentCardRow,
	decodePendingOperation,
	type EventOutcome,
	type LineItemRow,
	type MasterCardRow,
	type PendingOperation,
	type PendingOperationRow,
	type QueuedOperation,
	type WebhookEventRow,
} from "@boardsync/contracts";
import {
	type DrainCounts,
	type EventLogger,
	type LoggerService,
	type TelemetryService,
	errorMessage,
	isBufferingRestriction,
} from "@boardsync/service-base";
import { v4 as uuidv4 } from "uuid";
import type { CardRepository } from "../db/card.repository.js";
import {
	type BufferRetryPolicy,
	backoffDelayMs,
	runWithBufferRetry,
} from "./buffer-retry.js";
import type { Clock } from "./clock.js";
import type { StoreConfig } from "./store.config.js";

export const STATE_STORE = "STATE_STORE";

export type WriteResult =
	| { status: "applied" }
	| { status: "deferred"; updateId: string };

export interface WriteOptions {
	/**
	 * Queue the write when in-place retries run out. Replays from the queue
	 * pass false so an exhausted replay throws instead of queueing again.
	 */
	deferOnExhaustion?: boolean;
}

/**
 * Persistence facade over the order tables.
 *
 * Writes that can land on rows still in BigQuery's streaming buffer go
 * through runWithBufferRetry and fall back to the pending queue.
 */
export class StateStore {
	private readonly retryPolicy: BufferRetryPolicy;

	constructor(
		private readonly repository: CardRepository,
		private readonly config: StoreConfig,
		private readonly clock: Clock,
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly eventLogger: EventLogger,
	) {
		this.retryPolicy = {
			maxImmediateRetries: config.maxImmediateRetries,
			initialDelayMs: config.initialRetryDelayMs,
		};
	}

	eventExists(eventId: string): Promise<boolean> {
		return this.repository.eventExists(eventId);
	}

	insertEvent(row: WebhookEventRow): Promise<void> {
		return this.repository.insertEvent(row);
	}

	/**
	 * Record the processing outcome on the event row. Never throws: the
	 * event row is usually still buffered when this runs.
	 */
	async markEventProcessed(eventId: string, outcome: EventOutcome): Promise<void> {
		try {
			await this.repository.updateEventOutcome(eventId, outcome, this.nowIso());
		} catch (error) {
			if (isBufferingRestriction(error)) {
				this.logger.debug("Event outcome not recorded, row still buffered", {
					action_id: eventId,
				});
				return;
			}
			this.logger.warn("Failed to record event outcome", {
				action_id: eventId,
				error: errorMessage(error),
			});
		}
	}

	cardExistsInMaster(cardId: string): Promise<boolean> {
		return this.repository.masterCardExists(cardId);
	}

	/**
	 * Insert the first-extraction row; returns false when the card already has one
	 */
	async insertCardMaster(row: MasterCardRow): Promise<boolean> {
		if (await this.repository.masterCardExists(row.card_id)) {
			this.logger.debug("Master card row already present", {
				card_id: row.card_id,
			});
			return false;
		}
		await this.repository.insertMasterCard(row);
		return true;
	}

	getCurrentCard(cardId: string): Promise<CurrentCardRow | null> {
		return this.repository.findCurrentCard(cardId);
	}

	/**
	 * Single MERGE of the current row; provenance travels in the row itself
	 */
	upsertCardCurrent(
		row: CurrentCardRow,
		options: WriteOptions = {},
	): Promise<WriteResult> {
		return this.guardedWrite(
			{ operation_type: "upsert_card", payload: { card: row } },
			() => this.repository.mergeCurrentCard(row),
			options,
		);
	}

	async insertLineItemsMaster(rows: LineItemRow[]): Promise<void> {
		if (rows.length === 0) return;
		await this.repository.insertMasterLineItems(rows);
	}

	/**
	 * Replace the current line items of a card. When the delete is deferred
	 * the insert is skipped; the queued replay performs both.
	 */
	async upsertLineItemsCurrent(
		cardId: string,
		rows: LineItemRow[],
		options: WriteOptions = {},
	): Promise<WriteResult> {
		const result = await this.guardedWrite(
			{
				operation_type: "upsert_line_items",
				payload: { card_id: cardId, line_items: rows },
			},
			() => this.repository.deleteCurrentLineItems(cardId),
			options,
		);
		if (result.status === "deferred") {
			return result;
		}
		if (rows.length > 0) {
			await this.repository.insertCurrentLineItems(rows);
		}
		return result;
	}

	/**
	 * Re-issue due queued writes, oldest first
	 */
	async processRetryQueue(
		maxItems: number = this.config.queueBatchSize,
	): Promise<DrainCounts> {
		const startTime = Date.now();
		const counts: DrainCounts = {
			processed: 0,
			succeeded: 0,
			failed: 0,
			skipped: 0,
			rescheduled: 0,
		};

		const due = await this.repository.findDuePendingOperations(
			this.nowIso(),
			maxItems,
		);
		if (due.length === 0) {
			this.logger.debug("No pending writes due");
		}

		for (const item of due) {
			await this.drainItem(item, counts);
		}

		const durationMs = Date.now() - startTime;
		this.eventLogger.queueDrained(counts, durationMs);
		this.telemetry.increment("queue.succeeded", counts.succeeded);
		this.telemetry.increment("queue.failed", counts.failed);
		this.telemetry.timing("queue.drain_ms", durationMs);
		return counts;
	}

	private async drainItem(item: QueuedOperation, counts: DrainCounts): Promise<void> {
		let claimed: boolean;
		try {
			claimed = await this.repository.claimPendingOperation(
				item.update_id,
				this.nowIso(),
			);
		} catch (error) {
			this.logger.warn("Could not claim queued write", {
				update_id: item.update_id,
				error: errorMessage(error),
			});
			counts.skipped++;
			return;
		}
		if (!claimed) {
			this.logger.debug("Queued write already claimed by another drain", {
				update_id: item.update_id,
			});
			counts.skipped++;
			return;
		}

		const decoded = decodePendingOperation(item.operation_type, item.payload);
		if (!decoded.ok) {
			this.logger.warn("Dropping undecodable queued write", {
				update_id: item.update_id,
				operation_type: item.operation_type,
				error: decoded.reason,
			});
			await this.settle(item, () =>
				this.repository.failPendingOperation(item.update_id, decoded.reason),
			);
			counts.skipped++;
			return;
		}

		counts.processed++;
		try {
			await this.replay(decoded.operation);
			await this.settle(item, () =>
				this.repository.completePendingOperation(item.update_id, this.nowIso()),
			);
			counts.succeeded++;
			this.logger.info("Queued write applied", {
				update_id: item.update_id,
				operation_type: item.operation_type,
			});
			return;
		} catch (error) {
			const message = errorMessage(error);
			counts.failed++;
			this.eventLogger.queueItemFailed(
				item.update_id,
				item.operation_type,
				item.retry_count,
				message,
			);

			if (
				isBufferingRestriction(error) &&
				item.retry_count < this.config.maxQueueRetries
			) {
				const nextRetryCount = item.retry_count + 1;
				const nextRetryAt = this.offsetIso(
					backoffDelayMs(this.config.queueBaseDelayMs, nextRetryCount),
				);
				await this.settle(item, () =>
					this.repository.reschedulePendingOperation(
						item.update_id,
						nextRetryCount,
						nextRetryAt,
						message,
					),
				);
				counts.rescheduled++;
				this.logger.warn("Queued write still buffered, rescheduled", {
					update_id: item.update_id,
					retry_count: nextRetryCount,
					next_retry_at: nextRetryAt,
				});
				return;
			}

			const reason = isBufferingRestriction(error)
				? `Max retries exceeded: ${message}`
				: message;
			await this.settle(item, () =>
				this.repository.failPendingOperation(item.update_id, reason),
			);
			this.logger.operational("Queued write failed permanently", {
				update_id: item.update_id,
				operation_type: item.operation_type,
				retry_count: item.retry_count,
				error: reason,
			});
		}
	}

	private async replay(operation: PendingOperation): Promise<void> {
		const options: WriteOptions = { deferOnExhaustion: false };
		switch (operation.operation_type) {
			case "upsert_card":
				await this.upsertCardCurrent(operation.payload.card, options);
				return;
			case "upsert_line_items":
				await this.upsertLineItemsCurrent(
					operation.payload.card_id,
					operation.payload.line_items,
					options,
				);
				return;
		}
	}

	/**
	 * Status bookkeeping on a queue row; a failure leaves the row for a later run
	 */
	private async settle(
		item: QueuedOperation,
		update: () => Promise<void>,
	): Promise<void> {
		try {
			await update();
		} catch (error) {
			this.logger.warn("Failed to update queued write status", {
				update_id: item.update_id,
				error: errorMessage(error),
			});
		}
	}

	private async guardedWrite(
		operation: PendingOperation,
		write: () => Promise<void>,
		options: WriteOptions,
	): Promise<WriteResult> {
		const cardId = cardIdOf(operation);
		const result = await runWithBufferRetry(
			write,
			this.retryPolicy,
			(ms) => this.clock.sleep(ms),
			(attempt, delayMs) => {
				this.logger.warn("Write blocked by streaming buffer, retrying", {
					card_id: cardId,
					operation_type: operation.operation_type,
					attempt,
					delay_ms: delayMs,
				});
			},
		);

		if (result.status === "applied") {
			return { status: "applied" };
		}
		if (options.deferOnExhaustion === false) {
			throw result.error;
		}

		const targetTable = this.targetTable(operation);
		const updateId = await this.enqueue(operation, targetTable);
		this.eventLogger.writeDeferred(
			updateId,
			operation.operation_type,
			targetTable,
			cardId,
			result.attempts,
		);
		this.telemetry.increment("store.writes_deferred", 1, {
			operation_type: operation.operation_type,
		});
		return { status: "deferred", updateId };
	}

	private async enqueue(
		operation: PendingOperation,
		targetTable: string,
	): Promise<string> {
		const now = this.nowIso();
		const row: PendingOperationRow = {
			update_id: uuidv4(),
			operation_type: operation.operation_type,
			target_table: targetTable,
			payload: JSON.stringify(operation.payload),
			retry_count: 0,
			first_queued_at: now,
			last_retry_at: null,
			next_retry_at: this.offsetIso(backoffDelayMs(this.config.queueBaseDelayMs, 0)),
			status: "pending",
			error_message: null,
			completed_at: null,
			created_at: now,
		};
		await this.repository.insertPendingOperation(row);
		return row.update_id;
	}

	private targetTable(operation: PendingOperation): string {
		return operation.operation_type === "upsert_card"
			? this.repository.tables.cardsCurrent
			: this.repository.tables.lineItemsCurrent;
	}

	private nowIso(): string {
		return this.clock.now().toISOString();
	}

	private offsetIso(ms: number): string {
		return new Date(this.clock.now().getTime() + ms).toISOString();
	}
}

function cardIdOf(operation: PendingOperation): string {
	return operation.operation_type === "upsert_card"
		? operation.payload.card.card_id
		: operation.payload.card_id;
}
