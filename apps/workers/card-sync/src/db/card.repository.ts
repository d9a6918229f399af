import {
	type CurrentCardRow,
	currentCardRowSchema,
	type EventOutcome,
	type LineItemRow,
	type MasterCardRow,
	type PendingOperationRow,
	type QueuedOperation,
	queuedOperationSchema,
	type WebhookEventRow,
} from "@boardsync/contracts";
import type { TableNames } from "./bigquery.config.js";
import type {
	ParamType,
	QueryParam,
	QueryParams,
	QueryRunner,
} from "./bigquery.client.js";

export const CARD_REPOSITORY = "CARD_REPOSITORY";

/**
 * Raw reads and writes against the order tables. No retries here; the
 * state store decides what to do with a failed write.
 */
export interface CardRepository {
	readonly tables: TableNames;

	eventExists(eventId: string): Promise<boolean>;
	insertEvent(row: WebhookEventRow): Promise<void>;
	updateEventOutcome(
		eventId: string,
		outcome: EventOutcome,
		processedAt: string,
	): Promise<void>;

	masterCardExists(cardId: string): Promise<boolean>;
	insertMasterCard(row: MasterCardRow): Promise<void>;

	findCurrentCard(cardId: string): Promise<CurrentCardRow | null>;
	mergeCurrentCard(row: CurrentCardRow): Promise<void>;

	insertMasterLineItems(rows: LineItemRow[]): Promise<void>;
	deleteCurrentLineItems(cardId: string): Promise<void>;
	insertCurrentLineItems(rows: LineItemRow[]): Promise<void>;

	insertPendingOperation(row: PendingOperationRow): Promise<void>;
	findDuePendingOperations(now: string, limit: number): Promise<QueuedOperation[]>;
	/** Moves a pending row to processing; false when it was no longer pending */
	claimPendingOperation(updateId: string, at: string): Promise<boolean>;
	completePendingOperation(updateId: string, at: string): Promise<void>;
	failPendingOperation(updateId: string, errorMessage: string): Promise<void>;
	reschedulePendingOperation(
		updateId: string,
		retryCount: number,
		nextRetryAt: string,
		errorMessage: string,
	): Promise<void>;
}

const param = (type: ParamType, value: QueryParam["value"]): QueryParam => ({
	type,
	value,
});

/** Column and parameter type of every cards_current column, in table order */
export const CURRENT_CARD_COLUMNS: ReadonlyArray<
	readonly [keyof CurrentCardRow, ParamType]
> = [
	["card_id", "STRING"],
	["name", "STRING"],
	["desc", "STRING"],
	["labels", "STRING"],
	["closed", "BOOL"],
	["dateLastActivity", "TIMESTAMP"],
	["purchaser", "STRING"],
	["order_summary", "STRING"],
	["primary_buyer_name", "STRING"],
	["primary_buyer_email", "STRING"],
	["date_created", "DATE"],
	["datetime_created", "TIMESTAMP"],
	["year_created", "INT64"],
	["month_created", "INT64"],
	["year_month", "STRING"],
	["unix_timestamp", "INT64"],
	["line_item_count", "INT64"],
	["list_id", "STRING"],
	["list_name", "STRING"],
	["board_id", "STRING"],
	["board_name", "STRING"],
	["last_updated_at", "TIMESTAMP"],
	["last_extracted_at", "TIMESTAMP"],
	["last_extraction_event_id", "STRING"],
	["last_event_type", "STRING"],
];

const quote = (column: string): string => `\`${column}\``;

/**
 * Single-statement upsert of one current card row, keyed by card_id
 */
export function buildCurrentCardMerge(tableRef: string): string {
	const source = CURRENT_CARD_COLUMNS.map(
		([column]) => `@p_${column} AS ${quote(column)}`,
	).join(", ");
	const updates = CURRENT_CARD_COLUMNS.filter(([column]) => column !== "card_id")
		.map(([column]) => `${quote(column)} = S.${quote(column)}`)
		.join(", ");
	const columns = CURRENT_CARD_COLUMNS.map(([column]) => quote(column)).join(", ");
	const values = CURRENT_CARD_COLUMNS.map(([column]) => `S.${quote(column)}`).join(
		", ",
	);

	return [
		`MERGE ${tableRef} T`,
		`USING (SELECT ${source}) S`,
		"ON T.card_id = S.card_id",
		`WHEN MATCHED THEN UPDATE SET ${updates}`,
		`WHEN NOT MATCHED THEN INSERT (${columns}) VALUES (${values})`,
	].join("\n");
}

export function currentCardParams(row: CurrentCardRow): QueryParams {
	const params: QueryParams = {};
	for (const [column, type] of CURRENT_CARD_COLUMNS) {
		params[`p_${column}`] = param(type, row[column]);
	}
	return params;
}

export class BigQueryCardRepository implements CardRepository {
	constructor(
		private readonly runner: QueryRunner,
		readonly tables: TableNames,
	) {}

	async eventExists(eventId: string): Promise<boolean> {
		const rows = await this.runner.query(
			`SELECT 1 AS found FROM ${this.ref("events")} WHERE event_id = @event_id LIMIT 1`,
			{ event_id: param("STRING", eventId) },
		);
		return rows.length > 0;
	}

	async insertEvent(row: WebhookEventRow): Promise<void> {
		await this.runner.insertRows(this.tables.events, [row]);
	}

	async updateEventOutcome(
		eventId: string,
		outcome: EventOutcome,
		processedAt: string,
	): Promise<void> {
		await this.runner.query(
			[
				`MERGE ${this.ref("events")} T`,
				"USING (SELECT @event_id AS event_id) S",
				"ON T.event_id = S.event_id",
				"WHEN MATCHED THEN UPDATE SET processed = TRUE, processed_at = @processed_at,",
				"extraction_triggered = @extraction_triggered, error_message = @error_message",
			].join("\n"),
			{
				event_id: param("STRING", eventId),
				processed_at: param("TIMESTAMP", processedAt),
				extraction_triggered: param("BOOL", outcome.extraction_triggered),
				error_message: param("STRING", outcome.error_message),
			},
		);
	}

	async masterCardExists(cardId: string): Promise<boolean> {
		const rows = await this.runner.query(
			`SELECT 1 AS found FROM ${this.ref("cardsMaster")} WHERE card_id = @card_id LIMIT 1`,
			{ card_id: param("STRING", cardId) },
		);
		return rows.length > 0;
	}

	async insertMasterCard(row: MasterCardRow): Promise<void> {
		await this.runner.insertRows(this.tables.cardsMaster, [row]);
	}

	async findCurrentCard(cardId: string): Promise<CurrentCardRow | null> {
		const columns = CURRENT_CARD_COLUMNS.map(([column]) => quote(column)).join(
			", ",
		);
		const rows = await this.runner.query(
			`SELECT ${columns} FROM ${this.ref("cardsCurrent")} WHERE card_id = @card_id LIMIT 1`,
			{ card_id: param("STRING", cardId) },
		);
		if (rows.length === 0) return null;
		return currentCardRowSchema.parse(rows[0]);
	}

	async mergeCurrentCard(row: CurrentCardRow): Promise<void> {
		await this.runner.query(
			buildCurrentCardMerge(this.ref("cardsCurrent")),
			currentCardParams(row),
		);
	}

	async insertMasterLineItems(rows: LineItemRow[]): Promise<void> {
		await this.runner.insertRows(this.tables.lineItemsMaster, rows);
	}

	async deleteCurrentLineItems(cardId: string): Promise<void> {
		await this.runner.query(
			`DELETE FROM ${this.ref("lineItemsCurrent")} WHERE card_id = @card_id`,
			{ card_id: param("STRING", cardId) },
		);
	}

	async insertCurrentLineItems(rows: LineItemRow[]): Promise<void> {
		await this.runner.insertRows(this.tables.lineItemsCurrent, rows);
	}

	async insertPendingOperation(row: PendingOperationRow): Promise<void> {
		await this.runner.query(
			[
				`INSERT INTO ${this.ref("pendingUpdates")}`,
				"(update_id, operation_type, target_table, payload, retry_count, first_queued_at,",
				"last_retry_at, next_retry_at, status, error_message, completed_at, created_at)",
				"VALUES (@update_id, @operation_type, @target_table, PARSE_JSON(@payload), @retry_count,",
				"@first_queued_at, @last_retry_at, @next_retry_at, @status, @error_message,",
				"@completed_at, @created_at)",
			].join("\n"),
			{
				update_id: param("STRING", row.update_id),
				operation_type: param("STRING", row.operation_type),
				target_table: param("STRING", row.target_table),
				payload: param("STRING", row.payload),
				retry_count: param("INT64", row.retry_count),
				first_queued_at: param("TIMESTAMP", row.first_queued_at),
				last_retry_at: param("TIMESTAMP", row.last_retry_at),
				next_retry_at: param("TIMESTAMP", row.next_retry_at),
				status: param("STRING", row.status),
				error_message: param("STRING", row.error_message),
				completed_at: param("TIMESTAMP", row.completed_at),
				created_at: param("TIMESTAMP", row.created_at),
			},
		);
	}

	async findDuePendingOperations(
		now: string,
		limit: number,
	): Promise<QueuedOperation[]> {
		const rows = await this.runner.query(
			[
				"SELECT update_id, operation_type, target_table, TO_JSON_STRING(payload) AS payload,",
				"retry_count, first_queued_at, next_retry_at",
				`FROM ${this.ref("pendingUpdates")}`,
				"WHERE status = 'pending' AND next_retry_at <= @now",
				"ORDER BY first_queued_at ASC",
				"LIMIT @limit",
			].join("\n"),
			{ now: param("TIMESTAMP", now), limit: param("INT64", limit) },
		);
		return rows.map((row) => queuedOperationSchema.parse(row));
	}

	async claimPendingOperation(updateId: string, at: string): Promise<boolean> {
		const affected = await this.runner.execute(
			`UPDATE ${this.ref("pendingUpdates")} SET status = 'processing', last_retry_at = @at WHERE update_id = @update_id AND status = 'pending'`,
			{ update_id: param("STRING", updateId), at: param("TIMESTAMP", at) },
		);
		return affected > 0;
	}

	async completePendingOperation(updateId: string, at: string): Promise<void> {
		await this.runner.query(
			`UPDATE ${this.ref("pendingUpdates")} SET status = 'completed', completed_at = @at, error_message = NULL WHERE update_id = @update_id`,
			{ update_id: param("STRING", updateId), at: param("TIMESTAMP", at) },
		);
	}

	async failPendingOperation(
		updateId: string,
		errorMessage: string,
	): Promise<void> {
		await this.runner.query(
			`UPDATE ${this.ref("pendingUpdates")} SET status = 'failed', error_message = @error_message WHERE update_id = @update_id`,
			{
				update_id: param("STRING", updateId),
				error_message: param("STRING", errorMessage),
			},
		);
	}

	async reschedulePendingOperation(
		updateId: string,
		retryCount: number,
		nextRetryAt: string,
		errorMessage: string,
	): Promise<void> {
		await this.runner.query(
			[
				`UPDATE ${this.ref("pendingUpdates")}`,
				"SET status = 'pending', retry_count = @retry_count, next_retry_at = @next_retry_at,",
				"error_message = @error_message",
				"WHERE update_id = @update_id",
			].join("\n"),
			{
				update_id: param("STRING", updateId),
				retry_count: param("INT64", retryCount),
				next_retry_at: param("TIMESTAMP", nextRetryAt),
				error_message: param("STRING", errorMessage),
			},
		);
	}

	private ref(table: keyof TableNames): string {
		return this.runner.tableRef(this.tables[table]);
	}
}
