import { z } from "zod";

/**
 * Row shapes of the warehouse tables. Column names are the table columns.
 *
 * Timestamps travel as ISO 8601 strings, dates as YYYY-MM-DD.
 */

const nullableString = z.string().nullable();
const nullableInt = z.number().int().nullable();

/**
 * Card columns shared by the master and current tables
 */
export const cardRecordSchema = z.object({
	card_id: z.string(),
	name: nullableString,
	desc: nullableString,
	/** Comma-joined label names */
	labels: nullableString,
	closed: z.boolean().nullable(),
	dateLastActivity: nullableString,
	/** First title segment */
	purchaser: nullableString,
	/** Second title segment */
	order_summary: nullableString,
	primary_buyer_name: nullableString,
	primary_buyer_email: nullableString,
	date_created: nullableString,
	datetime_created: nullableString,
	year_created: nullableInt,
	month_created: nullableInt,
	year_month: nullableString,
	unix_timestamp: nullableInt,
	line_item_count: nullableInt,
});

export type CardRecord = z.infer<typeof cardRecordSchema>;

export const currentCardRowSchema = cardRecordSchema.extend({
	list_id: nullableString,
	list_name: nullableString,
	board_id: nullableString,
	board_name: nullableString,
	last_updated_at: nullableString,
	last_extracted_at: nullableString,
	last_extraction_event_id: nullableString,
	/** createCard, deleteCard, or updateCard:<change type> */
	last_event_type: nullableString,
});

export type CurrentCardRow = z.infer<typeof currentCardRowSchema>;

export interface MasterCardRow extends CardRecord {
	first_extracted_at: string;
	first_extraction_event_id: string | null;
}

export const PRICE_TYPES = ["per_unit", "total"] as const;
export type PriceType = (typeof PRICE_TYPES)[number];

export const lineItemRowSchema = z.object({
	card_id: z.string(),
	/** 1-based position in the description */
	line_index: z.number().int().min(1),
	quantity: z.number().int().min(1),
	raw_price: z.number().nullable(),
	price_type: z.enum(PRICE_TYPES),
	unit_price: z.number().nullable(),
	total_revenue: z.number().nullable(),
	description: nullableString,
	business_line: nullableString,
	material: nullableString,
	dimensions: nullableString,
});

export type LineItemRow = z.infer<typeof lineItemRowSchema>;

/**
 * One row per webhook delivery, keyed by the action id
 */
export interface WebhookEventRow {
	event_id: string;
	action_type: string;
	action_date: string | null;
	/** Empty string when the action concerns no card */
	card_id: string;
	board_id: string | null;
	board_name: string | null;
	list_id: string | null;
	list_name: string | null;
	list_before_id: string | null;
	list_before_name: string | null;
	list_after_id: string | null;
	list_after_name: string | null;
	is_list_transition: boolean;
	member_creator_id: string | null;
	member_creator_username: string | null;
	/** JSON text of the action */
	raw_payload: string;
	processed: boolean;
	processed_at: string | null;
	extraction_triggered: boolean;
	error_message: string | null;
	created_at: string;
}

export interface EventOutcome {
	extraction_triggered: boolean;
	error_message: string | null;
}
