import { z } from "zod";
import { currentCardRowSchema, lineItemRowSchema } from "./storage.js";

export const PENDING_OPERATION_TYPES = [
	"upsert_card",
	"upsert_line_items",
] as const;
export type PendingOperationType = (typeof PENDING_OPERATION_TYPES)[number];

export type PendingStatus = "pending" | "processing" | "completed" | "failed";

/**
 * Everything needed to re-issue a deferred current-card merge
 */
export const upsertCardPayloadSchema = z.object({
	card: currentCardRowSchema,
});

export type UpsertCardPayload = z.infer<typeof upsertCardPayloadSchema>;

/**
 * Everything needed to re-issue a deferred line-item replacement
 */
export const upsertLineItemsPayloadSchema = z.object({
	card_id: z.string(),
	line_items: z.array(lineItemRowSchema),
});

export type UpsertLineItemsPayload = z.infer<
	typeof upsertLineItemsPayloadSchema
>;

export type PendingOperation =
	| { operation_type: "upsert_card"; payload: UpsertCardPayload }
	| { operation_type: "upsert_line_items"; payload: UpsertLineItemsPayload };

export interface PendingOperationRow {
	update_id: string;
	operation_type: PendingOperationType;
	target_table: string;
	/** JSON text of the operation payload */
	payload: string;
	retry_count: number;
	first_queued_at: string;
	last_retry_at: string | null;
	next_retry_at: string;
	status: PendingStatus;
	error_message: string | null;
	completed_at: string | null;
	created_at: string;
}

/**
 * Queue row as read back for draining; operation_type is unchecked text here
 */
export const queuedOperationSchema = z.object({
	update_id: z.string(),
	operation_type: z.string(),
	target_table: z.string().nullable(),
	payload: z.string(),
	retry_count: z.number().int().min(0),
	first_queued_at: z.string(),
	next_retry_at: z.string(),
});

export type QueuedOperation = z.infer<typeof queuedOperationSchema>;

export type DecodeResult =
	| { ok: true; operation: PendingOperation }
	| { ok: false; reason: string };

/**
 * Rebuild a typed operation from its stored type and JSON payload
 */
export function decodePendingOperation(
	operationType: string,
	payload: string,
): DecodeResult {
	let json: unknown;
	try {
		json = JSON.parse(payload);
	} catch (error) {
		return {
			ok: false,
			reason: `Invalid payload JSON: ${error instanceof Error ? error.message : String(error)}`,
		};
	}

	switch (operationType) {
		case "upsert_card": {
			const parsed = upsertCardPayloadSchema.safeParse(json);
			return parsed.success
				? { ok: true, operation: { operation_type: "upsert_card", payload: parsed.data } }
				: { ok: false, reason: `Invalid upsert_card payload: ${parsed.error.message}` };
		}
		case "upsert_line_items": {
			const parsed = upsertLineItemsPayloadSchema.safeParse(json);
			return parsed.success
				? {
						ok: true,
						operation: { operation_type: "upsert_line_items", payload: parsed.data },
					}
				: {
						ok: false,
						reason: `Invalid upsert_line_items payload: ${parsed.error.message}`,
					};
		}
		default:
			return { ok: false, reason: `Unknown operation type: ${operationType}` };
	}
}
