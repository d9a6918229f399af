import type {
	CardRecord,
	CurrentCardRow,
	LineItemRow,
	TrelloAction,
	TrelloCard,
	WebhookEventRow,
} from "@boardsync/contracts";
import { deriveCreatedDate, parseTitle } from "../extraction/card-fields.js";
import type {
	CardExtraction,
	ExtractedLineItem,
} from "../extraction/extraction.service.js";

export interface CardLocation {
	list_id: string | null;
	list_name: string | null;
	board_id: string | null;
	board_name: string | null;
}

export interface CurrentRowMeta {
	updatedAt: string;
	extractedAt: string | null;
	extractionEventId: string | null;
	eventType: string;
}

export function formatLabels(labels: TrelloCard["labels"]): string | null {
	const names = labels
		.map((label) => (label.name ?? "").trim())
		.filter((name) => name.length > 0);
	return names.length > 0 ? names.join(", ") : null;
}

/**
 * Card row from a fresh extraction
 */
export function buildCardRecord(
	card: TrelloCard,
	extraction: CardExtraction,
): CardRecord {
	return {
		card_id: card.id,
		name: card.name,
		desc: card.desc,
		labels: formatLabels(card.labels),
		closed: card.closed,
		dateLastActivity: card.dateLastActivity ?? null,
		purchaser: extraction.purchaser,
		order_summary: extraction.order_summary,
		primary_buyer_name: extraction.primary_buyer_name,
		primary_buyer_email: extraction.primary_buyer_email,
		...extraction.created,
		line_item_count: extraction.line_items.length,
	};
}

/**
 * Card row for a metadata-only update: local fields are recomputed, model
 * output is kept from the previous row.
 */
export function carryForwardCard(
	card: TrelloCard,
	previous: CurrentCardRow | null,
): CardRecord {
	const title = parseTitle(card.name);
	return {
		card_id: card.id,
		name: card.name,
		desc: card.desc,
		labels: formatLabels(card.labels),
		closed: card.closed,
		dateLastActivity: card.dateLastActivity ?? null,
		purchaser: title.purchaser ?? previous?.purchaser ?? null,
		order_summary: title.order_summary ?? previous?.order_summary ?? null,
		primary_buyer_name: previous?.primary_buyer_name ?? null,
		primary_buyer_email: previous?.primary_buyer_email ?? null,
		...deriveCreatedDate(card.id),
		line_item_count: previous?.line_item_count ?? null,
	};
}

export function buildCurrentCard(
	record: CardRecord,
	location: CardLocation,
	meta: CurrentRowMeta,
): CurrentCardRow {
	return {
		...record,
		...location,
		last_updated_at: meta.updatedAt,
		last_extracted_at: meta.extractedAt,
		last_extraction_event_id: meta.extractionEventId,
		last_event_type: meta.eventType,
	};
}

/**
 * List: the list moved to, else the action's list, else the card's.
 * Board: the action's, else the card's. Names fall back to the previous
 * row while the id is unchanged.
 */
export function resolveLocation(
	action: TrelloAction,
	card: TrelloCard | null,
	previous: CurrentCardRow | null,
): CardLocation {
	const listRef = action.data.listAfter ?? action.data.list;
	const listId = listRef?.id ?? card?.idList ?? previous?.list_id ?? null;
	const boardRef = action.data.board;
	const boardId = boardRef?.id ?? card?.idBoard ?? previous?.board_id ?? null;

	return {
		list_id: listId,
		list_name:
			listRef?.name ??
			(previous && previous.list_id === listId ? previous.list_name : null),
		board_id: boardId,
		board_name:
			boardRef?.name ??
			(previous && previous.board_id === boardId ? previous.board_name : null),
	};
}

export function toLineItemRows(
	cardId: string,
	items: ExtractedLineItem[],
): LineItemRow[] {
	return items.map((item) => ({ card_id: cardId, ...item }));
}

/** True when the update touched the description */
export function hasDescriptionEdit(action: TrelloAction): boolean {
	const old = action.data.old;
	return old !== undefined && Object.hasOwn(old, "desc");
}

export function buildEventRow(
	action: TrelloAction,
	receivedAt: string,
): WebhookEventRow {
	const { card, board, list, listBefore, listAfter } = action.data;
	const cardListId = card?.["idList"];
	const listId =
		listAfter?.id ??
		list?.id ??
		(typeof cardListId === "string" ? cardListId : null);
	const listName = listAfter ? listAfter.name : list?.name;

	return {
		event_id: action.id,
		action_type: action.type,
		action_date: action.date ?? null,
		card_id: card?.id ?? "",
		board_id: board?.id ?? null,
		board_name: board?.name ?? null,
		list_id: listId,
		list_name: listName ?? null,
		list_before_id: listBefore?.id ?? null,
		list_before_name: listBefore?.name ?? null,
		list_after_id: listAfter?.id ?? null,
		list_after_name: listAfter?.name ?? null,
		is_list_transition:
			listBefore !== undefined &&
			listAfter !== undefined &&
			listBefore.id !== listAfter.id,
		member_creator_id: action.memberCreator?.id ?? null,
		member_creator_username: action.memberCreator?.username ?? null,
		raw_payload: JSON.stringify(action),
		processed: false,
		processed_at: null,
		extraction_triggered: false,
		error_message: null,
		created_at: receivedAt,
	};
}
