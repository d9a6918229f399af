import type { CurrentCardRow, TrelloCard } from "@boardsync/contracts";

export type ChangeType =
	| "archived"
	| "unarchived"
	| "desc_changed"
	| "list_moved"
	| "title_changed"
	| "other";

export interface CardChange {
	description_changed: boolean;
	archived: boolean;
	unarchived: boolean;
	list_moved: boolean;
	title_changed: boolean;
	/** Most significant change, in the order of the fields above */
	event_type: ChangeType;
}

const NO_CHANGE: CardChange = {
	description_changed: false,
	archived: false,
	unarchived: false,
	list_moved: false,
	title_changed: false,
	event_type: "other",
};

/**
 * Compare the stored current row with a freshly fetched card.
 *
 * A card with no current row is not a description change: first
 * extraction belongs to createCard.
 */
export function classifyChange(
	previous: CurrentCardRow | null,
	incoming: TrelloCard,
): CardChange {
	if (!previous) {
		return { ...NO_CHANGE };
	}

	const wasClosed = previous.closed === true;
	const change = {
		description_changed: (previous.desc ?? "").trim() !== incoming.desc.trim(),
		archived: !wasClosed && incoming.closed,
		unarchived: wasClosed && !incoming.closed,
		list_moved: (incoming.idList ?? null) !== previous.list_id,
		title_changed: incoming.name !== previous.name,
	};

	return { ...change, event_type: eventTypeOf(change) };
}

function eventTypeOf(change: Omit<CardChange, "event_type">): ChangeType {
	if (change.archived) return "archived";
	if (change.unarchived) return "unarchived";
	if (change.description_changed) return "desc_changed";
	if (change.list_moved) return "list_moved";
	if (change.title_changed) return "title_changed";
	return "other";
}
