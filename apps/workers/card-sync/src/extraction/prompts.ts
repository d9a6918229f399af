import type { TrelloCard } from "@boardsync/contracts";
import { truncate } from "./card-fields.js";

export const LINE_ITEM_SYSTEM_PROMPT = `You read order cards from a sign and print shop's Trello board.
Each card title names the customer and the job; the description lists what was ordered.

Return JSON only, no prose, in this shape:
{"card_id": "<card id>", "items": [{"qty": 1, "price": 0, "price_type": "total", "desc": "..."}], "buyer_name": null, "buyer_email": null}

Rules:
- One entry in "items" per distinct product or service in the description.
- "qty" is a whole number; use 1 when no quantity is stated.
- "price" is a plain number without currency symbols; null when no price is given.
- "price_type" is "per_unit" when the price is for one piece (e.g. "$45 each", "@ $12/ea"), otherwise "total".
- "desc" is a short description of the item.
- "buyer_name" and "buyer_email" are the ordering contact when the description names one; otherwise null.
- Do not invent items, prices or contacts.`;

export const ENRICH_SYSTEM_PROMPT = `You classify order line items for a sign and print shop.

For each numbered item return an object with:
- "business_line": one of "Signage", "Printing", "Engraving"
- "material": the main material (e.g. "vinyl", "aluminum", "acrylic", "coroplast", "paper"), or null
- "dimensions": the size as written (e.g. "3x5 ft", "24x36"), or null

Return a JSON array only, one object per item, in the same order.`;

export function buildCardPrompt(card: TrelloCard, maxChars: number): string {
	return [
		`Card ID: ${card.id}`,
		`Title: ${card.name}`,
		"Description:",
		truncate(card.desc, maxChars),
	].join("\n");
}

export function buildEnrichmentPrompt(
	descriptions: Array<string | null>,
	maxChars: number,
): string {
	return descriptions
		.map((desc, index) => `${index + 1}. ${truncate(desc ?? "", maxChars)}`)
		.join("\n");
}
