import type { PriceType } from "@boardsync/contracts";

/**
 * Deterministic card fields: title split, creation date from the card id,
 * and price arithmetic for extracted line items.
 */

export interface TitleParts {
	purchaser: string | null;
	order_summary: string | null;
}

export interface CreatedDateFields {
	/** YYYY-MM-DD (UTC) */
	date_created: string | null;
	/** ISO 8601 */
	datetime_created: string | null;
	year_created: number | null;
	month_created: number | null;
	/** YYYY-MM */
	year_month: string | null;
	unix_timestamp: number | null;
}

const TITLE_DELIMITER = "|";

// Trello ids are Mongo ObjectIds; anything outside this window is not a timestamp
const MIN_CARD_TIMESTAMP = 946684800; // 2000-01-01T00:00:00Z
const MAX_CARD_TIMESTAMP = 4102444800; // 2100-01-01T00:00:00Z

const EMPTY_CREATED: CreatedDateFields = {
	date_created: null,
	datetime_created: null,
	year_created: null,
	month_created: null,
	year_month: null,
	unix_timestamp: null,
};

/**
 * "Acme Co | Vinyl banner 3x5 | rush" → purchaser "Acme Co",
 * order_summary "Vinyl banner 3x5". No delimiter → both null.
 */
export function parseTitle(title: string | null | undefined): TitleParts {
	if (!title?.includes(TITLE_DELIMITER)) {
		return { purchaser: null, order_summary: null };
	}
	const [purchaser, orderSummary] = title
		.split(TITLE_DELIMITER)
		.map((part) => part.trim());
	return {
		purchaser: purchaser || null,
		order_summary: orderSummary || null,
	};
}

/**
 * The first 8 hex characters of a card id are its creation time in seconds
 */
export function deriveCreatedDate(
	cardId: string | null | undefined,
): CreatedDateFields {
	const prefix = cardId?.slice(0, 8) ?? "";
	if (!/^[0-9a-f]{8}$/i.test(prefix)) {
		return { ...EMPTY_CREATED };
	}

	const seconds = Number.parseInt(prefix, 16);
	if (seconds < MIN_CARD_TIMESTAMP || seconds >= MAX_CARD_TIMESTAMP) {
		return { ...EMPTY_CREATED };
	}

	const created = new Date(seconds * 1000);
	const iso = created.toISOString();
	const year = created.getUTCFullYear();
	const month = created.getUTCMonth() + 1;

	return {
		date_created: iso.slice(0, 10),
		datetime_created: iso,
		year_created: year,
		month_created: month,
		year_month: `${year}-${String(month).padStart(2, "0")}`,
		unix_timestamp: seconds,
	};
}

export function roundCurrency(value: number): number {
	return Math.round(value * 100) / 100;
}

/**
 * Whole quantity of at least 1; anything unparseable counts as 1
 */
export function normalizeQuantity(value: unknown): number {
	const numeric =
		typeof value === "number"
			? value
			: typeof value === "string" && value.trim() !== ""
				? Number(value.trim())
				: Number.NaN;
	if (!Number.isFinite(numeric)) return 1;
	return Math.max(1, Math.trunc(numeric));
}

/**
 * Price as extracted: a number or a numeric string, rounded to cents
 */
export function parsePrice(value: unknown): number | null {
	const numeric =
		typeof value === "number"
			? value
			: typeof value === "string" && value.trim() !== ""
				? Number(value.trim())
				: Number.NaN;
	return Number.isFinite(numeric) ? roundCurrency(numeric) : null;
}

export function normalizePriceType(value: unknown): PriceType {
	if (typeof value !== "string") return "total";
	const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, "_");
	return normalized === "per_unit" ? "per_unit" : "total";
}

/**
 * per_unit: unit = raw, total = raw × qty. total: total = raw, unit = raw / qty.
 */
export function derivePrices(
	rawPrice: number | null,
	quantity: number,
	priceType: PriceType,
): { unit_price: number | null; total_revenue: number | null } {
	if (rawPrice === null) {
		return { unit_price: null, total_revenue: null };
	}
	const qty = Math.max(1, quantity);
	if (priceType === "per_unit") {
		return {
			unit_price: roundCurrency(rawPrice),
			total_revenue: roundCurrency(rawPrice * qty),
		};
	}
	return {
		unit_price: roundCurrency(rawPrice / qty),
		total_revenue: roundCurrency(rawPrice),
	};
}

export function truncate(text: string, maxChars: number): string {
	return text.length > maxChars ? text.slice(0, maxChars) : text;
}

/**
 * Trimmed text, or null when empty or not a string
 */
export function cleanText(value: unknown): string | null {
	if (typeof value !== "string") return null;
	const trimmed = value.trim();
	return trimmed === "" ? null : trimmed;
}
