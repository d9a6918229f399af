import { z } from "zod";
import { cleanText } from "./card-fields.js";

/**
 * Parsing of model output. Both parsers throw on anything that is not the
 * expected JSON; callers turn that into an extraction failure.
 */

const llmItemSchema = z
	.object({
		qty: z.unknown().optional(),
		price: z.unknown().optional(),
		price_type: z.unknown().optional(),
		desc: z.unknown().optional(),
	})
	.passthrough();

const llmCardSchema = z
	.object({
		card_id: z.string().optional(),
		items: z.array(llmItemSchema).default([]),
		buyer_name: z.unknown().optional(),
		buyer_email: z.unknown().optional(),
	})
	.passthrough();

export type LlmLineItem = z.infer<typeof llmItemSchema>;
export type LlmCardResult = z.infer<typeof llmCardSchema>;

const classificationSchema = z
	.object({
		business_line: z.unknown().optional(),
		material: z.unknown().optional(),
		dimensions: z.unknown().optional(),
	})
	.passthrough();

export interface ItemClassification {
	business_line: string | null;
	material: string | null;
	dimensions: string | null;
}

export const BUSINESS_LINES = ["Signage", "Printing", "Engraving"] as const;

/**
 * Drop a surrounding ``` or ```json fence
 */
export function stripCodeFences(text: string): string {
	const trimmed = text.trim();
	const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
	return fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;
}

function matchesCard(candidate: unknown, cardId: string): boolean {
	return (
		typeof candidate === "object" &&
		candidate !== null &&
		"card_id" in candidate &&
		candidate.card_id === cardId
	);
}

/**
 * The model may answer with one object or an array of them; the entry for
 * this card wins, else the first. An empty array means nothing was found.
 */
export function parseCardResponse(text: string, cardId: string): LlmCardResult {
	const json: unknown = JSON.parse(stripCodeFences(text));
	const candidates: unknown[] = Array.isArray(json) ? json : [json];
	if (candidates.length === 0) {
		return { items: [] };
	}
	const match =
		candidates.find((candidate) => matchesCard(candidate, cardId)) ??
		candidates[0];
	return llmCardSchema.parse(match);
}

export function normalizeBusinessLine(value: unknown): string | null {
	const text = cleanText(value)?.toLowerCase();
	return BUSINESS_LINES.find((line) => line.toLowerCase() === text) ?? null;
}

export function parseEnrichmentResponse(text: string): ItemClassification[] {
	const json: unknown = JSON.parse(stripCodeFences(text));
	const entries = z.array(classificationSchema).parse(json);
	return entries.map((entry) => ({
		business_line: normalizeBusinessLine(entry.business_line),
		material: cleanText(entry.material),
		dimensions: cleanText(entry.dimensions),
	}));
}

/**
 * Contact e-mail as extracted, lowercased; non-addresses are dropped
 */
export function cleanEmail(value: unknown): string | null {
	const text = cleanText(value);
	return text && /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(text)
		? text.toLowerCase()
		: null;
}
