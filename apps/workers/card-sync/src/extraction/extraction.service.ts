import type { LineItemRow, TrelloCard } from "@boardsync/contracts";
import {
	type LoggerService,
	type TelemetryService,
	errorMessage,
} from "@boardsync/service-base";
import {
	type CreatedDateFields,
	type TitleParts,
	cleanText,
	deriveCreatedDate,
	derivePrices,
	normalizePriceType,
	normalizeQuantity,
	parsePrice,
	parseTitle,
} from "./card-fields.js";
import type { ExtractionConfig } from "./extraction.config.js";
import {
	ENRICH_SYSTEM_PROMPT,
	LINE_ITEM_SYSTEM_PROMPT,
	buildCardPrompt,
	buildEnrichmentPrompt,
} from "./prompts.js";
import type { CompletionProvider } from "./providers/completion-provider.interface.js";
import {
	type LlmLineItem,
	cleanEmail,
	parseCardResponse,
	parseEnrichmentResponse,
} from "./response-parser.js";

export const EXTRACTION_SERVICE = "EXTRACTION_SERVICE";

export type ExtractedLineItem = Omit<LineItemRow, "card_id">;

export interface CardExtraction extends TitleParts {
	primary_buyer_name: string | null;
	primary_buyer_email: string | null;
	line_items: ExtractedLineItem[];
	created: CreatedDateFields;
	/** Set when the model call or its output failed; fields above are then empty */
	error: string | null;
}

export interface CardExtractor {
	extract(card: TrelloCard): Promise<CardExtraction>;
}

export function toLineItem(item: LlmLineItem, lineIndex: number): ExtractedLineItem {
	const quantity = normalizeQuantity(item.qty);
	const rawPrice = parsePrice(item.price);
	const priceType = normalizePriceType(item.price_type);

	return {
		line_index: lineIndex,
		quantity,
		raw_price: rawPrice,
		price_type: priceType,
		...derivePrices(rawPrice, quantity, priceType),
		description: cleanText(item.desc),
		business_line: null,
		material: null,
		dimensions: null,
	};
}

/**
 * Card → order fields. Title and creation date are derived locally; line
 * items and buyer contact come from the completion provider. Provider or
 * parse failures never throw: they yield no items and null buyer fields.
 */
export class ExtractionService implements CardExtractor {
	constructor(
		private readonly config: ExtractionConfig,
		private readonly provider: CompletionProvider,
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
	) {}

	async extract(card: TrelloCard): Promise<CardExtraction> {
		const startTime = Date.now();
		const deterministic = {
			...parseTitle(card.name),
			created: deriveCreatedDate(card.id),
		};
		const tags = { provider: this.provider.name };

		let text: string;
		try {
			text = await this.provider.complete({
				system: LINE_ITEM_SYSTEM_PROMPT,
				prompt: buildCardPrompt(card, this.config.descriptionMaxChars),
				maxTokens: this.config.maxTokens,
			});
		} catch (error) {
			return this.degraded(card.id, deterministic, "provider", error);
		}

		let lineItems: ExtractedLineItem[];
		let buyerName: string | null;
		let buyerEmail: string | null;
		try {
			const parsed = parseCardResponse(text, card.id);
			lineItems = parsed.items.map((item, index) => toLineItem(item, index + 1));
			buyerName = cleanText(parsed.buyer_name);
			buyerEmail = cleanEmail(parsed.buyer_email);
		} catch (error) {
			return this.degraded(card.id, deterministic, "parse", error);
		}

		if (this.config.enrich && lineItems.length > 0) {
			lineItems = await this.enrich(card.id, lineItems);
		}

		this.telemetry.timing("extraction.duration_ms", Date.now() - startTime, tags);
		this.telemetry.increment("extraction.completed", 1, tags);
		this.telemetry.gauge("extraction.line_items", lineItems.length, tags);
		this.logger.debug("Card extracted", {
			card_id: card.id,
			line_item_count: lineItems.length,
			has_buyer: buyerName !== null || buyerEmail !== null,
			duration_ms: Date.now() - startTime,
		});

		return {
			...deterministic,
			primary_buyer_name: buyerName,
			primary_buyer_email: buyerEmail,
			line_items: lineItems,
			error: null,
		};
	}

	/**
	 * Second pass: business line, material and dimensions per item.
	 * Failure leaves the items unclassified.
	 */
	private async enrich(
		cardId: string,
		items: ExtractedLineItem[],
	): Promise<ExtractedLineItem[]> {
		try {
			const text = await this.provider.complete({
				system: ENRICH_SYSTEM_PROMPT,
				prompt: buildEnrichmentPrompt(
					items.map((item) => item.description),
					this.config.enrichDescriptionMaxChars,
				),
				maxTokens: this.config.enrichMaxTokens,
			});
			const classifications = parseEnrichmentResponse(text);
			return items.map((item, index) => ({
				...item,
				...classifications[index],
			}));
		} catch (error) {
			this.logger.warn("Line item enrichment failed", {
				card_id: cardId,
				error_message: errorMessage(error),
			});
			this.telemetry.increment("extraction.enrichment_failed", 1, {
				provider: this.provider.name,
			});
			return items;
		}
	}

	private degraded(
		cardId: string,
		deterministic: TitleParts & { created: CreatedDateFields },
		stage: "provider" | "parse",
		error: unknown,
	): CardExtraction {
		const message = errorMessage(error);
		this.logger.warn("Line item extraction failed", {
			card_id: cardId,
			failure_stage: stage,
			error_message: message,
			provider: this.provider.name,
		});
		this.telemetry.increment("extraction.failed", 1, {
			provider: this.provider.name,
			stage,
		});

		return {
			...deterministic,
			primary_buyer_name: null,
			primary_buyer_email: null,
			line_items: [],
			error: message,
		};
	}
}
