import type { TrelloCard } from "@boardsync/contracts";
import type { LoggerService } from "@boardsync/service-base";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMockLogger, createMockTelemetry } from "../__tests__/mocks.js";
import { ExtractionConfig } from "./extraction.config.js";
import { ExtractionService } from "./extraction.service.js";
import type {
	CompletionProvider,
	CompletionRequest,
} from "./providers/completion-provider.interface.js";
import { LocalStubCompletionProvider } from "./providers/local-stub.provider.js";

const card: TrelloCard = {
	id: "5f9b2c0012ab34cd56ef7890",
	name: "Acme Co | Vinyl banner 3x5 | rush",
	desc: "3 banners @ $45 each\nContact: Pat Lee pat@acme.test",
	closed: false,
	labels: [],
};

const scriptedProvider = (...responses: Array<string | Error>) => {
	const complete = vi.fn(async (_request: CompletionRequest) => {
		const next = responses.shift();
		if (next === undefined) throw new Error("no scripted response left");
		if (next instanceof Error) throw next;
		return next;
	});
	const provider: CompletionProvider = {
		name: "scripted",
		model: "scripted-v1",
		complete,
	};
	return { provider, complete };
};

describe("ExtractionService", () => {
	let logger: LoggerService;

	beforeEach(() => {
		logger = createMockLogger();
	});

	const build = (provider: CompletionProvider, env: NodeJS.ProcessEnv = {}) =>
		new ExtractionService(
			new ExtractionConfig(env),
			provider,
			logger,
			createMockTelemetry(),
		);

	it("combines deterministic fields with model output", async () => {
		const { provider, complete } = scriptedProvider(
			JSON.stringify({
				card_id: card.id,
				items: [{ qty: 3, price: 45, price_type: "per_unit", desc: "Vinyl banner" }],
				buyer_name: "Pat Lee",
				buyer_email: "pat@acme.test",
			}),
		);

		const result = await build(provider).extract(card);

		expect(result).toEqual({
			purchaser: "Acme Co",
			order_summary: "Vinyl banner 3x5",
			created: expect.objectContaining({ date_created: "2020-10-29" }),
			primary_buyer_name: "Pat Lee",
			primary_buyer_email: "pat@acme.test",
			line_items: [
				{
					line_index: 1,
					quantity: 3,
					raw_price: 45,
					price_type: "per_unit",
					unit_price: 45,
					total_revenue: 135,
					description: "Vinyl banner",
					business_line: null,
					material: null,
					dimensions: null,
				},
			],
			error: null,
		});
		expect(complete).toHaveBeenCalledOnce();
		expect(complete.mock.calls[0]?.[0]).toMatchObject({ maxTokens: 2048 });
	});

	it("truncates long descriptions in the prompt", async () => {
		const { provider, complete } = scriptedProvider("[]");
		const longCard = { ...card, desc: "x".repeat(50) };

		await build(provider, { EXTRACTION_DESCRIPTION_MAX_CHARS: "10" }).extract(
			longCard,
		);

		const request = complete.mock.calls[0]?.[0];
		expect(request?.prompt.endsWith(`Description:\n${"x".repeat(10)}`)).toBe(true);
	});

	it("degrades to empty fields when the provider fails", async () => {
		const { provider } = scriptedProvider(new Error("overloaded_error"));

		const result = await build(provider).extract(card);

		expect(result.line_items).toEqual([]);
		expect(result.primary_buyer_name).toBeNull();
		expect(result.primary_buyer_email).toBeNull();
		expect(result.purchaser).toBe("Acme Co");
		expect(result.created.year_created).toBe(2020);
		expect(result.error).toBe("overloaded_error");
		expect(logger.warn).toHaveBeenCalledWith(
			"Line item extraction failed",
			expect.objectContaining({ failure_stage: "provider" }),
		);
	});

	it("degrades when the output is not JSON", async () => {
		const { provider } = scriptedProvider("Sorry, no order here.");

		const result = await build(provider).extract(card);

		expect(result.line_items).toEqual([]);
		expect(result.error).not.toBeNull();
		expect(logger.warn).toHaveBeenCalledWith(
			"Line item extraction failed",
			expect.objectContaining({ failure_stage: "parse" }),
		);
	});

	it("extracts nothing with the local stub", async () => {
		const result = await build(new LocalStubCompletionProvider()).extract(card);

		expect(result.line_items).toEqual([]);
		expect(result.primary_buyer_email).toBeNull();
		expect(result.error).toBeNull();
	});

	describe("enrichment", () => {
		it("classifies items in a second call", async () => {
			const { provider, complete } = scriptedProvider(
				JSON.stringify({
					items: [
						{ qty: 1, price: 150, desc: "Aluminum sign 24x36" },
						{ qty: 2, price: "20", price_type: "per_unit", desc: "Flyers" },
					],
				}),
				JSON.stringify([
					{ business_line: "Signage", material: "aluminum", dimensions: "24x36" },
					{ business_line: "printing", material: "paper", dimensions: null },
				]),
			);

			const result = await build(provider, { EXTRACTION_ENRICH: "true" }).extract(
				card,
			);

			expect(complete).toHaveBeenCalledTimes(2);
			expect(complete.mock.calls[1]?.[0]?.prompt).toBe(
				"1. Aluminum sign 24x36\n2. Flyers",
			);
			expect(
				result.line_items.map((item) => [
					item.business_line,
					item.material,
					item.total_revenue,
				]),
			).toEqual([
				["Signage", "aluminum", 150],
				["Printing", "paper", 40],
			]);
		});

		it("keeps unclassified items when enrichment fails", async () => {
			const { provider } = scriptedProvider(
				JSON.stringify({ items: [{ qty: 1, price: 10, desc: "Plaque" }] }),
				new Error("timeout"),
			);

			const result = await build(provider, { EXTRACTION_ENRICH: "true" }).extract(
				card,
			);

			expect(result.line_items).toHaveLength(1);
			expect(result.line_items[0]?.business_line).toBeNull();
			expect(result.error).toBeNull();
		});

		it("skips enrichment when there are no items", async () => {
			const { provider, complete } = scriptedProvider('{"items": []}');

			await build(provider, { EXTRACTION_ENRICH: "true" }).extract(card);

			expect(complete).toHaveBeenCalledOnce();
		});
	});
});

describe("ExtractionConfig", () => {
	it("selects the local stub without an API key", () => {
		expect(new ExtractionConfig({}).provider).toBe("local-stub");
	});

	it("selects anthropic when a key is present", () => {
		const config = new ExtractionConfig({ ANTHROPIC_API_KEY: "test-secret" });
		expect(config.provider).toBe("anthropic");
		expect(config.apiKey).toBe("test-secret");
	});

	it("requires a key when anthropic is requested", () => {
		expect(
			() => new ExtractionConfig({ EXTRACTION_PROVIDER: "anthropic" }),
		).toThrow("ANTHROPIC_API_KEY");
	});
});
