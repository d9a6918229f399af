import { describe, expect, it } from "vitest";
import {
	cleanEmail,
	normalizeBusinessLine,
	parseCardResponse,
	parseEnrichmentResponse,
	stripCodeFences,
} from "./response-parser.js";

describe("stripCodeFences", () => {
	it("removes json fences", () => {
		expect(stripCodeFences('```json\n{"items": []}\n```')).toBe('{"items": []}');
	});

	it("leaves bare JSON alone", () => {
		expect(stripCodeFences('  [{"a": 1}] ')).toBe('[{"a": 1}]');
	});
});

describe("parseCardResponse", () => {
	it("picks the entry matching the card id from an array", () => {
		const text = JSON.stringify([
			{ card_id: "other", items: [{ qty: 9 }] },
			{ card_id: "card-1", items: [{ qty: 2, price: 10 }], buyer_name: "Pat" },
		]);

		const parsed = parseCardResponse(text, "card-1");

		expect(parsed.items).toEqual([{ qty: 2, price: 10 }]);
		expect(parsed.buyer_name).toBe("Pat");
	});

	it("falls back to the first entry", () => {
		const parsed = parseCardResponse('[{"items": [{"qty": 1}]}]', "card-1");
		expect(parsed.items).toHaveLength(1);
	});

	it("accepts a single object and defaults items", () => {
		expect(parseCardResponse('{"buyer_email": null}', "card-1").items).toEqual([]);
	});

	it("treats an empty array as no result", () => {
		expect(parseCardResponse("[]", "card-1")).toEqual({ items: [] });
	});

	it("throws on prose", () => {
		expect(() => parseCardResponse("I could not find any items.", "c")).toThrow();
	});

	it("throws when items is not a list", () => {
		expect(() => parseCardResponse('{"items": "none"}', "c")).toThrow();
	});
});

describe("parseEnrichmentResponse", () => {
	it("normalises business lines and trims text", () => {
		const text =
			'```json\n[{"business_line": "signage", "material": " vinyl ", "dimensions": "3x5 ft"}, {"business_line": "Apparel"}]\n```';

		expect(parseEnrichmentResponse(text)).toEqual([
			{ business_line: "Signage", material: "vinyl", dimensions: "3x5 ft" },
			{ business_line: null, material: null, dimensions: null },
		]);
	});

	it("throws when the answer is not an array", () => {
		expect(() => parseEnrichmentResponse('{"business_line": "Printing"}')).toThrow();
	});
});

describe("field cleaners", () => {
	it("normalizeBusinessLine matches case-insensitively", () => {
		expect(normalizeBusinessLine("ENGRAVING")).toBe("Engraving");
		expect(normalizeBusinessLine(null)).toBeNull();
	});

	it("cleanEmail lowercases addresses and drops non-addresses", () => {
		expect(cleanEmail(" Pat@Example.com ")).toBe("pat@example.com");
		expect(cleanEmail("call Pat")).toBeNull();
	});
});
