import { trelloCardSchema } from "@boardsync/contracts";
import { describe, expect, it } from "vitest";
import { CARD_ID, currentCardRow } from "../__tests__/fixtures.js";
import { classifyChange } from "./change-classifier.js";

const card = (overrides: Record<string, unknown> = {}) =>
	trelloCardSchema.parse({
		id: CARD_ID,
		name: "Acme | Banner",
		desc: "3 vinyl banners $45 each",
		closed: false,
		idList: "list-1",
		...overrides,
	});

describe("classifyChange", () => {
	it("reports nothing for a card without a current row", () => {
		expect(classifyChange(null, card())).toEqual({
			description_changed: false,
			archived: false,
			unarchived: false,
			list_moved: false,
			title_changed: false,
			event_type: "other",
		});
	});

	it("ignores surrounding whitespace in descriptions", () => {
		const change = classifyChange(
			currentCardRow(),
			card({ desc: "  3 vinyl banners $45 each\n" }),
		);

		expect(change.description_changed).toBe(false);
		expect(change.event_type).toBe("other");
	});

	it("treats a missing stored description as empty", () => {
		expect(
			classifyChange(currentCardRow({ desc: null }), card({ desc: "" }))
				.description_changed,
		).toBe(false);
		expect(
			classifyChange(currentCardRow({ desc: null }), card({ desc: "1 sign" }))
				.event_type,
		).toBe("desc_changed");
	});

	it("ranks archiving above a title change", () => {
		const change = classifyChange(
			currentCardRow({ closed: false }),
			card({ closed: true, name: "Acme | Banner (done)" }),
		);

		expect(change.archived).toBe(true);
		expect(change.title_changed).toBe(true);
		expect(change.event_type).toBe("archived");
	});

	it("ranks unarchiving above a description change", () => {
		const change = classifyChange(
			currentCardRow({ closed: true }),
			card({ desc: "4 vinyl banners" }),
		);

		expect(change.event_type).toBe("unarchived");
		expect(change.description_changed).toBe(true);
	});

	it("ranks a description change above a list move", () => {
		expect(
			classifyChange(
				currentCardRow(),
				card({ desc: "4 vinyl banners", idList: "list-2" }),
			).event_type,
		).toBe("desc_changed");
	});

	it("ranks a list move above a title change", () => {
		expect(
			classifyChange(currentCardRow(), card({ idList: "list-2", name: "Renamed" }))
				.event_type,
		).toBe("list_moved");
	});

	it("detects a title change alone", () => {
		expect(
			classifyChange(currentCardRow(), card({ name: "Globex | Sign" })).event_type,
		).toBe("title_changed");
	});
});
