import type { CurrentCardRow, LineItemRow } from "@boardsync/contracts";

export const CARD_ID = "5f1a2b3c0000000000000001";

export const currentCardRow = (
	overrides: Partial<CurrentCardRow> = {},
): CurrentCardRow => ({
	card_id: CARD_ID,
	name: "Acme | Banner",
	desc: "3 vinyl banners $45 each",
	labels: "Rush",
	closed: false,
	dateLastActivity: "2024-03-01T09:00:00.000Z",
	purchaser: "Acme",
	order_summary: "Banner",
	primary_buyer_name: "Jo Buyer",
	primary_buyer_email: "jo@example.com",
	date_created: "2020-07-24",
	datetime_created: "2020-07-24T00:28:44.000Z",
	year_created: 2020,
	month_created: 7,
	year_month: "2020-07",
	unix_timestamp: 1595550524,
	line_item_count: 1,
	list_id: "list-1",
	list_name: "New Orders",
	board_id: "board-1",
	board_name: "Shop Orders",
	last_updated_at: "2024-03-01T09:00:01.000Z",
	last_extracted_at: "2024-03-01T09:00:01.000Z",
	last_extraction_event_id: "action-0",
	last_event_type: "createCard",
	...overrides,
});

export const lineItem = (overrides: Partial<LineItemRow> = {}): LineItemRow => ({
	card_id: CARD_ID,
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
	...overrides,
});
