import type { EventLogger, LoggerService } from "@boardsync/service-base";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	FakeClock,
	InMemoryCardRepository,
	type StoredPendingRow,
	bufferError,
} from "../__tests__/fake-repository.js";
import { CARD_ID, currentCardRow, lineItem } from "../__tests__/fixtures.js";
import {
	createMockEventLogger,
	createMockLogger,
	createMockTelemetry,
} from "../__tests__/mocks.js";
import { StateStore } from "./state-store.service.js";
import { StoreConfig } from "./store.config.js";

const pendingRow = (overrides: Partial<StoredPendingRow>): StoredPendingRow => ({
	update_id: "update-1",
	operation_type: "upsert_line_items",
	target_table: "line_items_current",
	payload: JSON.stringify({ card_id: CARD_ID, line_items: [lineItem()] }),
	retry_count: 0,
	first_queued_at: "2024-03-01T09:00:00.000Z",
	last_retry_at: null,
	next_retry_at: "2024-03-01T09:05:00.000Z",
	status: "pending",
	error_message: null,
	completed_at: null,
	created_at: "2024-03-01T09:00:00.000Z",
	...overrides,
});

describe("StateStore", () => {
	let repository: InMemoryCardRepository;
	let clock: FakeClock;
	let logger: LoggerService;
	let eventLogger: EventLogger;
	let store: StateStore;

	beforeEach(() => {
		repository = new InMemoryCardRepository();
		clock = new FakeClock();
		logger = createMockLogger();
		eventLogger = createMockEventLogger();
		store = new StateStore(
			repository,
			new StoreConfig({}),
			clock,
			logger,
			createMockTelemetry(),
			eventLogger,
		);
	});

	describe("upsertCardCurrent", () => {
		it("keeps one row per card, reflecting the latest write", async () => {
			await store.upsertCardCurrent(currentCardRow({ name: "First" }));
			await store.upsertCardCurrent(currentCardRow({ name: "Second" }));

			expect(repository.currentCards.size).toBe(1);
			expect(repository.currentCards.get(CARD_ID)?.name).toBe("Second");
		});

		it("applies in place after two buffering failures", async () => {
			repository.failWith("mergeCurrentCard", bufferError(), bufferError());

			const result = await store.upsertCardCurrent(currentCardRow());

			expect(result).toEqual({ status: "applied" });
			expect(repository.pending.size).toBe(0);
			expect(repository.currentCards.has(CARD_ID)).toBe(true);
			expect(clock.sleeps).toEqual([2000, 4000]);
		});

		it("queues the merge after three buffering failures", async () => {
			repository.failWith(
				"mergeCurrentCard",
				bufferError(),
				bufferError(),
				bufferError(),
			);

			const result = await store.upsertCardCurrent(currentCardRow());

			expect(result.status).toBe("deferred");
			expect(repository.currentCards.size).toBe(0);
			expect(repository.pending.size).toBe(1);
			const [queued] = [...repository.pending.values()];
			expect(queued).toMatchObject({
				operation_type: "upsert_card",
				target_table: "cards_current",
				retry_count: 0,
				status: "pending",
				first_queued_at: "2024-03-01T10:00:06.000Z",
				next_retry_at: "2024-03-01T10:05:06.000Z",
			});
			expect(JSON.parse(queued?.payload ?? "{}")).toEqual({ card: currentCardRow() });
			expect(eventLogger.writeDeferred).toHaveBeenCalledWith(
				queued?.update_id,
				"upsert_card",
				"cards_current",
				CARD_ID,
				3,
			);
		});

		it("propagates other storage errors immediately", async () => {
			repository.failWith("mergeCurrentCard", new Error("Access Denied"));

			await expect(
				store.upsertCardCurrent(currentCardRow()),
			).rejects.toThrow("Access Denied");
			expect(clock.sleeps).toEqual([]);
			expect(repository.pending.size).toBe(0);
		});
	});

	describe("upsertLineItemsCurrent", () => {
		it("replaces the card's items", async () => {
			repository.currentLineItems = [
				lineItem({ line_index: 1 }),
				lineItem({ line_index: 2 }),
				lineItem({ card_id: "other-card" }),
			];

			await store.upsertLineItemsCurrent(CARD_ID, [
				lineItem({ description: "Decal" }),
			]);

			expect(
				repository.currentLineItems.map((item) => [item.card_id, item.description]),
			).toEqual([
				["other-card", "Vinyl banner"],
				[CARD_ID, "Decal"],
			]);
		});

		it("clears the card's items when the new set is empty", async () => {
			repository.currentLineItems = [lineItem()];

			const result = await store.upsertLineItemsCurrent(CARD_ID, []);

			expect(result).toEqual({ status: "applied" });
			expect(repository.currentLineItems).toEqual([]);
			expect(repository.callCount("insertCurrentLineItems")).toBe(0);
		});

		it("skips the insert when the delete is deferred", async () => {
			repository.currentLineItems = [lineItem()];
			repository.failWith(
				"deleteCurrentLineItems",
				bufferError("line_items_current"),
				bufferError("line_items_current"),
				bufferError("line_items_current"),
			);

			const result = await store.upsertLineItemsCurrent(CARD_ID, [
				lineItem({ description: "Decal" }),
			]);

			expect(result.status).toBe("deferred");
			expect(repository.callCount("insertCurrentLineItems")).toBe(0);
			expect(repository.currentLineItems).toEqual([lineItem()]);
			const [queued] = [...repository.pending.values()];
			expect(queued?.operation_type).toBe("upsert_line_items");
			expect(queued?.target_table).toBe("line_items_current");
		});
	});

	describe("markEventProcessed", () => {
		it("swallows a buffering failure", async () => {
			repository.failWith("updateEventOutcome", bufferError("trello_webhook_events"));

			await expect(
				store.markEventProcessed("action-1", {
					extraction_triggered: false,
					error_message: null,
				}),
			).resolves.toBeUndefined();
			expect(logger.debug).toHaveBeenCalled();
			expect(logger.warn).not.toHaveBeenCalled();
		});

		it("swallows and warns on other failures", async () => {
			repository.failWith("updateEventOutcome", new Error("quota exceeded"));

			await store.markEventProcessed("action-1", {
				extraction_triggered: false,
				error_message: null,
			});

			expect(logger.warn).toHaveBeenCalledWith("Failed to record event outcome", {
				action_id: "action-1",
				error: "quota exceeded",
			});
		});
	});

	describe("insertCardMaster", () => {
		it("inserts only the first time", async () => {
			const master = {
				...currentCardRow(),
				first_extracted_at: "2024-03-01T10:00:00.000Z",
				first_extraction_event_id: "action-1",
			};

			expect(await store.insertCardMaster(master)).toBe(true);
			expect(await store.insertCardMaster(master)).toBe(false);
			expect(repository.callCount("insertMasterCard")).toBe(1);
		});
	});

	describe("processRetryQueue", () => {
		const deferCardWrite = async () => {
			repository.failWith(
				"mergeCurrentCard",
				bufferError(),
				bufferError(),
				bufferError(),
			);
			const result = await store.upsertCardCurrent(currentCardRow());
			if (result.status !== "deferred") throw new Error("expected a deferred write");
			return result.updateId;
		};

		it("leaves rows that are not yet due", async () => {
			await deferCardWrite();

			const counts = await store.processRetryQueue();

			expect(counts).toEqual({
				processed: 0,
				succeeded: 0,
				failed: 0,
				skipped: 0,
				rescheduled: 0,
			});
		});

		it("completes a due write that now applies", async () => {
			const updateId = await deferCardWrite();
			clock.advance(300000);

			const counts = await store.processRetryQueue();

			expect(counts).toEqual({
				processed: 1,
				succeeded: 1,
				failed: 0,
				skipped: 0,
				rescheduled: 0,
			});
			expect(repository.pending.get(updateId)).toMatchObject({
				status: "completed",
				completed_at: "2024-03-01T10:05:06.000Z",
				last_retry_at: "2024-03-01T10:05:06.000Z",
			});
			expect(repository.currentCards.get(CARD_ID)?.name).toBe("Acme | Banner");
			expect(eventLogger.queueDrained).toHaveBeenCalledTimes(1);
		});

		it("reschedules a write that is still buffered", async () => {
			const updateId = await deferCardWrite();
			clock.advance(300000);
			repository.failWith(
				"mergeCurrentCard",
				bufferError(),
				bufferError(),
				bufferError(),
			);

			const counts = await store.processRetryQueue();

			expect(counts).toEqual({
				processed: 1,
				succeeded: 0,
				failed: 1,
				skipped: 0,
				rescheduled: 1,
			});
			expect(repository.pending.get(updateId)).toMatchObject({
				status: "pending",
				retry_count: 1,
				next_retry_at: "2024-03-01T10:15:12.000Z",
			});
			expect(repository.pending.size).toBe(1);
		});

		it("reschedules up to the retry cap", async () => {
			repository.pending.set("update-1", pendingRow({ retry_count: 4 }));
			repository.failWith(
				"deleteCurrentLineItems",
				bufferError("line_items_current"),
				bufferError("line_items_current"),
				bufferError("line_items_current"),
			);

			const counts = await store.processRetryQueue();

			expect(counts).toMatchObject({ processed: 1, failed: 1, rescheduled: 1 });
			expect(repository.pending.get("update-1")).toMatchObject({
				status: "pending",
				retry_count: 5,
			});
		});

		it("fails a write that stays buffered past the retry cap", async () => {
			repository.pending.set("update-1", pendingRow({ retry_count: 5 }));
			repository.failWith(
				"deleteCurrentLineItems",
				bufferError("line_items_current"),
				bufferError("line_items_current"),
				bufferError("line_items_current"),
			);

			const counts = await store.processRetryQueue();

			expect(counts.failed).toBe(1);
			expect(counts.rescheduled).toBe(0);
			const row = repository.pending.get("update-1");
			expect(row?.status).toBe("failed");
			expect(row?.error_message).toMatch(/^Max retries exceeded: /);
		});

		it("fails a write on any other error", async () => {
			repository.pending.set("update-1", pendingRow({}));
			repository.failWith("deleteCurrentLineItems", new Error("Access Denied"));

			const counts = await store.processRetryQueue();

			expect(counts).toMatchObject({ processed: 1, failed: 1, rescheduled: 0 });
			expect(repository.pending.get("update-1")).toMatchObject({
				status: "failed",
				error_message: "Access Denied",
			});
		});

		it("replays a queued line-item replacement in full", async () => {
			repository.currentLineItems = [lineItem({ description: "Old" })];
			repository.pending.set("update-1", pendingRow({}));

			await store.processRetryQueue();

			expect(repository.currentLineItems).toEqual([lineItem()]);
			expect(repository.pending.get("update-1")?.status).toBe("completed");
		});

		it("skips rows with an unknown operation type", async () => {
			repository.pending.set(
				"update-1",
				pendingRow({ operation_type: "rename_card" }),
			);

			const counts = await store.processRetryQueue();

			expect(counts).toMatchObject({ processed: 0, skipped: 1, failed: 0 });
			expect(repository.pending.get("update-1")).toMatchObject({
				status: "failed",
				error_message: "Unknown operation type: rename_card",
			});
		});

		it("skips rows it cannot claim", async () => {
			repository.pending.set("update-1", pendingRow({}));
			repository.failWith("claimPendingOperation", new Error("Could not serialize access"));

			const counts = await store.processRetryQueue();

			expect(counts).toMatchObject({ processed: 0, skipped: 1 });
			expect(repository.pending.get("update-1")?.status).toBe("pending");
		});

		it("skips rows another drain already claimed", async () => {
			repository.pending.set("update-1", pendingRow({}));
			const due = await repository.findDuePendingOperations(
				"2024-03-01T10:00:00.000Z",
				10,
			);
			await repository.claimPendingOperation("update-1", "2024-03-01T10:00:00.000Z");
			const findDue = vi
				.spyOn(repository, "findDuePendingOperations")
				.mockResolvedValueOnce(due);

			const counts = await store.processRetryQueue();

			expect(findDue).toHaveBeenCalledTimes(1);
			expect(counts).toMatchObject({ processed: 0, succeeded: 0, skipped: 1 });
			expect(repository.callCount("deleteCurrentLineItems")).toBe(0);
			expect(repository.pending.get("update-1")?.status).toBe("processing");
		});

		it("drains oldest first up to max items", async () => {
			repository.pending.set(
				"newer",
				pendingRow({ update_id: "newer", first_queued_at: "2024-03-01T09:30:00.000Z" }),
			);
			repository.pending.set(
				"older",
				pendingRow({ update_id: "older", first_queued_at: "2024-03-01T08:00:00.000Z" }),
			);

			const counts = await store.processRetryQueue(1);

			expect(counts.succeeded).toBe(1);
			expect(repository.pending.get("older")?.status).toBe("completed");
			expect(repository.pending.get("newer")?.status).toBe("pending");
		});
	});
});
