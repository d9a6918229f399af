import pino from "pino";
import { beforeEach, describe, expect, it } from "vitest";
import { LogTier } from "../log-tier.js";
import { LoggerService } from "../logger.service.js";
import { createTestConfig } from "./test-config.js";

type LogLine = Record<string, unknown>;

/**
 * Real pino writing JSON lines into an array
 */
function createCapturingLogger(
	config = createTestConfig(),
): { logger: LoggerService; lines: LogLine[] } {
	const lines: LogLine[] = [];
	const instance = pino(
		{ level: "trace", formatters: { level: (label) => ({ level: label }) } },
		{
			write(chunk: string) {
				lines.push(JSON.parse(chunk));
			},
		},
	);
	return { logger: new LoggerService(config, instance), lines };
}

describe("LoggerService", () => {
	let logger: LoggerService;
	let lines: LogLine[];

	beforeEach(() => {
		({ logger, lines } = createCapturingLogger());
	});

	describe("tiers", () => {
		it("logs critical at error level with dd.forward", () => {
			logger.critical("Event processing failed", { action_id: "act-1" });

			expect(lines).toHaveLength(1);
			expect(lines[0]).toMatchObject({
				level: "error",
				msg: "Event processing failed",
				tier: LogTier.CRITICAL,
				"dd.forward": true,
				action_id: "act-1",
			});
		});

		it("logs operational and lifecycle at info level", () => {
			logger.operational("Webhook accepted");
			logger.lifecycle("Service started");

			expect(lines.map((l) => [l["level"], l["tier"]])).toEqual([
				["info", LogTier.OPERATIONAL],
				["info", LogTier.LIFECYCLE],
			]);
		});

		it("does not forward debug lines when debug is not shipped", () => {
			logger.debug("Buffer retry", { card_id: "card-1" });

			expect(lines[0]).toMatchObject({
				level: "debug",
				tier: LogTier.DEBUG,
				"dd.forward": false,
			});
		});

		it("marks sampled debug lines", () => {
			const sampled = createCapturingLogger(
				createTestConfig({
					logging: {
						level: "debug",
						shipTiers: [LogTier.DEBUG],
						sampleDebugRate: 1,
					},
				}),
			);

			sampled.logger.debug("Buffer retry", { trace_id: "abc123" });

			expect(sampled.lines[0]).toMatchObject({
				"dd.forward": true,
				"dd.sampled": true,
				dd: { trace_id: "abc123" },
			});
		});

		it("routes tiered() by tier", () => {
			logger.tiered(LogTier.CRITICAL, "a");
			logger.tiered(LogTier.LIFECYCLE, "b");
			logger.tiered(LogTier.DEBUG, "c");

			expect(lines.map((l) => l["level"])).toEqual(["error", "info", "debug"]);
		});
	});

	describe("redaction", () => {
		it("masks e-mail addresses inside values", () => {
			logger.info("Extracted buyer", {
				buyer: "Jane <jane@example.com>",
			});

			expect(lines[0]?.["buyer"]).toBe("Jane <[PII_REDACTED]>");
		});

		it("drops sensitive keys entirely", () => {
			logger.info("Webhook received", {
				raw_payload: "{...}",
				desc: "call 555",
				api_key: "test-secret",
				action_type: "updateCard",
			});

			expect(lines[0]).toMatchObject({
				raw_payload: "[REDACTED]",
				desc: "[REDACTED]",
				api_key: "[REDACTED]",
				action_type: "updateCard",
			});
		});

		it("redacts nested objects and arrays", () => {
			logger.info("Nested", {
				items: [{ email: "a@b.io" }],
				trello: { token: "test-secret" },
			});

			expect(lines[0]?.["items"]).toEqual([{ email: "[PII_REDACTED]" }]);
			expect(lines[0]?.["trello"]).toEqual({ token: "[REDACTED]" });
		});
	});

	it("adds deployment tags to every structured line", () => {
		logger.operational("Message");

		expect(lines[0]).toMatchObject({
			team: "orders",
			domain: "trello",
			stage: "sync",
		});
	});

	it("carries child bindings", () => {
		logger.child({ component: "queue-drain" }).info("Drained");

		expect(lines[0]).toMatchObject({ component: "queue-drain", msg: "Drained" });
	});
});
