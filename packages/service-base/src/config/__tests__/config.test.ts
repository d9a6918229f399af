import { describe, expect, it } from "vitest";
import { LogTier } from "../../telemetry/log-tier.js";
import { loadServiceConfig } from "../config.module.js";
import {
	MissingEnvVarError,
	ValidationError,
	boolFromEnv,
	intFromEnv,
	requireEnv,
} from "../errors.js";

describe("loadServiceConfig", () => {
	it("applies defaults for an empty environment", () => {
		const config = loadServiceConfig({});

		expect(config).toMatchObject({
			service: "card-sync",
			env: "dev",
			cloud: "local",
			port: 8080,
			logLevel: "debug",
		});
		expect(config.logging.sampleDebugRate).toBe(1);
	});

	it("uses production logging defaults in prod", () => {
		const config = loadServiceConfig({ DD_ENV: "prod", PORT: "9000" });

		expect(config.port).toBe(9000);
		expect(config.logging).toEqual({
			level: "info",
			shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
			sampleDebugRate: 0,
		});
	});

	it("honours explicit log settings", () => {
		const config = loadServiceConfig({
			LOG_LEVEL: "warn",
			LOG_SHIP_TIERS: "critical",
			LOG_SAMPLE_DEBUG_RATE: "0.25",
		});

		expect(config.logging).toEqual({
			level: "warn",
			shipTiers: [LogTier.CRITICAL],
			sampleDebugRate: 0.25,
		});
	});

	it("rejects unknown tiers and invalid values", () => {
		expect(() => loadServiceConfig({ LOG_SHIP_TIERS: "loud" })).toThrow(
			ValidationError,
		);
		expect(() => loadServiceConfig({ BOARDSYNC_CLOUD: "moon" })).toThrow(
			ValidationError,
		);
	});
});

describe("env helpers", () => {
	it("requireEnv treats blank values as missing", () => {
		expect(() => requireEnv({ TRELLO_TOKEN: "  " }, "TRELLO_TOKEN")).toThrow(
			MissingEnvVarError,
		);
		expect(requireEnv({ TRELLO_TOKEN: " test-secret " }, "TRELLO_TOKEN")).toBe(
			"test-secret",
		);
	});

	it("intFromEnv falls back and validates", () => {
		expect(intFromEnv({}, "N", 5)).toBe(5);
		expect(intFromEnv({ N: "12" }, "N", 5)).toBe(12);
		expect(() => intFromEnv({ N: "twelve" }, "N", 5)).toThrow(ValidationError);
	});

	it("boolFromEnv accepts common truthy spellings", () => {
		expect(boolFromEnv({ F: "TRUE" }, "F", false)).toBe(true);
		expect(boolFromEnv({ F: "0" }, "F", true)).toBe(false);
		expect(boolFromEnv({}, "F", true)).toBe(true);
	});
});
