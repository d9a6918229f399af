import type { ServiceConfig } from "../../config/config.module.js";
import { LogTier } from "../log-tier.js";

export const createTestConfig = (
	overrides: Partial<ServiceConfig> = {},
): ServiceConfig => ({
	service: "card-sync",
	version: "1.0.0",
	env: "production",
	team: "orders",
	cloud: "gcp",
	region: "us-central1",
	domain: "trello",
	stage: "sync",
	logLevel: "debug",
	port: 8080,
	logging: {
		level: "debug",
		shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
		sampleDebugRate: 0,
	},
	...overrides,
});
