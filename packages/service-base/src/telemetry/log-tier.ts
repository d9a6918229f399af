/**
 * Log tiers decide which lines are flagged for Datadog indexing (`dd.forward`).
 *
 * critical     always forwarded: failed events, permanently failed queue rows
 * operational  forwarded: webhook receipts, processed events, deferred writes
 * lifecycle    forwarded when configured: startup, shutdown, scheduler state
 * debug        local only unless sampled
 */
export enum LogTier {
	CRITICAL = "critical",
	OPERATIONAL = "operational",
	LIFECYCLE = "lifecycle",
	DEBUG = "debug",
}

export interface LoggingConfig {
	/** pino level */
	level: string;
	shipTiers: LogTier[];
	/** Fraction of debug lines to forward, 0..1 */
	sampleDebugRate: number;
}

export const PRODUCTION_LOGGING_CONFIG: LoggingConfig = {
	level: "info",
	shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
	sampleDebugRate: 0,
};

export const LOCAL_LOGGING_CONFIG: LoggingConfig = {
	level: "debug",
	shipTiers: [
		LogTier.CRITICAL,
		LogTier.OPERATIONAL,
		LogTier.LIFECYCLE,
		LogTier.DEBUG,
	],
	sampleDebugRate: 1,
};

/**
 * Parse a comma-separated tier list such as "critical,operational".
 * Returns the unknown names alongside the parsed tiers.
 */
export function parseLogTiers(raw: string): {
	tiers: LogTier[];
	unknown: string[];
} {
	const tiers: LogTier[] = [];
	const unknown: string[] = [];
	for (const name of raw.split(",")) {
		const value = name.trim().toLowerCase();
		if (!value) continue;
		const tier = Object.values(LogTier).find((t) => t === value);
		if (tier) {
			if (!tiers.includes(tier)) tiers.push(tier);
		} else {
			unknown.push(value);
		}
	}
	return { tiers, unknown };
}

export function shouldForwardLog(
	tier: LogTier,
	config: LoggingConfig,
	traceId?: string,
): { forward: boolean; sampled?: boolean } {
	if (tier === LogTier.CRITICAL) {
		return { forward: true };
	}

	if (!config.shipTiers.includes(tier)) {
		return { forward: false };
	}

	if (tier !== LogTier.DEBUG) {
		return { forward: true };
	}

	if (config.sampleDebugRate <= 0) {
		return { forward: false };
	}
	if (config.sampleDebugRate >= 1) {
		return { forward: true, sampled: true };
	}

	// Same trace, same decision across services
	const sampled = traceId
		? hashToRate(traceId) < config.sampleDebugRate
		: Math.random() < config.sampleDebugRate;
	return { forward: sampled, sampled };
}

function hashToRate(traceId: string): number {
	let hash = 0;
	for (let i = 0; i < traceId.length; i++) {
		hash = (hash << 5) - hash + traceId.charCodeAt(i);
		hash |= 0;
	}
	return Math.abs(hash) / 2147483647;
}
