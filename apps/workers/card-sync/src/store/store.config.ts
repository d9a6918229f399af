import { Injectable } from "@nestjs/common";
import { intFromEnv } from "@boardsync/service-base";

export const STORE_CONFIG = "STORE_CONFIG";

/**
 * Retry and pending-queue tuning for the state store
 */
@Injectable()
export class StoreConfig {
	/** In-place retries after a streaming-buffer failure */
	readonly maxImmediateRetries: number;

	readonly initialRetryDelayMs: number;

	/** First queue delay; doubles with every reschedule */
	readonly queueBaseDelayMs: number;

	/** Reschedules before a queued write is marked failed */
	readonly maxQueueRetries: number;

	/** Default max_items for a drain run */
	readonly queueBatchSize: number;

	/** 0 disables the in-process drain schedule */
	readonly drainIntervalMs: number;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.maxImmediateRetries = intFromEnv(env, "STORE_MAX_IMMEDIATE_RETRIES", 2);
		this.initialRetryDelayMs = intFromEnv(env, "STORE_RETRY_DELAY_MS", 2000);
		this.queueBaseDelayMs = intFromEnv(env, "QUEUE_BASE_DELAY_MS", 300000);
		this.maxQueueRetries = intFromEnv(env, "QUEUE_MAX_RETRIES", 5);
		this.queueBatchSize = intFromEnv(env, "QUEUE_BATCH_SIZE", 50);
		this.drainIntervalMs = intFromEnv(env, "QUEUE_DRAIN_INTERVAL_MS", 0);
	}
}
