import {
	type DrainCounts,
	type LoggerService,
	errorMessage,
} from "@boardsync/service-base";
import type { OnApplicationBootstrap, OnModuleDestroy } from "@nestjs/common";
import type { StateStore } from "../store/state-store.service.js";
import type { StoreConfig } from "../store/store.config.js";

export const QUEUE_DRAIN = "QUEUE_DRAIN";

/**
 * Single-runner front for StateStore.processRetryQueue. Triggers that
 * arrive while a drain runs join it instead of starting a second one,
 * and get the counts of that drain's batch, not of their own max_items.
 */
export class QueueDrainService implements OnApplicationBootstrap, OnModuleDestroy {
	private running: Promise<DrainCounts> | null = null;
	private runningMaxItems = 0;
	private timer: NodeJS.Timeout | null = null;

	constructor(
		private readonly store: StateStore,
		private readonly config: StoreConfig,
		private readonly logger: LoggerService,
	) {}

	drain(maxItems: number = this.config.queueBatchSize): Promise<DrainCounts> {
		if (this.running) {
			this.logger.debug("Queue drain already running, joining it", {
				running_max_items: this.runningMaxItems,
				requested_max_items: maxItems,
			});
			return this.running;
		}

		const run = this.store.processRetryQueue(maxItems).finally(() => {
			this.running = null;
		});
		this.running = run;
		this.runningMaxItems = maxItems;
		return run;
	}

	isRunning(): boolean {
		return this.running !== null;
	}

	onApplicationBootstrap(): void {
		if (this.config.drainIntervalMs <= 0) {
			return;
		}

		this.timer = setInterval(() => {
			this.drain().catch((error: unknown) => {
				this.logger.error("Scheduled queue drain failed", undefined, {
					error: errorMessage(error),
				});
			});
		}, this.config.drainIntervalMs);
		this.timer.unref();
		this.logger.info("Queue drain scheduled", {
			interval_ms: this.config.drainIntervalMs,
		});
	}

	onModuleDestroy(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}
}
