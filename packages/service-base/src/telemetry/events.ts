/**
 * EventLogger - structured event logging for Datadog
 */

import { Injectable } from "@nestjs/common";
import type { ServiceConfig } from "../config/config.module.js";
import type {
	BaseEvent,
	BoardsyncEvent,
	EventFailedEvent,
	EventProcessedEvent,
	HealthChangedEvent,
	QueueDrainedEvent,
	QueueItemFailedEvent,
	ServiceShutdownCompletedEvent,
	ServiceShutdownInitiatedEvent,
	ServiceStartedEvent,
	ServiceTags,
	WebhookAcceptedEvent,
	WebhookDuplicateEvent,
	WriteDeferredEvent,
} from "./events.types.js";
import type { LoggerService } from "./logger.service.js";

export const EVENT_LOGGER = "EVENT_LOGGER";

function createBaseEvent<T extends string>(event: T): BaseEvent & { event: T } {
	return {
		event,
		timestamp: new Date().toISOString(),
		"dd.forward": true,
	};
}

export interface DrainCounts {
	processed: number;
	succeeded: number;
	failed: number;
	skipped: number;
	rescheduled: number;
}

@Injectable()
export class EventLogger {
	private readonly baseTags: ServiceTags;

	constructor(
		private readonly logger: LoggerService,
		config: ServiceConfig,
	) {
		this.baseTags = {
			service: config.service,
			version: config.version,
			env: config.env,
			team: config.team,
			cloud: config.cloud,
			region: config.region,
			domain: config.domain,
			stage: config.stage,
		};
	}

	private emit(event: BoardsyncEvent): void {
		this.logger.info(event.event, { ...this.baseTags, ...event });
	}

	// ==========================================================================
	// Service lifecycle
	// ==========================================================================

	serviceStarted(port: number, features: Record<string, boolean | string>): void {
		const event: ServiceStartedEvent = {
			...createBaseEvent("boardsync.service.started"),
			service: this.baseTags.service,
			version: this.baseTags.version,
			env: this.baseTags.env,
			port,
			features,
		};
		this.emit(event);
	}

	serviceShutdownInitiated(inFlightCount: number, signal?: string): void {
		const event: ServiceShutdownInitiatedEvent = {
			...createBaseEvent("boardsync.service.shutdown.initiated"),
			service: this.baseTags.service,
			in_flight_count: inFlightCount,
		};
		if (signal) event.signal = signal;
		this.emit(event);
	}

	serviceShutdownCompleted(
		durationMs: number,
		reason: "graceful" | "error" | "signal",
	): void {
		const event: ServiceShutdownCompletedEvent = {
			...createBaseEvent("boardsync.service.shutdown.completed"),
			service: this.baseTags.service,
			duration_ms: durationMs,
			reason,
		};
		this.emit(event);
	}

	// ==========================================================================
	// Webhook processing
	// ==========================================================================

	webhookAccepted(actionId: string, actionType: string, cardId?: string): void {
		const event: WebhookAcceptedEvent = {
			...createBaseEvent("boardsync.webhook.accepted"),
			action_id: actionId,
			action_type: actionType,
		};
		if (cardId) event.card_id = cardId;
		this.emit(event);
	}

	webhookDuplicate(actionId: string, actionType: string): void {
		const event: WebhookDuplicateEvent = {
			...createBaseEvent("boardsync.webhook.duplicate"),
			action_id: actionId,
			action_type: actionType,
		};
		this.emit(event);
	}

	eventProcessed(
		actionId: string,
		actionType: string,
		durationMs: number,
		options: {
			cardId?: string;
			eventType?: string;
			extractionTriggered: boolean;
		},
	): void {
		const event: EventProcessedEvent = {
			...createBaseEvent("boardsync.event.processed"),
			action_id: actionId,
			action_type: actionType,
			extraction_triggered: options.extractionTriggered,
			duration_ms: durationMs,
			...(options.cardId && { card_id: options.cardId }),
			...(options.eventType && { event_type: options.eventType }),
		};
		this.emit(event);
	}

	eventFailed(
		actionId: string,
		actionType: string,
		classification: string,
		errorMessage: string,
		durationMs: number,
		cardId?: string,
	): void {
		const event: EventFailedEvent = {
			...createBaseEvent("boardsync.event.failed"),
			action_id: actionId,
			action_type: actionType,
			error_classification: classification,
			error_message: errorMessage,
			duration_ms: durationMs,
		};
		if (cardId) event.card_id = cardId;
		this.emit(event);
	}

	// ==========================================================================
	// Storage
	// ==========================================================================

	writeDeferred(
		updateId: string,
		operationType: string,
		targetTable: string,
		cardId: string,
		attempts: number,
	): void {
		const event: WriteDeferredEvent = {
			...createBaseEvent("boardsync.write.deferred"),
			update_id: updateId,
			operation_type: operationType,
			target_table: targetTable,
			card_id: cardId,
			attempts,
		};
		this.emit(event);
	}

	queueDrained(counts: DrainCounts, durationMs: number): void {
		const event: QueueDrainedEvent = {
			...createBaseEvent("boardsync.queue.drained"),
			...counts,
			duration_ms: durationMs,
		};
		this.emit(event);
	}

	queueItemFailed(
		updateId: string,
		operationType: string,
		retryCount: number,
		errorMessage: string,
	): void {
		const event: QueueItemFailedEvent = {
			...createBaseEvent("boardsync.queue.item_failed"),
			update_id: updateId,
			operation_type: operationType,
			retry_count: retryCount,
			error_message: errorMessage,
		};
		this.emit(event);
	}

	// ==========================================================================
	// Health
	// ==========================================================================

	healthChanged(
		previousStatus: "healthy" | "unhealthy" | "unknown",
		currentStatus: "healthy" | "unhealthy",
		checks: Record<string, boolean>,
	): void {
		const event: HealthChangedEvent = {
			...createBaseEvent("boardsync.health.changed"),
			service: this.baseTags.service,
			previous_status: previousStatus,
			current_status: currentStatus,
			checks,
		};
		this.emit(event);
	}
}
