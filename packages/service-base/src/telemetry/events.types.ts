/**
 * Structured event types for Datadog
 *
 * Events carry `dd.forward: true` so they are always indexed, and follow the
 * `boardsync.<domain>.<action>` naming convention.
 */

/**
 * Service identification tags included in all events
 */
export interface ServiceTags {
	service: string;
	version: string;
	env: string;
	team: string;
	cloud: string;
	region: string;
	domain: string;
	stage: string;
}

export interface BaseEvent {
	event: string;
	/** ISO 8601 timestamp */
	timestamp: string;
	"dd.forward": true;
}

// ============================================================================
// Service lifecycle
// ============================================================================

export interface ServiceStartedEvent extends BaseEvent {
	event: "boardsync.service.started";
	service: string;
	version: string;
	env: string;
	port: number;
	features: Record<string, boolean | string>;
}

export interface ServiceShutdownInitiatedEvent extends BaseEvent {
	event: "boardsync.service.shutdown.initiated";
	service: string;
	signal?: string;
	in_flight_count: number;
}

export interface ServiceShutdownCompletedEvent extends BaseEvent {
	event: "boardsync.service.shutdown.completed";
	service: string;
	duration_ms: number;
	reason: "graceful" | "error" | "signal";
}

// ============================================================================
// Webhook processing
// ============================================================================

export interface WebhookAcceptedEvent extends BaseEvent {
	event: "boardsync.webhook.accepted";
	action_id: string;
	action_type: string;
	card_id?: string;
}

export interface WebhookDuplicateEvent extends BaseEvent {
	event: "boardsync.webhook.duplicate";
	action_id: string;
	action_type: string;
}

export interface EventProcessedEvent extends BaseEvent {
	event: "boardsync.event.processed";
	action_id: string;
	action_type: string;
	card_id?: string;
	event_type?: string;
	extraction_triggered: boolean;
	duration_ms: number;
}

export interface EventFailedEvent extends BaseEvent {
	event: "boardsync.event.failed";
	action_id: string;
	action_type: string;
	card_id?: string;
	error_classification: string;
	error_message: string;
	duration_ms: number;
}

// ============================================================================
// Storage
// ============================================================================

export interface WriteDeferredEvent extends BaseEvent {
	event: "boardsync.write.deferred";
	update_id: string;
	operation_type: string;
	target_table: string;
	card_id: string;
	attempts: number;
}

export interface QueueDrainedEvent extends BaseEvent {
	event: "boardsync.queue.drained";
	processed: number;
	succeeded: number;
	failed: number;
	skipped: number;
	rescheduled: number;
	duration_ms: number;
}

export interface QueueItemFailedEvent extends BaseEvent {
	event: "boardsync.queue.item_failed";
	update_id: string;
	operation_type: string;
	retry_count: number;
	error_message: string;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthChangedEvent extends BaseEvent {
	event: "boardsync.health.changed";
	service: string;
	previous_status: "healthy" | "unhealthy" | "unknown";
	current_status: "healthy" | "unhealthy";
	checks: Record<string, boolean>;
}

export type BoardsyncEvent =
	| ServiceStartedEvent
	| ServiceShutdownInitiatedEvent
	| ServiceShutdownCompletedEvent
	| WebhookAcceptedEvent
	| WebhookDuplicateEvent
	| EventProcessedEvent
	| EventFailedEvent
	| WriteDeferredEvent
	| QueueDrainedEvent
	| QueueItemFailedEvent
	| HealthChangedEvent;

export type EventName = BoardsyncEvent["event"];
