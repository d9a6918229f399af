// Trello payloads
export {
	trelloRefSchema,
	trelloActionSchema,
	trelloWebhookPayloadSchema,
	trelloLabelSchema,
	trelloAttachmentSchema,
	trelloCommentSchema,
	trelloCardSchema,
	trelloBoardSchema,
	trelloWebhookSchema,
} from "./trello.js";
export type {
	TrelloRef,
	TrelloAction,
	TrelloWebhookPayload,
	TrelloCard,
	TrelloBoard,
	TrelloWebhook,
} from "./trello.js";

// Warehouse rows
export {
	cardRecordSchema,
	currentCardRowSchema,
	lineItemRowSchema,
	PRICE_TYPES,
} from "./storage.js";
export type {
	CardRecord,
	CurrentCardRow,
	MasterCardRow,
	LineItemRow,
	PriceType,
	WebhookEventRow,
	EventOutcome,
} from "./storage.js";

// Pending operation queue
export {
	PENDING_OPERATION_TYPES,
	upsertCardPayloadSchema,
	upsertLineItemsPayloadSchema,
	queuedOperationSchema,
	decodePendingOperation,
} from "./pending.js";
export type {
	PendingOperationType,
	PendingStatus,
	PendingOperation,
	PendingOperationRow,
	UpsertCardPayload,
	UpsertLineItemsPayload,
	QueuedOperation,
	DecodeResult,
} from "./pending.js";
