/**
 * Error classification for retry and escalation decisions
 */
export type ErrorClassification = "retryable" | "non_retryable" | "poison";

export class ServiceError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly classification: ErrorClassification,
	) {
		super(message);
		this.name = "ServiceError";
	}
}

export class RetryableServiceError extends ServiceError {
	constructor(message: string, code: string) {
		super(message, code, "retryable");
		this.name = "RetryableServiceError";
	}
}

export class NonRetryableServiceError extends ServiceError {
	constructor(message: string, code: string) {
		super(message, code, "non_retryable");
		this.name = "NonRetryableServiceError";
	}
}

/**
 * BigQuery rejects UPDATE/DELETE/MERGE on rows still in the streaming buffer
 */
const BUFFERING_PATTERNS = [/streaming buffer/i];

/**
 * Patterns that indicate retryable errors
 */
const RETRYABLE_PATTERNS = [
	...BUFFERING_PATTERNS,
	/ECONNREFUSED/i,
	/ETIMEDOUT/i,
	/ENOTFOUND/i,
	/ECONNRESET/i,
	/socket hang up/i,
	/timeout/i,
	/timed out/i,
	/temporarily unavailable/i,
	/rate limit/i,
	/rateLimitExceeded/i,
	/backendError/i,
	/network/i,
];

/**
 * Patterns that indicate poison input (malformed data)
 */
const POISON_PATTERNS = [
	/JSON/i,
	/parse/i,
	/unexpected token/i,
	/invalid.*format/i,
	/schema.*validation/i,
	/missing.*required/i,
];

/**
 * True when the error is BigQuery's streaming-buffer restriction
 */
export function isBufferingRestriction(error: unknown): boolean {
	const message = errorMessage(error);
	return BUFFERING_PATTERNS.some((pattern) => pattern.test(message));
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an error for retry decisions
 */
export function classifyError(error: Error): ErrorClassification {
	// If already classified, use that
	if (error instanceof ServiceError) {
		return error.classification;
	}

	const message = error.message;

	// Buffering messages can quote SQL; check them before the poison patterns
	if (isBufferingRestriction(error)) {
		return "retryable";
	}

	for (const pattern of POISON_PATTERNS) {
		if (pattern.test(message)) {
			return "poison";
		}
	}

	for (const pattern of RETRYABLE_PATTERNS) {
		if (pattern.test(message)) {
			return "retryable";
		}
	}

	return "non_retryable";
}
