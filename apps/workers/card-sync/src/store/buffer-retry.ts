import { isBufferingRestriction } from "@boardsync/service-base";

export interface BufferRetryPolicy {
	/** Extra attempts after the first one */
	maxImmediateRetries: number;
	initialDelayMs: number;
}

export type BufferRetryResult =
	| { status: "applied"; attempts: number }
	| { status: "exhausted"; attempts: number; error: unknown };

export function backoffDelayMs(baseMs: number, attempt: number): number {
	return baseMs * 2 ** attempt;
}

/**
 * Run a write that may hit the streaming-buffer restriction.
 *
 * Buffering failures are retried with exponential backoff until the policy
 * runs out, then reported as exhausted. Any other failure is rethrown at once.
 */
export async function runWithBufferRetry(
	write: () => Promise<void>,
	policy: BufferRetryPolicy,
	sleep: (ms: number) => Promise<void>,
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void,
): Promise<BufferRetryResult> {
	for (let attempt = 0; ; attempt++) {
		try {
			await write();
			return { status: "applied", attempts: attempt + 1 };
		} catch (error) {
			if (!isBufferingRestriction(error)) {
				throw error;
			}
			if (attempt >= policy.maxImmediateRetries) {
				return { status: "exhausted", attempts: attempt + 1, error };
			}
			const delayMs = backoffDelayMs(policy.initialDelayMs, attempt);
			onRetry?.(attempt + 1, delayMs, error);
			await sleep(delayMs);
		}
	}
}
