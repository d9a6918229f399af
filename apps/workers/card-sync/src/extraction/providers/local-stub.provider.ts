import type {
	CompletionProvider,
	CompletionRequest,
} from "./completion-provider.interface.js";

/**
 * Offline provider for local runs without an API key.
 * Answers every request with an empty JSON array, which extracts no line
 * items and no buyer details.
 */
export class LocalStubCompletionProvider implements CompletionProvider {
	readonly name = "local-stub";
	readonly model = "local-stub-v1";

	async complete(_request: CompletionRequest): Promise<string> {
		return "[]";
	}
}
