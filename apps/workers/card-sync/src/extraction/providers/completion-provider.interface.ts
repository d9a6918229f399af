/**
 * Text-completion backend used for line-item extraction
 */
export interface CompletionRequest {
	system: string;
	prompt: string;
	maxTokens: number;
}

export interface CompletionProvider {
	readonly name: string;
	readonly model: string;

	/**
	 * Returns the model's text output; throws on transport or API errors
	 */
	complete(request: CompletionRequest): Promise<string>;
}

export const COMPLETION_PROVIDER = "COMPLETION_PROVIDER";
