export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class MissingEnvVarError extends ConfigError {
	constructor(
		public readonly variableName: string,
		public readonly description?: string,
	) {
		super(
			`Missing required environment variable: ${variableName}${
				description ? ` (${description})` : ""
			}`,
		);
		this.name = "MissingEnvVarError";
	}
}

export class ValidationError extends ConfigError {
	constructor(
		message: string,
		public readonly errors: Array<{ path: string; message: string }>,
	) {
		super(message);
		this.name = "ValidationError";
	}
}

/**
 * Read a required variable, treating blank values as missing.
 */
export function requireEnv(
	env: NodeJS.ProcessEnv,
	name: string,
	description?: string,
): string {
	const value = env[name]?.trim();
	if (!value) {
		throw new MissingEnvVarError(name, description);
	}
	return value;
}

export function intFromEnv(
	env: NodeJS.ProcessEnv,
	name: string,
	fallback: number,
): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed)) {
		throw new ValidationError(`Invalid integer for ${name}`, [
			{ path: name, message: `expected an integer, got "${raw}"` },
		]);
	}
	return parsed;
}

export function boolFromEnv(
	env: NodeJS.ProcessEnv,
	name: string,
	fallback: boolean,
): boolean {
	const raw = env[name]?.trim().toLowerCase();
	if (raw === undefined || raw === "") return fallback;
	return raw === "true" || raw === "1" || raw === "yes";
}
