import {
	Injectable,
	type LoggerService as NestLoggerService,
} from "@nestjs/common";
import pino, { type Logger as PinoLogger } from "pino";
import type { ServiceConfig } from "../config/config.module.js";
import { EventLogger } from "./events.js";
import { LogTier, shouldForwardLog } from "./log-tier.js";

export const LOGGER = "LOGGER";

/**
 * Values matching these patterns are masked wherever they appear
 */
const PII_PATTERNS = [
	/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

/**
 * Keys whose values are never logged. Card descriptions carry buyer
 * contact details; raw payloads and prompts carry whole descriptions.
 */
const SENSITIVE_KEYS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
	/raw_payload/i,
	/^desc$/i,
	/prompt/i,
];

function redactValue(value: unknown): unknown {
	if (typeof value === "string") {
		let result = value;
		for (const pattern of PII_PATTERNS) {
			result = result.replace(pattern, "[PII_REDACTED]");
		}
		return result;
	}

	if (Array.isArray(value)) {
		return value.map(redactValue);
	}

	if (value instanceof Error) {
		return { name: value.name, message: redactValue(value.message) };
	}

	if (value !== null && typeof value === "object") {
		return redactObject(value);
	}

	return value;
}

export function redactObject(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (SENSITIVE_KEYS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		result[key] = redactValue(value);
	}

	return result;
}

export interface LogContext {
	trace_id?: string;
	span_id?: string;
	action_id?: string;
	card_id?: string;
	update_id?: string;
	stage?: string;
	error_code?: string;
	duration_ms?: number;
	[key: string]: unknown;
}

export interface TieredLogContext extends LogContext {
	tier?: LogTier;
}

function createPino(config: ServiceConfig): PinoLogger {
	// JSON for Datadog; pretty only when asked for
	const isPretty = (process.env["LOG_FORMAT"] ?? "json") === "pretty";

	const options: pino.LoggerOptions = {
		level: config.logLevel,
		base: {
			env: config.env,
			service: config.service,
			version: config.version,
		},
		formatters: {
			level: (label: string) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (isPretty) {
		options.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:standard",
				ignore: "pid,hostname",
			},
		};
	}

	return pino(options);
}

@Injectable()
export class LoggerService implements NestLoggerService {
	private readonly pino: PinoLogger;
	private readonly baseTags: Record<string, string>;

	constructor(
		private readonly config: ServiceConfig,
		instance?: PinoLogger,
	) {
		this.baseTags = {
			team: config.team,
			cloud: config.cloud,
			region: config.region,
			domain: config.domain,
			stage: config.stage,
		};
		this.pino = instance ?? createPino(config);
	}

	private formatContext(
		context?: TieredLogContext,
		defaultTier: LogTier = LogTier.OPERATIONAL,
	): Record<string, unknown> {
		const base = { ...this.baseTags };

		if (!context) {
			const { forward } = shouldForwardLog(defaultTier, this.config.logging);
			return {
				...base,
				tier: defaultTier,
				"dd.forward": forward,
			};
		}

		const { tier = defaultTier, ...rest } = context;
		const { forward, sampled } = shouldForwardLog(
			tier,
			this.config.logging,
			context.trace_id,
		);

		return {
			...base,
			...redactObject(rest),
			tier,
			"dd.forward": forward,
			...(sampled !== undefined && { "dd.sampled": sampled }),
			...(context.trace_id && {
				dd: { trace_id: context.trace_id, span_id: context.span_id },
			}),
		};
	}

	log(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.info({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.info(this.formatContext(context), message);
		}
	}

	error(message: string, trace?: string, context?: LogContext | string): void {
		if (typeof context === "string" || context === undefined) {
			this.pino.error(
				{ ...this.baseTags, nestContext: context, stack: trace },
				message,
			);
			return;
		}
		this.pino.error(
			{ ...this.formatContext(context, LogTier.CRITICAL), stack: trace },
			message,
		);
	}

	warn(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.warn({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.warn(this.formatContext(context), message);
		}
	}

	debug(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.debug({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.debug(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	verbose(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.trace({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.trace(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	info(message: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), message);
	}

	/**
	 * Child logger with bindings attached to every line (redacted once here)
	 */
	child(bindings: Record<string, unknown>): LoggerService {
		return new LoggerService(
			this.config,
			this.pino.child(redactObject(bindings)),
		);
	}

	/** Always forwarded. Failed events, permanently failed queue rows. */
	critical(message: string, context?: LogContext): void {
		this.pino.error(
			this.formatContext(
				{ ...context, tier: LogTier.CRITICAL },
				LogTier.CRITICAL,
			),
			message,
		);
	}

	operational(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.OPERATIONAL },
				LogTier.OPERATIONAL,
			),
			message,
		);
	}

	lifecycle(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.LIFECYCLE },
				LogTier.LIFECYCLE,
			),
			message,
		);
	}

	tiered(tier: LogTier, message: string, context?: LogContext): void {
		const formatted = this.formatContext({ ...context, tier }, tier);

		switch (tier) {
			case LogTier.CRITICAL:
				this.pino.error(formatted, message);
				break;
			case LogTier.OPERATIONAL:
			case LogTier.LIFECYCLE:
				this.pino.info(formatted, message);
				break;
			case LogTier.DEBUG:
				this.pino.debug(formatted, message);
				break;
		}
	}

	createEventLogger(): EventLogger {
		return new EventLogger(this, this.config);
	}
}
