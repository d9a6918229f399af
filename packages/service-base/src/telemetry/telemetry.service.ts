import { createRequire } from "node:module";
import { Injectable } from "@nestjs/common";
import type { Span, Tracer } from "dd-trace";
import type { ServiceConfig } from "../config/config.module.js";

const require = createRequire(import.meta.url);

const METRIC_PREFIX = "boardsync";

function isTracer(value: unknown): value is Tracer {
	return (
		typeof value === "object" &&
		value !== null &&
		"init" in value &&
		typeof value.init === "function" &&
		"trace" in value
	);
}

/**
 * dd-trace may be absent or disabled (tests, local runs); every method is a
 * no-op without it.
 */
function loadTracer(): Tracer | null {
	if (process.env["DD_TRACE_ENABLED"] === "false") return null;
	try {
		const loaded: unknown = require("dd-trace");
		return isTracer(loaded) ? loaded : null;
	} catch (error) {
		console.warn(
			"dd-trace not available, tracing disabled:",
			error instanceof Error ? error.message : String(error),
		);
		return null;
	}
}

@Injectable()
export class TelemetryService {
	private tracer: Tracer | null = null;
	private baseTags: Record<string, string> = {};

	initialize(config: ServiceConfig, tracer: Tracer | null = loadTracer()): void {
		this.baseTags = {
			env: config.env,
			service: config.service,
			version: config.version,
			team: config.team,
			cloud: config.cloud,
			region: config.region,
			domain: config.domain,
			stage: config.stage,
		};

		this.tracer =
			tracer?.init({
				service: config.service,
				version: config.version,
				env: config.env,
				logInjection: true,
				runtimeMetrics: true,
			}) ?? null;
	}

	getCurrentSpan(): Span | undefined {
		return this.tracer?.scope().active() ?? undefined;
	}

	/**
	 * Low cardinality tags only: never card or action ids
	 */
	getMetricTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.increment(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.gauge(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	timing(name: string, durationMs: number, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.histogram(
			`${METRIC_PREFIX}.${name}`,
			durationMs,
			this.getMetricTags(tags),
		);
	}

	async withSpan<T>(
		name: string,
		tags: Record<string, string>,
		fn: () => Promise<T>,
	): Promise<T> {
		const tracer = this.tracer;
		if (!tracer) {
			return fn();
		}

		return tracer.trace(name, { tags }, async (span) => {
			try {
				return await fn();
			} catch (error) {
				span?.setTag("error", true);
				if (error instanceof Error) {
					span?.setTag("error.message", error.message);
				}
				throw error;
			}
		});
	}

	getTraceContext(): { trace_id?: string; span_id?: string } {
		const span = this.getCurrentSpan();
		if (!span) return {};

		const context = span.context();
		return {
			trace_id: context.toTraceId(),
			span_id: context.toSpanId(),
		};
	}
}
