import { Injectable } from "@nestjs/common";
import type { EventLogger } from "../telemetry/events.js";

export type CheckStatus = { status: "ok" | "unhealthy"; message?: string };

export interface HealthResponse {
	status: "ok" | "unhealthy";
	timestamp: string;
	checks: Record<string, CheckStatus>;
}

/**
 * A named dependency probe, e.g. a `SELECT 1` against the warehouse
 */
export interface HealthCheck {
	readonly name: string;
	check(): Promise<boolean>;
}

export const HEALTH_CHECKS = "HEALTH_CHECKS";
export const HEALTH_SERVICE = "HEALTH_SERVICE";

@Injectable()
export class HealthService {
	private lastStatus: "healthy" | "unhealthy" | "unknown" = "unknown";

	constructor(
		private readonly healthChecks: HealthCheck[] = [],
		private readonly eventLogger?: EventLogger,
	) {}

	async check(): Promise<HealthResponse> {
		const checks: Record<string, CheckStatus> = {};

		for (const probe of this.healthChecks) {
			try {
				checks[probe.name] = (await probe.check())
					? { status: "ok" }
					: { status: "unhealthy", message: `${probe.name} check failed` };
			} catch (error) {
				checks[probe.name] = {
					status: "unhealthy",
					message:
						error instanceof Error ? error.message : `${probe.name} check failed`,
				};
			}
		}

		const healthy = Object.values(checks).every((c) => c.status === "ok");
		this.recordTransition(healthy, checks);

		return {
			status: healthy ? "ok" : "unhealthy",
			timestamp: new Date().toISOString(),
			checks,
		};
	}

	private recordTransition(
		healthy: boolean,
		checks: Record<string, CheckStatus>,
	): void {
		const current = healthy ? "healthy" : "unhealthy";
		if (current === this.lastStatus) return;

		this.eventLogger?.healthChanged(
			this.lastStatus,
			current,
			Object.fromEntries(
				Object.entries(checks).map(([name, c]) => [name, c.status === "ok"]),
			),
		);
		this.lastStatus = current;
	}
}
