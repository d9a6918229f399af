import {
	type BeforeApplicationShutdown,
	Injectable,
	type OnApplicationShutdown,
} from "@nestjs/common";
import type { EventLogger } from "../telemetry/events.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT" | "ERROR";

type ShutdownCallback = () => Promise<void>;

@Injectable()
export class LifecycleService
	implements OnApplicationShutdown, BeforeApplicationShutdown
{
	private readonly shutdownCallbacks: ShutdownCallback[] = [];
	private readonly inFlightSources: Array<() => number> = [];
	private isShuttingDown = false;
	private shutdownStartTime?: number;
	private shutdownSignal?: string;

	constructor(
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly eventLogger: EventLogger,
		installProcessHandlers = true,
	) {
		if (installProcessHandlers) {
			process.on("SIGTERM", () => this.handleSignal("SIGTERM"));
			process.on("SIGINT", () => this.handleSignal("SIGINT"));
			process.on("uncaughtException", (error) =>
				this.handleFatal("Uncaught exception", error),
			);
			process.on("unhandledRejection", (reason) =>
				this.handleFatal("Unhandled rejection", reason),
			);
		}
	}

	/**
	 * Report work still running (detached webhook tasks) in shutdown events
	 */
	registerInFlightSource(source: () => number): void {
		this.inFlightSources.push(source);
	}

	/**
	 * Callbacks run in reverse registration order
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	isShutdownInProgress(): boolean {
		return this.isShuttingDown;
	}

	inFlightCount(): number {
		return this.inFlightSources.reduce((sum, source) => sum + source(), 0);
	}

	async beforeApplicationShutdown(signal?: string): Promise<void> {
		this.isShuttingDown = true;
		this.shutdownStartTime = Date.now();
		this.shutdownSignal = signal ?? this.shutdownSignal;
		this.eventLogger.serviceShutdownInitiated(
			this.inFlightCount(),
			this.shutdownSignal,
		);
		this.telemetry.increment("service.shutdown_started");
	}

	async onApplicationShutdown(): Promise<void> {
		let failed = false;
		for (const callback of [...this.shutdownCallbacks].reverse()) {
			try {
				await callback();
			} catch (error) {
				failed = true;
				this.logger.error(
					"Shutdown callback failed",
					error instanceof Error ? error.stack : String(error),
				);
			}
		}

		const durationMs = this.shutdownStartTime
			? Date.now() - this.shutdownStartTime
			: 0;
		const reason = failed ? "error" : this.shutdownSignal ? "signal" : "graceful";
		this.eventLogger.serviceShutdownCompleted(durationMs, reason);
		this.telemetry.increment("service.shutdown_completed");
	}

	private handleSignal(signal: ShutdownSignal): void {
		if (this.isShuttingDown) {
			return;
		}
		this.shutdownSignal = signal;
		this.telemetry.increment("service.signal_received", 1, { signal });
	}

	private handleFatal(message: string, reason: unknown): void {
		const stack = reason instanceof Error ? reason.stack : String(reason);
		this.logger.critical(message, {
			error_message: reason instanceof Error ? reason.message : String(reason),
			stack,
		});
		this.telemetry.increment("service.fatal_error");

		// Let pino flush before exiting
		setTimeout(() => {
			process.exit(1);
		}, 1000);
	}
}
