import {
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Inject,
	ServiceUnavailableException,
} from "@nestjs/common";
import {
	HEALTH_SERVICE,
	type HealthResponse,
	type HealthService,
} from "./health.service.js";

@Controller("health")
export class HealthController {
	constructor(
		@Inject(HEALTH_SERVICE) private readonly healthService: HealthService,
	) {}

	/**
	 * Liveness probe: the process is up
	 */
	@Get("live")
	@HttpCode(HttpStatus.OK)
	liveness(): { status: "ok" } {
		return { status: "ok" };
	}

	/**
	 * Readiness probe: dependencies answer
	 */
	@Get("ready")
	async readiness(): Promise<HealthResponse> {
		const result = await this.healthService.check();

		if (result.status === "unhealthy") {
			throw new ServiceUnavailableException(result);
		}

		return result;
	}

	@Get()
	async getHealth(): Promise<HealthResponse> {
		return this.healthService.check();
	}
}
