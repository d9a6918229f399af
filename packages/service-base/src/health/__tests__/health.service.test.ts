import { describe, expect, it, vi } from "vitest";
import type { EventLogger } from "../../telemetry/events.js";
import { type HealthCheck, HealthService } from "../health.service.js";

const probe = (name: string, result: boolean | Error): HealthCheck => ({
	name,
	check: vi.fn(async () => {
		if (result instanceof Error) throw result;
		return result;
	}),
});

describe("HealthService", () => {
	it("is ok with no checks", async () => {
		const result = await new HealthService().check();
		expect(result.status).toBe("ok");
		expect(result.checks).toEqual({});
	});

	it("reports each probe", async () => {
		const service = new HealthService([
			probe("bigquery", true),
			probe("trello", false),
		]);

		const result = await service.check();

		expect(result.status).toBe("unhealthy");
		expect(result.checks).toEqual({
			bigquery: { status: "ok" },
			trello: { status: "unhealthy", message: "trello check failed" },
		});
	});

	it("turns probe errors into unhealthy checks", async () => {
		const service = new HealthService([
			probe("bigquery", new Error("Not found: Dataset")),
		]);

		const result = await service.check();

		expect(result.checks["bigquery"]).toEqual({
			status: "unhealthy",
			message: "Not found: Dataset",
		});
	});

	it("emits health.changed only on transitions", async () => {
		const healthChanged = vi.fn();
		const eventLogger = { healthChanged } as unknown as EventLogger;
		const service = new HealthService([probe("bigquery", true)], eventLogger);

		await service.check();
		await service.check();

		expect(healthChanged).toHaveBeenCalledOnce();
		expect(healthChanged).toHaveBeenCalledWith("unknown", "healthy", {
			bigquery: true,
		});
	});
});
