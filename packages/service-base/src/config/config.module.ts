import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { z } from "zod";
import {
	LOCAL_LOGGING_CONFIG,
	type LoggingConfig,
	type LogTier,
	PRODUCTION_LOGGING_CONFIG,
	parseLogTiers,
} from "../telemetry/log-tier.js";
import { ValidationError } from "./errors.js";

/**
 * Standard environment variable schema for boardsync services
 */
const serviceEnvSchema = z.object({
	// Datadog unified service tags
	DD_ENV: z.string().default("dev"),
	DD_SERVICE: z.string().default("card-sync"),
	DD_VERSION: z.string().default("0.1.0"),

	// Deployment context tags
	BOARDSYNC_TEAM: z.string().default("orders"),
	BOARDSYNC_CLOUD: z.enum(["local", "gcp", "aws", "edge"]).default("local"),
	BOARDSYNC_REGION: z.string().default("local"),
	BOARDSYNC_DOMAIN: z.string().default("trello"),
	BOARDSYNC_STAGE: z.string().default("sync"),

	// Logging
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).optional(),
	LOG_SHIP_TIERS: z.string().optional(),
	LOG_SAMPLE_DEBUG_RATE: z.coerce.number().min(0).max(1).optional(),

	// HTTP
	PORT: z.coerce.number().int().positive().default(8080),
});

export type ServiceEnv = z.infer<typeof serviceEnvSchema>;

export interface ServiceConfig {
	// Service identity
	service: string;
	version: string;
	env: string;

	// Deployment tags
	team: string;
	cloud: string;
	region: string;
	domain: string;
	stage: string;

	// Server
	logLevel: string;
	logging: LoggingConfig;
	port: number;
}

export const SERVICE_CONFIG = "SERVICE_CONFIG";

export interface ServiceConfigOptions {
	envFilePath?: string;
}

function parseShipTiers(raw: string): LogTier[] {
	const { tiers, unknown } = parseLogTiers(raw);
	if (unknown.length > 0) {
		throw new ValidationError("Invalid LOG_SHIP_TIERS", [
			{
				path: "LOG_SHIP_TIERS",
				message: `unknown tiers: ${unknown.join(", ")}`,
			},
		]);
	}
	return tiers;
}

export function loadServiceConfig(
	env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
	const result = serviceEnvSchema.safeParse(env);
	if (!result.success) {
		throw new ValidationError(
			"Invalid service configuration",
			result.error.issues.map((issue) => ({
				path: issue.path.join("."),
				message: issue.message,
			})),
		);
	}
	const parsed = result.data;

	const defaults =
		parsed.DD_ENV === "prod" || parsed.DD_ENV === "production"
			? PRODUCTION_LOGGING_CONFIG
			: LOCAL_LOGGING_CONFIG;

	const logging: LoggingConfig = {
		level: parsed.LOG_LEVEL ?? defaults.level,
		shipTiers: parsed.LOG_SHIP_TIERS
			? parseShipTiers(parsed.LOG_SHIP_TIERS)
			: defaults.shipTiers,
		sampleDebugRate: parsed.LOG_SAMPLE_DEBUG_RATE ?? defaults.sampleDebugRate,
	};

	return {
		service: parsed.DD_SERVICE,
		version: parsed.DD_VERSION,
		env: parsed.DD_ENV,

		team: parsed.BOARDSYNC_TEAM,
		cloud: parsed.BOARDSYNC_CLOUD,
		region: parsed.BOARDSYNC_REGION,
		domain: parsed.BOARDSYNC_DOMAIN,
		stage: parsed.BOARDSYNC_STAGE,

		logLevel: logging.level,
		logging,
		port: parsed.PORT,
	};
}

@Global()
@Module({})
export class ServiceConfigModule {
	static forRoot(options: ServiceConfigOptions = {}): DynamicModule {
		return {
			module: ServiceConfigModule,
			imports: [
				ConfigModule.forRoot({
					...(options.envFilePath && { envFilePath: options.envFilePath }),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: SERVICE_CONFIG,
					useFactory: () => loadServiceConfig(),
				},
			],
			exports: [SERVICE_CONFIG],
		};
	}
}
