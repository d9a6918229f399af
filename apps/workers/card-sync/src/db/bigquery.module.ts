import { BigQuery } from "@google-cloud/bigquery";
import {
	HEALTH_CHECKS,
	LOGGER,
	type LoggerService,
} from "@boardsync/service-base";
import { type DynamicModule, Module } from "@nestjs/common";
import { BIGQUERY_CONFIG, BigQueryConfig } from "./bigquery.config.js";
import {
	BigQueryHealthCheck,
	BigQueryRunner,
	type QueryRunner,
} from "./bigquery.client.js";
import { BigQueryCardRepository, CARD_REPOSITORY } from "./card.repository.js";

export const BIGQUERY_RUNNER = "BIGQUERY_RUNNER";

@Module({})
export class BigQueryModule {
	static forRoot(): DynamicModule {
		return {
			module: BigQueryModule,
			global: true,
			providers: [
				{
					provide: BIGQUERY_CONFIG,
					useFactory: () => new BigQueryConfig(),
				},
				{
					provide: BIGQUERY_RUNNER,
					useFactory: (
						config: BigQueryConfig,
						logger: LoggerService,
					): QueryRunner => {
						logger.info("Using BigQuery dataset", {
							project_id: config.projectId,
							dataset: config.datasetId,
							location: config.location,
						});
						const client = new BigQuery({
							projectId: config.projectId,
							location: config.location,
						});
						return new BigQueryRunner(
							client,
							config.projectId,
							config.datasetId,
							config.location,
						);
					},
					inject: [BIGQUERY_CONFIG, LOGGER],
				},
				{
					provide: CARD_REPOSITORY,
					useFactory: (runner: QueryRunner, config: BigQueryConfig) =>
						new BigQueryCardRepository(runner, config.tables),
					inject: [BIGQUERY_RUNNER, BIGQUERY_CONFIG],
				},
				{
					provide: HEALTH_CHECKS,
					useFactory: (runner: QueryRunner) => [new BigQueryHealthCheck(runner)],
					inject: [BIGQUERY_RUNNER],
				},
			],
			exports: [BIGQUERY_CONFIG, BIGQUERY_RUNNER, CARD_REPOSITORY, HEALTH_CHECKS],
		};
	}
}
