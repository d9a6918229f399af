import type { BigQuery } from "@google-cloud/bigquery";
import type { HealthCheck } from "@boardsync/service-base";
import { z } from "zod";

export type ParamType =
	| "STRING"
	| "BOOL"
	| "INT64"
	| "FLOAT64"
	| "TIMESTAMP"
	| "DATE";

export interface QueryParam {
	type: ParamType;
	value: string | number | boolean | null;
}

export type QueryParams = Record<string, QueryParam>;

export type Row = Record<string, unknown>;

/**
 * The slice of BigQuery the repository needs: parameterised standard SQL
 * and streaming inserts into one dataset.
 */
export interface QueryRunner {
	/** Fully qualified, backquoted table reference */
	tableRef(table: string): string;
	query(sql: string, params?: QueryParams): Promise<Row[]>;
	/** Runs a DML statement and resolves to the number of rows it changed */
	execute(sql: string, params?: QueryParams): Promise<number>;
	insertRows(table: string, rows: object[]): Promise<void>;
}

/**
 * TIMESTAMP, DATE and DATETIME cells arrive as wrapper objects with a
 * string `value`; unwrap them so rows hold plain strings.
 */
export function normalizeValue(value: unknown): unknown {
	if (
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value) &&
		"value" in value &&
		typeof value.value === "string"
	) {
		return value.value;
	}
	return value;
}

export function normalizeRow(row: object): Row {
	return Object.fromEntries(
		Object.entries(row).map(([key, value]) => [key, normalizeValue(value)]),
	);
}

const dmlStatisticsSchema = z.object({
	statistics: z
		.object({
			query: z
				.object({ numDmlAffectedRows: z.coerce.number().int().optional() })
				.optional(),
		})
		.optional(),
});

export class BigQueryRunner implements QueryRunner {
	constructor(
		private readonly client: BigQuery,
		private readonly projectId: string,
		private readonly datasetId: string,
		private readonly location: string,
	) {}

	tableRef(table: string): string {
		return `\`${this.projectId}.${this.datasetId}.${table}\``;
	}

	async query(sql: string, params: QueryParams = {}): Promise<Row[]> {
		const [rows] = await this.client.query(this.queryOptions(sql, params));
		return rows.map((row: object) => normalizeRow(row));
	}

	async execute(sql: string, params: QueryParams = {}): Promise<number> {
		const [job] = await this.client.createQueryJob(this.queryOptions(sql, params));
		await job.getQueryResults();
		const [metadata] = await job.getMetadata();
		const parsed = dmlStatisticsSchema.safeParse(metadata);
		if (!parsed.success) return 0;
		return parsed.data.statistics?.query?.numDmlAffectedRows ?? 0;
	}

	async insertRows(table: string, rows: object[]): Promise<void> {
		if (rows.length === 0) return;
		await this.client.dataset(this.datasetId).table(table).insert(rows);
	}

	private queryOptions(sql: string, params: QueryParams) {
		const values: Record<string, QueryParam["value"]> = {};
		const types: Record<string, ParamType> = {};
		for (const [name, param] of Object.entries(params)) {
			values[name] = param.value;
			types[name] = param.type;
		}
		return {
			query: sql,
			params: values,
			types,
			location: this.location,
			useLegacySql: false,
		};
	}
}

export class BigQueryHealthCheck implements HealthCheck {
	readonly name = "bigquery";

	constructor(private readonly runner: QueryRunner) {}

	async check(): Promise<boolean> {
		const rows = await this.runner.query("SELECT 1 AS ok");
		return rows.length === 1;
	}
}
