import { Injectable } from "@nestjs/common";
import { requireEnv } from "@boardsync/service-base";

export const BIGQUERY_CONFIG = "BIGQUERY_CONFIG";

export interface TableNames {
	events: string;
	cardsMaster: string;
	cardsCurrent: string;
	lineItemsMaster: string;
	lineItemsCurrent: string;
	pendingUpdates: string;
}

export const DEFAULT_TABLE_NAMES: TableNames = {
	events: "trello_webhook_events",
	cardsMaster: "cards_master",
	cardsCurrent: "cards_current",
	lineItemsMaster: "line_items_master",
	lineItemsCurrent: "line_items_current",
	pendingUpdates: "pending_bigquery_updates",
};

/**
 * BigQuery location of the order tables. Credentials come from
 * GOOGLE_APPLICATION_CREDENTIALS or the runtime's default service account.
 */
@Injectable()
export class BigQueryConfig {
	readonly projectId: string;

	readonly datasetId: string;

	/** Job location, e.g. US or us-central1 */
	readonly location: string;

	readonly tables: TableNames;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.projectId =
			env["BIGQUERY_PROJECT_ID"]?.trim() ||
			requireEnv(env, "GOOGLE_CLOUD_PROJECT", "or set BIGQUERY_PROJECT_ID");
		this.datasetId = env["BIGQUERY_DATASET"] ?? "trello_orders";
		this.location = env["BIGQUERY_LOCATION"] ?? "US";
		this.tables = {
			events: env["BIGQUERY_TABLE_EVENTS"] ?? DEFAULT_TABLE_NAMES.events,
			cardsMaster:
				env["BIGQUERY_TABLE_CARDS_MASTER"] ?? DEFAULT_TABLE_NAMES.cardsMaster,
			cardsCurrent:
				env["BIGQUERY_TABLE_CARDS_CURRENT"] ?? DEFAULT_TABLE_NAMES.cardsCurrent,
			lineItemsMaster:
				env["BIGQUERY_TABLE_LINE_ITEMS_MASTER"] ??
				DEFAULT_TABLE_NAMES.lineItemsMaster,
			lineItemsCurrent:
				env["BIGQUERY_TABLE_LINE_ITEMS_CURRENT"] ??
				DEFAULT_TABLE_NAMES.lineItemsCurrent,
			pendingUpdates:
				env["BIGQUERY_TABLE_PENDING_UPDATES"] ??
				DEFAULT_TABLE_NAMES.pendingUpdates,
		};
	}
}
