#!/usr/bin/env npx tsx
/**
 * Trello Webhook Admin
 *
 * Registers, lists and deletes the webhooks that feed card-sync.
 *
 * Usage:
 *   npx tsx tools/scripts/trello-webhooks.ts boards
 *   npx tsx tools/scripts/trello-webhooks.ts list
 *   npx tsx tools/scripts/trello-webhooks.ts register <board-id> [--callback-url <url>] [--description <text>]
 *   npx tsx tools/scripts/trello-webhooks.ts delete <webhook-id>
 *
 * Reads TRELLO_API_KEY and TRELLO_TOKEN; the callback URL defaults to
 * TRELLO_WEBHOOK_CALLBACK_URL.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Usage or API error
 */

import "reflect-metadata";
import { parseArgs } from "node:util";
import { TelemetryService } from "@boardsync/service-base";
import { TrelloClient } from "../../apps/workers/card-sync/src/trello/trello.client.js";
import { TrelloConfig } from "../../apps/workers/card-sync/src/trello/trello.config.js";

const USAGE = `Usage: trello-webhooks <boards|list|register|delete> [id] [--callback-url <url>] [--description <text>]`;

async function main(): Promise<number> {
	const { positionals, values } = parseArgs({
		allowPositionals: true,
		options: {
			"callback-url": { type: "string" },
			description: { type: "string" },
		},
	});
	const [command, id] = positionals;

	const config = new TrelloConfig();
	const client = new TrelloClient(config, new TelemetryService());

	switch (command) {
		case "boards": {
			const boards = await client.listBoards();
			for (const board of boards) {
				console.log(`${board.id}\t${board.closed ? "closed" : "open"}\t${board.name}`);
			}
			return 0;
		}
		case "list": {
			const webhooks = await client.listWebhooks();
			if (webhooks.length === 0) {
				console.log("No webhooks registered for this token");
			}
			for (const webhook of webhooks) {
				console.log(
					`${webhook.id}\t${webhook.idModel}\t${webhook.active === false ? "inactive" : "active"}\t${webhook.callbackURL}`,
				);
			}
			return 0;
		}
		case "register": {
			const callbackUrl = values["callback-url"] ?? config.callbackUrl;
			if (!id || !callbackUrl) {
				console.error("register needs a board id and a callback URL");
				console.error(USAGE);
				return 1;
			}
			const webhook = await client.registerWebhook(id, callbackUrl, values.description);
			console.log(`Registered webhook ${webhook.id} for ${webhook.idModel} -> ${webhook.callbackURL}`);
			return 0;
		}
		case "delete": {
			if (!id) {
				console.error("delete needs a webhook id");
				console.error(USAGE);
				return 1;
			}
			await client.deleteWebhook(id);
			console.log(`Deleted webhook ${id}`);
			return 0;
		}
		default:
			console.error(USAGE);
			return 1;
	}
}

main().then(
	(code) => process.exit(code),
	(error: unknown) => {
		console.error(error instanceof Error ? error.message : String(error));
		process.exit(1);
	},
);
