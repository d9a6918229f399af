import { z } from "zod";

/**
 * Trello webhook and REST payloads, decoded at the boundary.
 *
 * Objects pass unknown keys through so the stored raw payload stays complete.
 */

/** `{id, name}` reference as it appears inside `action.data` */
export const trelloRefSchema = z
	.object({
		id: z.string(),
		name: z.string().optional(),
	})
	.passthrough();

export type TrelloRef = z.infer<typeof trelloRefSchema>;

export const trelloActionSchema = z
	.object({
		/** Action id, the idempotency key */
		id: z.string().min(1),
		/** createCard, updateCard, deleteCard, commentCard, ... */
		type: z.string().min(1),
		date: z.string().optional(),
		data: z
			.object({
				card: trelloRefSchema.optional(),
				board: trelloRefSchema.optional(),
				list: trelloRefSchema.optional(),
				listBefore: trelloRefSchema.optional(),
				listAfter: trelloRefSchema.optional(),
				/** Previous values of the fields an update touched */
				old: z.record(z.unknown()).optional(),
			})
			.passthrough()
			.default({}),
		memberCreator: z
			.object({
				id: z.string(),
				username: z.string().optional(),
				fullName: z.string().optional(),
			})
			.passthrough()
			.optional(),
	})
	.passthrough();

export type TrelloAction = z.infer<typeof trelloActionSchema>;

export const trelloWebhookPayloadSchema = z
	.object({
		action: trelloActionSchema,
		model: z.record(z.unknown()).optional(),
	})
	.passthrough();

export type TrelloWebhookPayload = z.infer<typeof trelloWebhookPayloadSchema>;

export const trelloLabelSchema = z
	.object({
		id: z.string().optional(),
		name: z.string().nullable().optional(),
		color: z.string().nullable().optional(),
	})
	.passthrough();

export const trelloAttachmentSchema = z
	.object({
		id: z.string(),
		name: z.string().nullable().optional(),
		url: z.string().nullable().optional(),
		mimeType: z.string().nullable().optional(),
	})
	.passthrough();

export const trelloCommentSchema = z
	.object({
		id: z.string(),
		type: z.string(),
		date: z.string().optional(),
		data: z
			.object({ text: z.string().optional() })
			.passthrough()
			.optional(),
	})
	.passthrough();

/**
 * Full card body from `GET /cards/{id}?fields=all&attachments=true&actions=commentCard`
 */
export const trelloCardSchema = z
	.object({
		id: z.string().min(1),
		name: z.string().default(""),
		desc: z.string().default(""),
		closed: z.boolean().default(false),
		idList: z.string().nullable().optional(),
		idBoard: z.string().nullable().optional(),
		dateLastActivity: z.string().nullable().optional(),
		labels: z.array(trelloLabelSchema).default([]),
		attachments: z.array(trelloAttachmentSchema).optional(),
		actions: z.array(trelloCommentSchema).optional(),
	})
	.passthrough();

export type TrelloCard = z.infer<typeof trelloCardSchema>;

export const trelloBoardSchema = z
	.object({
		id: z.string(),
		name: z.string(),
		closed: z.boolean().optional(),
		url: z.string().optional(),
	})
	.passthrough();

export type TrelloBoard = z.infer<typeof trelloBoardSchema>;

export const trelloWebhookSchema = z
	.object({
		id: z.string(),
		idModel: z.string(),
		callbackURL: z.string(),
		description: z.string().nullable().optional(),
		active: z.boolean().optional(),
	})
	.passthrough();

export type TrelloWebhook = z.infer<typeof trelloWebhookSchema>;
