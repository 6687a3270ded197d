import { z } from "zod";
import { type GuardEvent, IGNORED_EVENT } from "../types/events.js";

/**
 * OneBot sends ids as numbers, some bridges as strings; 0 and blanks mean "absent"
 */
const normalizeId = (value: string | number | null | undefined): string => {
	if (value === null || value === undefined || value === 0) {
		return "";
	}
	return String(value).trim();
};

const OneBotId = z.union([z.string(), z.number().finite()]).nullish().transform(normalizeId);

const GroupDecreaseSchema = z.object({
	post_type: z.literal("notice"),
	notice_type: z.literal("group_decrease"),
	group_id: OneBotId,
	user_id: OneBotId,
});

const GroupRequestSchema = z.object({
	post_type: z.literal("request"),
	request_type: z.literal("group"),
	group_id: OneBotId,
	user_id: OneBotId,
	flag: OneBotId,
	sub_type: z.string().nullish(),
});

const GroupCommandSchema = z.object({
	post_type: z.literal("message"),
	message_type: z.literal("group"),
	group_id: OneBotId,
	raw_message: z.string(),
});

/**
 * Decodes a OneBot v11 raw event into a guard event
 * `fallbackGroupId` is the group id known from the enclosing message, used when
 * the payload omits one. Anything that is not a complete group-decrease notice
 * or group join request is ignored.
 */
export const classifyOneBotPayload = (raw: unknown, fallbackGroupId?: string): GuardEvent => {
	const fallback = normalizeId(fallbackGroupId);

	const decrease = GroupDecreaseSchema.safeParse(raw);
	if (decrease.success) {
		const groupId = decrease.data.group_id || fallback;
		const userId = decrease.data.user_id;
		if (!groupId || !userId) {
			return IGNORED_EVENT;
		}
		return { kind: "leave", groupId, userId };
	}

	const request = GroupRequestSchema.safeParse(raw);
	if (request.success) {
		const groupId = request.data.group_id || fallback;
		const { user_id: userId, flag } = request.data;
		if (!groupId || !userId || !flag) {
			return IGNORED_EVENT;
		}
		return {
			kind: "join-request",
			groupId,
			userId,
			flag,
			subType: request.data.sub_type || "add",
		};
	}

	return IGNORED_EVENT;
};

export interface OneBotGroupCommand {
	groupId: string;
	command: string;
}

/**
 * Extracts a slash command sent as a group message, e.g. `/blacklist`
 */
export const parseOneBotGroupCommand = (raw: unknown): OneBotGroupCommand | null => {
	const message = GroupCommandSchema.safeParse(raw);
	if (!message.success || !message.data.group_id) {
		return null;
	}

	const text = message.data.raw_message.trim();
	const match = /^\/([a-z_]+)$/i.exec(text);
	if (!match?.[1]) {
		return null;
	}
	return { groupId: message.data.group_id, command: match[1].toLowerCase() };
};
