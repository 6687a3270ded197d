import { type GuardEvent, IGNORED_EVENT } from "../types/events.js";

/**
 * Minimal view of a Telegram update (ISP - Interface Segregation Principle)
 * grammy's `Update` satisfies it structurally
 */
export interface TelegramMembershipUpdate {
	chat_member?: {
		chat: { id: number; type: string };
		old_chat_member: { status: string };
		new_chat_member: { status: string; user: { id: number } };
	};
	chat_join_request?: {
		chat: { id: number; type: string };
		from: { id: number };
	};
}

const GROUP_CHAT_TYPES = new Set(["group", "supergroup"]);
const GONE_STATUSES = new Set(["left", "kicked"]);

/**
 * Decodes Telegram membership updates into guard events
 * A leave is a transition from any present status to "left" or "kicked".
 */
export const decodeTelegramUpdate = (update: TelegramMembershipUpdate): GuardEvent => {
	const member = update.chat_member;
	if (member) {
		if (!GROUP_CHAT_TYPES.has(member.chat.type)) {
			return IGNORED_EVENT;
		}
		const wasPresent = !GONE_STATUSES.has(member.old_chat_member.status);
		const isGone = GONE_STATUSES.has(member.new_chat_member.status);
		if (!wasPresent || !isGone) {
			return IGNORED_EVENT;
		}
		return {
			kind: "leave",
			groupId: String(member.chat.id),
			userId: String(member.new_chat_member.user.id),
		};
	}

	const request = update.chat_join_request;
	if (request) {
		if (!GROUP_CHAT_TYPES.has(request.chat.type)) {
			return IGNORED_EVENT;
		}
		return {
			kind: "join-request",
			groupId: String(request.chat.id),
			userId: String(request.from.id),
			flag: `${request.chat.id}:${request.from.id}`,
			subType: "add",
		};
	}

	return IGNORED_EVENT;
};
