import { describe, expect, it } from "vitest";
import { decodeTelegramUpdate, type TelegramMembershipUpdate } from "./telegram-event-decoder.js";

const memberUpdate = (oldStatus: string, newStatus: string, chatType = "supergroup"): TelegramMembershipUpdate => ({
	chat_member: {
		chat: { id: -1001234, type: chatType },
		old_chat_member: { status: oldStatus },
		new_chat_member: { status: newStatus, user: { id: 42 } },
	},
});

describe("decodeTelegramUpdate", () => {
	it("should decode a member leaving a supergroup", () => {
		expect(decodeTelegramUpdate(memberUpdate("member", "left"))).toEqual({
			kind: "leave",
			groupId: "-1001234",
			userId: "42",
		});
	});

	it("should decode a member being removed", () => {
		expect(decodeTelegramUpdate(memberUpdate("restricted", "kicked"))).toMatchObject({ kind: "leave" });
	});

	it("should ignore joins and status changes between present states", () => {
		expect(decodeTelegramUpdate(memberUpdate("left", "member"))).toEqual({ kind: "ignore" });
		expect(decodeTelegramUpdate(memberUpdate("member", "administrator"))).toEqual({ kind: "ignore" });
	});

	it("should ignore a ban of someone who already left", () => {
		expect(decodeTelegramUpdate(memberUpdate("left", "kicked"))).toEqual({ kind: "ignore" });
	});

	it("should ignore channels", () => {
		expect(decodeTelegramUpdate(memberUpdate("member", "left", "channel"))).toEqual({ kind: "ignore" });
	});

	it("should decode a join request with a chat-and-user flag", () => {
		const event = decodeTelegramUpdate({
			chat_join_request: { chat: { id: -1001234, type: "supergroup" }, from: { id: 42 } },
		});

		expect(event).toEqual({
			kind: "join-request",
			groupId: "-1001234",
			userId: "42",
			flag: "-1001234:42",
			subType: "add",
		});
	});

	it("should ignore updates without membership data", () => {
		expect(decodeTelegramUpdate({})).toEqual({ kind: "ignore" });
	});
});
