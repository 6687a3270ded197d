import { createHmac } from "node:crypto";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { parseGuardConfig } from "../config/guard-config.js";
import { createGroupPolicy } from "../domain/group-policy.js";
import { formatOneBotMember } from "../formatters/notice-formatter.js";
import { createGuardEventHandler } from "../handlers/guard-event-handler.js";
import { right } from "../lib/either.js";
import { createBlacklistStore } from "../services/blacklist-store.js";
import type { JoinRequestResponder } from "../types/platform.js";
import { OneBotWebhookServer, type OneBotWebhookDependencies, verifyOneBotSignature } from "./onebot-webhook.js";

describe("OneBotWebhookServer", () => {
	let server: OneBotWebhookServer | null = null;

	afterEach(async () => {
		await server?.close();
		server = null;
	});

	const createDeps = (secret?: string) => {
		const deps = {
			handleEvent: vi.fn<OneBotWebhookDependencies["handleEvent"]>(async (ctx) => {
				await ctx.reply("notice text");
				return { action: "recorded", notices: ["notice text"] };
			}),
			handleBlacklistCommand: vi.fn<OneBotWebhookDependencies["handleBlacklistCommand"]>(async (ctx) => {
				await ctx.reply("1 member is blacklisted in this group.");
			}),
			messenger: {
				sendGroupMessage: vi
					.fn<OneBotWebhookDependencies["messenger"]["sendGroupMessage"]>()
					.mockResolvedValue(right({ message_id: 1 })),
			},
			secret,
		};
		return deps;
	};

	const startServer = async (deps: OneBotWebhookDependencies) => {
		server = new OneBotWebhookServer(deps, { port: 0, host: "127.0.0.1" });
		const port = await server.start();
		return `http://127.0.0.1:${port}`;
	};

	const post = (baseUrl: string, body: string, headers: Record<string, string> = {}) =>
		fetch(`${baseUrl}/onebot`, {
			method: "POST",
			headers: { "Content-Type": "application/json", ...headers },
			body,
		});

	const leaveNotice = JSON.stringify({
		post_type: "notice",
		notice_type: "group_decrease",
		sub_type: "leave",
		group_id: 123456,
		user_id: 10001,
	});

	it("should answer the health check", async () => {
		const baseUrl = await startServer(createDeps());

		const response = await fetch(`${baseUrl}/health`);

		expect(response.status).toBe(200);
		expect(await response.json()).toEqual({ status: "ok" });
	});

	it("should hand a classified event to the guard and reply into the group", async () => {
		const deps = createDeps();
		const baseUrl = await startServer(deps);

		const response = await post(baseUrl, leaveNotice);

		expect(response.status).toBe(204);
		expect(deps.handleEvent).toHaveBeenCalledOnce();
		expect(deps.handleEvent.mock.calls[0]?.[0].event).toEqual({
			kind: "leave",
			groupId: "123456",
			userId: "10001",
		});
		expect(deps.messenger.sendGroupMessage).toHaveBeenCalledWith("123456", "notice text");
	});

	it("should acknowledge ignored events without handling them", async () => {
		const deps = createDeps();
		const baseUrl = await startServer(deps);

		const response = await post(baseUrl, JSON.stringify({ post_type: "meta_event", meta_event_type: "heartbeat" }));

		expect(response.status).toBe(204);
		expect(deps.handleEvent).not.toHaveBeenCalled();
	});

	it("should route the /blacklist command", async () => {
		const deps = createDeps();
		const baseUrl = await startServer(deps);

		const response = await post(
			baseUrl,
			JSON.stringify({ post_type: "message", message_type: "group", group_id: 123456, raw_message: "/blacklist" }),
		);

		expect(response.status).toBe(204);
		expect(deps.handleBlacklistCommand).toHaveBeenCalledOnce();
		expect(deps.messenger.sendGroupMessage).toHaveBeenCalledWith("123456", "1 member is blacklisted in this group.");
		expect(deps.handleEvent).not.toHaveBeenCalled();
	});

	it("should accept a correctly signed event when a secret is set", async () => {
		const deps = createDeps("test-secret");
		const baseUrl = await startServer(deps);
		const signature = createHmac("sha1", "test-secret").update(leaveNotice).digest("hex");

		const response = await post(baseUrl, leaveNotice, { "X-Signature": `sha1=${signature}` });

		expect(response.status).toBe(204);
		expect(deps.handleEvent).toHaveBeenCalledOnce();
	});

	it("should reject an event with a wrong or missing signature", async () => {
		const deps = createDeps("test-secret");
		const baseUrl = await startServer(deps);

		const wrong = await post(baseUrl, leaveNotice, { "X-Signature": "sha1=0000" });
		const missing = await post(baseUrl, leaveNotice);

		expect(wrong.status).toBe(401);
		expect(missing.status).toBe(401);
		expect(deps.handleEvent).not.toHaveBeenCalled();
	});
});

const deferred = () => {
	let resolve: () => void = () => undefined;
	const promise = new Promise<void>((res) => {
		resolve = res;
	});
	return { promise, resolve };
};

describe("OneBotWebhookServer with a real guard", () => {
	let server: OneBotWebhookServer | null = null;
	let dataRoot: string | null = null;

	afterEach(async () => {
		await server?.close();
		server = null;
		if (dataRoot) {
			await rm(dataRoot, { recursive: true, force: true });
			dataRoot = null;
		}
	});

	it("should handle a join request only after the leave before it is recorded", async () => {
		dataRoot = await mkdtemp(join(tmpdir(), "onebot-webhook-"));
		const store = createBlacklistStore({ dataRoot });
		const writing = deferred();
		const release = deferred();
		const slowStore = {
			contains: store.contains,
			addMember: async (groupId: string, userId: string) => {
				writing.resolve();
				await release.promise;
				return store.addMember(groupId, userId);
			},
		};
		const responder = {
			respondToJoinRequest: vi
				.fn<JoinRequestResponder["respondToJoinRequest"]>()
				.mockResolvedValue(right({ approved: false })),
		};
		const sendGroupMessage = vi
			.fn<OneBotWebhookDependencies["messenger"]["sendGroupMessage"]>()
			.mockResolvedValue(right({ message_id: 1 }));

		server = new OneBotWebhookServer(
			{
				handleEvent: createGuardEventHandler({
					policy: createGroupPolicy(parseGuardConfig({ enable_group_whitelist: false, enable_auto_approve: true })),
					store: slowStore,
					responder,
					formatMember: formatOneBotMember,
				}),
				handleBlacklistCommand: vi.fn<OneBotWebhookDependencies["handleBlacklistCommand"]>(),
				messenger: { sendGroupMessage },
			},
			{ port: 0, host: "127.0.0.1" },
		);
		const port = await server.start();
		const post = (payload: Record<string, unknown>) =>
			fetch(`http://127.0.0.1:${port}/onebot`, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(payload),
			});

		const leaving = post({
			post_type: "notice",
			notice_type: "group_decrease",
			sub_type: "leave",
			group_id: 123456,
			user_id: 10001,
		});
		await writing.promise;
		const joining = post({
			post_type: "request",
			request_type: "group",
			sub_type: "add",
			group_id: 123456,
			user_id: 10001,
			flag: "flag-1",
		});
		await new Promise((resolve) => setTimeout(resolve, 50));

		expect(responder.respondToJoinRequest).not.toHaveBeenCalled();

		release.resolve();
		const [leaveResponse, joinResponse] = await Promise.all([leaving, joining]);

		expect(leaveResponse.status).toBe(204);
		expect(joinResponse.status).toBe(204);
		expect(responder.respondToJoinRequest).toHaveBeenCalledOnce();
		expect(responder.respondToJoinRequest.mock.calls[0]?.[1]).toBe(false);
	});
});

describe("verifyOneBotSignature", () => {
	it("should match the HMAC-SHA1 of the raw body", () => {
		const body = Buffer.from('{"post_type":"notice"}');
		const signature = createHmac("sha1", "test-secret").update(body).digest("hex");

		expect(verifyOneBotSignature("test-secret", body, `sha1=${signature}`)).toBe(true);
		expect(verifyOneBotSignature("other-secret", body, `sha1=${signature}`)).toBe(false);
		expect(verifyOneBotSignature("test-secret", body, signature)).toBe(false);
		expect(verifyOneBotSignature("test-secret", body, undefined)).toBe(false);
	});
});
