import { run, sequentialize, type RunnerHandle } from "@grammyjs/runner";
import { Bot, type Context } from "grammy";
import { TelegramActionAdapter } from "../adapters/telegram-action-adapter.js";
import type { GroupPolicy } from "../domain/group-policy.js";
import { decodeTelegramUpdate } from "../domain/telegram-event-decoder.js";
import { formatTelegramMember } from "../formatters/notice-formatter.js";
import { createBlacklistCommandHandler } from "../handlers/command-handler.js";
import { createGuardEventHandler } from "../handlers/guard-event-handler.js";
import type { BlacklistStore } from "../services/blacklist-store.js";

/**
 * Configuration to create the Telegram bot
 */
export interface BotConfig {
	token: string;
	policy: GroupPolicy;
	store: BlacklistStore;
	actionTimeoutMs: number;
}

const ALLOWED_UPDATES: ("message" | "chat_member" | "chat_join_request")[] = [
	"message",
	"chat_member",
	"chat_join_request",
];

const stopRunner = (runner: RunnerHandle): void => {
	if (!runner.isRunning()) return;
	runner.stop().catch((error: unknown) => {
		console.error("[ERROR] Failed to stop bot runner:", error);
	});
};

/**
 * Creates and wires the bot
 * Factory function so tests and other hosts can build it without starting it
 */
export const createBot = (config: BotConfig): Bot => {
	console.log("[DEBUG] createBot: Creating new Bot instance...");
	const bot = new Bot(config.token, {
		client: {
			timeoutSeconds: Math.max(1, Math.ceil(config.actionTimeoutMs / 1000)),
		},
	});

	const handleEvent = createGuardEventHandler({
		policy: config.policy,
		store: config.store,
		responder: new TelegramActionAdapter(bot.api),
		formatMember: formatTelegramMember,
	});
	const handleBlacklistCommand = createBlacklistCommandHandler({
		policy: config.policy,
		store: config.store,
	});

	// Membership updates of one chat are handled one at a time
	const byChat = sequentialize((ctx: Context) => ctx.chat?.id.toString());

	bot.command("blacklist", byChat, async (ctx) => {
		const chat = ctx.chat;
		await handleBlacklistCommand({
			groupId: chat.type === "group" || chat.type === "supergroup" ? chat.id.toString() : undefined,
			reply: (text) => ctx.reply(text),
		});
	});

	bot.on(["chat_member", "chat_join_request"], byChat, async (ctx) => {
		const event = decodeTelegramUpdate(ctx.update);
		await handleEvent({
			event,
			reply: (text) => ctx.reply(text, { parse_mode: "HTML" }),
		});
	});

	console.log("[DEBUG] createBot: Bot instance configured successfully");
	return bot;
};

/**
 * Starts the bot with error handling
 */
export const startBot = (bot: Bot): RunnerHandle => {
	console.log("[DEBUG] startBot: Initiating bot startup...");
	bot.catch((error) => {
		console.error("[ERROR] Bot error:", error);
	});
	const runner = run(bot, {
		runner: {
			fetch: {
				allowed_updates: ALLOWED_UPDATES,
			},
		},
		sink: {
			concurrency: 5,
		},
	});
	process.once("SIGINT", () => stopRunner(runner));
	process.once("SIGTERM", () => stopRunner(runner));
	return runner;
};
