import { mkdir } from "node:fs/promises";
import * as dotenv from "dotenv";
import { OneBotActionAdapter } from "./adapters/onebot-action-adapter.js";
import { createBot, startBot } from "./bot/bot-factory.js";
import { loadAppConfig } from "./config/app-config.js";
import { loadGuardConfig } from "./config/guard-config.js";
import { createGroupPolicy } from "./domain/group-policy.js";
import { formatOneBotMember } from "./formatters/notice-formatter.js";
import { createBlacklistCommandHandler } from "./handlers/command-handler.js";
import { createGuardEventHandler } from "./handlers/guard-event-handler.js";
import { OneBotWebhookServer } from "./server/onebot-webhook.js";
import { createBlacklistStore } from "./services/blacklist-store.js";

// Load environment variables
dotenv.config();

async function main() {
	console.log("[DEBUG] Starting group-leave-guard...");

	const config = loadAppConfig();
	const guardConfig = await loadGuardConfig(config.guardConfigFile);
	const policy = createGroupPolicy(guardConfig);

	await mkdir(config.dataDir, { recursive: true });
	const store = createBlacklistStore({ dataRoot: config.dataDir });
	console.log("[DEBUG] Blacklist store ready", { dataDir: config.dataDir });

	if (!config.onebot.enabled && !config.telegram.botToken) {
		throw new Error("Nothing to run: enable ONEBOT_ENABLED or set TELEGRAM_BOT_TOKEN");
	}

	let webhook: OneBotWebhookServer | null = null;
	if (config.onebot.enabled) {
		const onebot = new OneBotActionAdapter({
			apiUrl: config.onebot.apiUrl,
			accessToken: config.onebot.accessToken,
			timeoutMs: config.actionTimeoutMs,
		});
		webhook = new OneBotWebhookServer(
			{
				handleEvent: createGuardEventHandler({
					policy,
					store,
					responder: onebot,
					formatMember: formatOneBotMember,
				}),
				handleBlacklistCommand: createBlacklistCommandHandler({ policy, store }),
				messenger: onebot,
				secret: config.onebot.secret,
			},
			{
				port: config.http.port,
				host: config.http.host,
				path: config.onebot.webhookPath,
			},
		);
		await webhook.start();
	}

	if (config.telegram.botToken) {
		const bot = createBot({
			token: config.telegram.botToken,
			policy,
			store,
			actionTimeoutMs: config.actionTimeoutMs,
		});
		startBot(bot);
	}

	const shutdown = async () => {
		console.log("[DEBUG] Shutting down...");
		await webhook?.close();
	};
	process.once("SIGINT", () => {
		shutdown().catch((error: unknown) => console.error("[ERROR] Error during shutdown:", error));
	});
	process.once("SIGTERM", () => {
		shutdown().catch((error: unknown) => console.error("[ERROR] Error during shutdown:", error));
	});

	console.log("[DEBUG] group-leave-guard started", {
		onebot: config.onebot.enabled,
		telegram: Boolean(config.telegram.botToken),
		whitelistEnforced: policy.whitelistEnforced,
		allowedGroups: policy.allowedGroups.size,
	});
}

main().catch((error) => {
	console.error("[ERROR] Failed to start group-leave-guard:", error);
	process.exit(1);
});
