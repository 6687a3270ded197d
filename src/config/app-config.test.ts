import { describe, expect, it } from "vitest";
import { DEFAULT_DATA_DIR, loadAppConfig } from "./app-config.js";

describe("loadAppConfig", () => {
	it("should apply defaults to an empty environment", () => {
		expect(loadAppConfig({})).toEqual({
			guardConfigFile: "config/guard.json",
			dataDir: DEFAULT_DATA_DIR,
			onebot: {
				enabled: true,
				apiUrl: "http://127.0.0.1:5700",
				accessToken: undefined,
				secret: undefined,
				webhookPath: "/onebot",
			},
			http: { host: "0.0.0.0", port: 3000 },
			telegram: { botToken: undefined },
			actionTimeoutMs: 10_000,
		});
	});

	it("should read and coerce variables", () => {
		const config = loadAppConfig({
			ONEBOT_ENABLED: "false",
			ONEBOT_API_URL: "http://napcat:3000",
			ONEBOT_ACCESS_TOKEN: "test-token",
			HTTP_PORT: "8080",
			TELEGRAM_BOT_TOKEN: "test-bot-token",
			ACTION_TIMEOUT_MS: "2500",
		});

		expect(config.onebot.enabled).toBe(false);
		expect(config.onebot.apiUrl).toBe("http://napcat:3000");
		expect(config.onebot.accessToken).toBe("test-token");
		expect(config.http.port).toBe(8080);
		expect(config.telegram.botToken).toBe("test-bot-token");
		expect(config.actionTimeoutMs).toBe(2500);
	});

	it("should treat blank variables as unset", () => {
		const config = loadAppConfig({ ONEBOT_SECRET: "", HTTP_PORT: "  " });

		expect(config.onebot.secret).toBeUndefined();
		expect(config.http.port).toBe(3000);
	});

	it("should reject invalid values", () => {
		expect(() => loadAppConfig({ HTTP_PORT: "http" })).toThrow(/^Invalid environment: HTTP_PORT: /);
		expect(() => loadAppConfig({ ONEBOT_ENABLED: "maybe" })).toThrow(/ONEBOT_ENABLED/);
	});
});
