import { z } from "zod";
import { DEFAULT_ACTION_TIMEOUT_MS } from "../adapters/onebot-action-adapter.js";

export const DEFAULT_DATA_DIR = "data/plugins/group-leave-guard";

const booleanFlag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
	GUARD_CONFIG_FILE: z.string().default("config/guard.json"),
	DATA_DIR: z.string().default(DEFAULT_DATA_DIR),
	ONEBOT_ENABLED: booleanFlag.default("true"),
	ONEBOT_API_URL: z.string().url().default("http://127.0.0.1:5700"),
	ONEBOT_ACCESS_TOKEN: z.string().optional(),
	ONEBOT_SECRET: z.string().optional(),
	ONEBOT_WEBHOOK_PATH: z.string().startsWith("/").default("/onebot"),
	HTTP_HOST: z.string().default("0.0.0.0"),
	HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
	TELEGRAM_BOT_TOKEN: z.string().optional(),
	ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_ACTION_TIMEOUT_MS),
});

/**
 * Process configuration read from environment variables
 */
export interface AppConfig {
	guardConfigFile: string;
	dataDir: string;
	onebot: {
		enabled: boolean;
		apiUrl: string;
		accessToken?: string;
		secret?: string;
		webhookPath: string;
	};
	http: {
		host: string;
		port: number;
	};
	telegram: {
		botToken?: string;
	};
	actionTimeoutMs: number;
}

/**
 * Validates the environment; blank variables count as unset
 * @throws Error listing every invalid variable
 */
export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
	const present = Object.fromEntries(
		Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ""),
	);

	const parsed = EnvSchema.safeParse(present);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		throw new Error(`Invalid environment: ${issues}`);
	}

	const vars = parsed.data;
	return {
		guardConfigFile: vars.GUARD_CONFIG_FILE,
		dataDir: vars.DATA_DIR,
		onebot: {
			enabled: vars.ONEBOT_ENABLED,
			apiUrl: vars.ONEBOT_API_URL,
			accessToken: vars.ONEBOT_ACCESS_TOKEN,
			secret: vars.ONEBOT_SECRET,
			webhookPath: vars.ONEBOT_WEBHOOK_PATH,
		},
		http: {
			host: vars.HTTP_HOST,
			port: vars.HTTP_PORT,
		},
		telegram: {
			botToken: vars.TELEGRAM_BOT_TOKEN,
		},
		actionTimeoutMs: vars.ACTION_TIMEOUT_MS,
	};
};
