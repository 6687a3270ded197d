import { readFile } from "node:fs/promises";
import { z } from "zod";
import { describeError } from "../utils/errors.js";

export const DEFAULT_REJECT_REASON = "blacklisted member, join refused";
export const DEFAULT_LEAVE_NOTICE_TEMPLATE = "Member {member} left the group and has been blacklisted.";

/**
 * Guard settings as written by the operator (snake_case keys)
 */
export const GuardConfigSchema = z
	.object({
		enable_group_whitelist: z.boolean().default(true),
		group_whitelist: z.array(z.union([z.string(), z.number().finite()])).default([]),
		enable_blacklist_notice: z.boolean().default(true),
		enable_auto_approve: z.boolean().default(false),
		reject_reason: z.string().nullish(),
		leave_notice_template: z.string().nullish(),
	})
	.transform((raw) => ({
		whitelistEnforced: raw.enable_group_whitelist,
		groupWhitelist: raw.group_whitelist
			.map((groupId) => String(groupId).trim())
			.filter((groupId) => groupId.length > 0),
		noticeEnabled: raw.enable_blacklist_notice,
		autoApproveEnabled: raw.enable_auto_approve,
		rejectReason: raw.reject_reason || DEFAULT_REJECT_REASON,
		leaveNoticeTemplate: raw.leave_notice_template || DEFAULT_LEAVE_NOTICE_TEMPLATE,
	}));

export type RawGuardConfig = z.input<typeof GuardConfigSchema>;
export type GuardConfig = z.output<typeof GuardConfigSchema>;

export class GuardConfigError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "GuardConfigError";
	}
}

/**
 * Validates raw guard settings, applying defaults for missing keys
 * @throws GuardConfigError when a key has the wrong type
 */
export const parseGuardConfig = (raw: unknown): GuardConfig => {
	const parsed = GuardConfigSchema.safeParse(raw ?? {});
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new GuardConfigError(`Invalid guard config: ${issues}`, { cause: parsed.error });
	}
	return parsed.data;
};

/**
 * Reads the guard settings file; a missing file means all defaults
 */
export const loadGuardConfig = async (path: string): Promise<GuardConfig> => {
	let content: string;
	try {
		content = await readFile(path, "utf8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			console.log("[DEBUG] guard-config: No config file found, using defaults", { path });
			return parseGuardConfig({});
		}
		throw new GuardConfigError(`Failed to read guard config ${path}: ${describeError(error)}`, { cause: error });
	}

	let document: unknown;
	try {
		document = JSON.parse(content);
	} catch (error) {
		throw new GuardConfigError(`Guard config ${path} is not valid JSON: ${describeError(error)}`, { cause: error });
	}

	const config = parseGuardConfig(document);
	console.log("[DEBUG] guard-config: Loaded guard config", {
		path,
		whitelistEnforced: config.whitelistEnforced,
		groups: config.groupWhitelist.length,
		noticeEnabled: config.noticeEnabled,
		autoApproveEnabled: config.autoApproveEnabled,
	});
	return config;
};
