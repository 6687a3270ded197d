import type { GuardConfig } from "../config/guard-config.js";

/**
 * Immutable per-process moderation policy derived from the guard config
 */
export interface GroupPolicy {
	readonly whitelistEnforced: boolean;
	readonly allowedGroups: ReadonlySet<string>;
	readonly noticeEnabled: boolean;
	readonly autoApproveEnabled: boolean;
	readonly rejectReason: string;
	readonly leaveNoticeTemplate: string;
	isGroupInScope(groupId: string): boolean;
}

export const createGroupPolicy = (config: GuardConfig): GroupPolicy => {
	const allowedGroups: ReadonlySet<string> = new Set(
		config.groupWhitelist.map((groupId) => groupId.trim()).filter((groupId) => groupId.length > 0),
	);

	const isGroupInScope = (groupId: string): boolean => {
		const normalized = groupId.trim();
		if (!normalized) {
			return false;
		}
		if (!config.whitelistEnforced) {
			return true;
		}
		return allowedGroups.has(normalized);
	};

	return Object.freeze({
		whitelistEnforced: config.whitelistEnforced,
		allowedGroups,
		noticeEnabled: config.noticeEnabled,
		autoApproveEnabled: config.autoApproveEnabled,
		rejectReason: config.rejectReason,
		leaveNoticeTemplate: config.leaveNoticeTemplate,
		isGroupInScope,
	});
};
