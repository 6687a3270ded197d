import type { GroupPolicy } from "../domain/group-policy.js";
import { formatBlacklistSummary } from "../formatters/notice-formatter.js";
import type { BlacklistStore } from "../services/blacklist-store.js";

/**
 * Dependencies of the /blacklist command handler
 * Allows dependency injection for tests
 */
export interface BlacklistCommandHandlerDependencies {
	policy: Pick<GroupPolicy, "isGroupInScope">;
	store: Pick<BlacklistStore, "listMembers">;
}

/**
 * Minimal interface for the command context (ISP - Interface Segregation Principle)
 */
export interface BlacklistCommandContext {
	groupId?: string;
	reply(text: string): Promise<unknown>;
}

/**
 * Handler for the /blacklist command
 * Replies with the size of the group's blacklist; private chats and groups
 * outside the allow-list get no answer.
 */
export const createBlacklistCommandHandler =
	(deps: BlacklistCommandHandlerDependencies) =>
	async (ctx: BlacklistCommandContext): Promise<void> => {
		const { groupId } = ctx;
		console.log("[DEBUG] command-handler: /blacklist command received", { groupId });

		if (!groupId || !deps.policy.isGroupInScope(groupId)) {
			console.log("[DEBUG] command-handler: Group not in scope, skipping", { groupId });
			return;
		}

		const members = await deps.store.listMembers(groupId);
		await ctx.reply(formatBlacklistSummary(members.length));
		console.log("[DEBUG] command-handler: Summary sent", { groupId, count: members.length });
	};
