import {
	renderApproveNotice,
	renderLeaveNotice,
	renderRejectNotice,
} from "../formatters/notice-formatter.js";
import { isLeft } from "../lib/either.js";
import type { BlacklistStore } from "../services/blacklist-store.js";
import type { GuardEvent, JoinRequestEvent, LeaveEvent } from "../types/events.js";
import type { JoinRequestResponder, MemberFormatter } from "../types/platform.js";
import type { GroupPolicy } from "./group-policy.js";

export type GuardAction =
	| "none"
	| "out-of-scope"
	| "recorded"
	| "already-recorded"
	| "rejected"
	| "approved"
	| "approve-failed"
	| "failed";

/**
 * What the engine did with one event, plus the notices to post in the group
 */
export interface GuardOutcome {
	action: GuardAction;
	notices: string[];
}

/**
 * Dependencies of the decision engine (DIP - Dependency Inversion Principle)
 */
export interface DecisionEngineDependencies {
	policy: GroupPolicy;
	store: Pick<BlacklistStore, "addMember" | "contains">;
	responder: JoinRequestResponder;
	formatMember: MemberFormatter;
}

const outcome = (action: GuardAction, notices: string[] = []): GuardOutcome => ({ action, notices });

/**
 * Calls the platform once; any Left or exception counts as a failed action
 */
const answerJoinRequest = async (
	responder: JoinRequestResponder,
	request: JoinRequestEvent,
	approve: boolean,
	reason?: string,
): Promise<boolean> => {
	const details = { groupId: request.groupId, userId: request.userId, approve };
	try {
		const result = await responder.respondToJoinRequest(request, approve, reason);
		if (isLeft(result)) {
			console.error("[ERROR] decision-engine: Platform refused join request response", details, result[0]);
			return false;
		}
		console.log("[DEBUG] decision-engine: Join request answered", details);
		return true;
	} catch (error) {
		console.error("[ERROR] decision-engine: Join request response threw", details, error);
		return false;
	}
};

const handleLeave = async (event: LeaveEvent, deps: DecisionEngineDependencies): Promise<GuardOutcome> => {
	const added = await deps.store.addMember(event.groupId, event.userId);
	if (!added) {
		return outcome("already-recorded");
	}

	console.log("[DEBUG] decision-engine: Member left and was blacklisted", {
		groupId: event.groupId,
		userId: event.userId,
	});
	if (!deps.policy.noticeEnabled) {
		return outcome("recorded");
	}
	return outcome("recorded", [
		renderLeaveNotice(deps.policy.leaveNoticeTemplate, event, deps.formatMember),
	]);
};

const handleJoinRequest = async (
	event: JoinRequestEvent,
	deps: DecisionEngineDependencies,
): Promise<GuardOutcome> => {
	const { policy } = deps;

	if (await deps.store.contains(event.groupId, event.userId)) {
		console.log("[DEBUG] decision-engine: Rejecting join request from blacklisted member", {
			groupId: event.groupId,
			userId: event.userId,
			subType: event.subType,
		});
		await answerJoinRequest(deps.responder, event, false, policy.rejectReason);
		// The notice reports the decision, not the remote result
		if (!policy.noticeEnabled) {
			return outcome("rejected");
		}
		return outcome("rejected", [renderRejectNotice(deps.formatMember(event.userId))]);
	}

	if (!policy.autoApproveEnabled) {
		return outcome("none");
	}

	const approved = await answerJoinRequest(deps.responder, event, true);
	if (!approved) {
		return outcome("approve-failed");
	}
	if (!policy.noticeEnabled) {
		return outcome("approved");
	}
	return outcome("approved", [renderApproveNotice(deps.formatMember(event.userId))]);
};

/**
 * Decides what to do with a classified event
 * Stateless between events; all state lives in the blacklist store.
 */
export const decideGuardEvent = async (
	event: GuardEvent,
	deps: DecisionEngineDependencies,
): Promise<GuardOutcome> => {
	if (event.kind === "ignore") {
		return outcome("none");
	}
	if (!deps.policy.isGroupInScope(event.groupId)) {
		return outcome("out-of-scope");
	}

	switch (event.kind) {
		case "leave":
			return handleLeave(event, deps);
		case "join-request":
			return handleJoinRequest(event, deps);
	}
};
