import { type DecisionEngineDependencies, decideGuardEvent, type GuardOutcome } from "../domain/decision-engine.js";
import type { GuardEvent } from "../types/events.js";

/**
 * Minimal interface for the event context (ISP - Interface Segregation Principle)
 * The host decodes the platform payload; `reply` posts into the originating group.
 */
export interface GuardEventContext {
	event: GuardEvent;
	reply(text: string): Promise<unknown>;
}

export type GuardEventHandlerDependencies = DecisionEngineDependencies;

export type GuardEventHandler = (ctx: GuardEventContext) => Promise<GuardOutcome>;

/**
 * Runs one event through the decision engine and posts the resulting notices
 * Never throws: failures are logged and reported through the outcome.
 */
export const createGuardEventHandler =
	(deps: GuardEventHandlerDependencies): GuardEventHandler =>
	async (ctx: GuardEventContext): Promise<GuardOutcome> => {
		const { event } = ctx;
		if (event.kind === "ignore") {
			return { action: "none", notices: [] };
		}

		console.log("[DEBUG] guard-event-handler: Handling event", {
			kind: event.kind,
			groupId: event.groupId,
			userId: event.userId,
		});

		let result: GuardOutcome;
		try {
			result = await decideGuardEvent(event, deps);
		} catch (error) {
			console.error("[ERROR] guard-event-handler: Failed to handle event", {
				kind: event.kind,
				groupId: event.groupId,
			}, error);
			return { action: "failed", notices: [] };
		}

		console.log("[DEBUG] guard-event-handler: Decision made", {
			action: result.action,
			notices: result.notices.length,
		});

		for (const notice of result.notices) {
			try {
				await ctx.reply(notice);
			} catch (error) {
				console.error("[ERROR] guard-event-handler: Failed to send notice", {
					groupId: event.groupId,
				}, error);
			}
		}

		return result;
	};
