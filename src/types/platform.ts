import type { Either } from "../lib/either.js";
import type { JoinRequestEvent } from "./events.js";

export interface JoinRequestResponse {
	approved: boolean;
}

/**
 * Capability to answer join requests on the chat platform
 * Implementations never throw for remote failures; they return a Left instead.
 */
export interface JoinRequestResponder {
	respondToJoinRequest(
		request: JoinRequestEvent,
		approve: boolean,
		reason?: string,
	): Promise<Either<Error, JoinRequestResponse>>;
}

/**
 * Renders a user id the way the platform displays a member mention
 */
export type MemberFormatter = (userId: string) => string;
