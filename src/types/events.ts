/**
 * A tracked member left (or was removed from) a group
 */
export interface LeaveEvent {
	kind: "leave";
	groupId: string;
	userId: string;
}

/**
 * A pending request to join a group
 * `flag` is the opaque token the platform needs to answer the request;
 * `subType` tells a direct request ("add") from an invitation ("invite").
 */
export interface JoinRequestEvent {
	kind: "join-request";
	groupId: string;
	userId: string;
	flag: string;
	subType: string;
}

export interface IgnoredEvent {
	kind: "ignore";
}

export type GuardEvent = LeaveEvent | JoinRequestEvent | IgnoredEvent;

export const IGNORED_EVENT: IgnoredEvent = { kind: "ignore" };
