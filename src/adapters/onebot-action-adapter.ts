import { z } from "zod";
import { type Either, isLeft, left, right } from "../lib/either.js";
import type { JoinRequestEvent } from "../types/events.js";
import type { JoinRequestResponder, JoinRequestResponse } from "../types/platform.js";
import { describeError } from "../utils/errors.js";

export const DEFAULT_ACTION_TIMEOUT_MS = 10_000;

/**
 * Configuration of the OneBot v11 HTTP API client
 */
export interface OneBotActionAdapterConfig {
	apiUrl: string;
	accessToken?: string;
	timeoutMs?: number;
	fetchFn?: typeof fetch;
}

const OneBotActionResponseSchema = z.object({
	status: z.string(),
	retcode: z.number(),
	data: z.unknown().optional(),
	message: z.string().optional(),
	wording: z.string().optional(),
});

export class OneBotActionError extends Error {
	constructor(
		readonly action: string,
		message: string,
		readonly retcode?: number,
		options?: { cause?: unknown },
	) {
		super(`OneBot action ${action} failed: ${message}`, options);
		this.name = "OneBotActionError";
	}
}

/**
 * Adapter that implements JoinRequestResponder over the OneBot v11 HTTP API
 * Every call is a single attempt bounded by `timeoutMs`; failures come back as Left.
 */
export class OneBotActionAdapter implements JoinRequestResponder {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchFn: typeof fetch;

	constructor(private readonly config: OneBotActionAdapterConfig) {
		this.baseUrl = config.apiUrl.replace(/\/+$/, "");
		this.timeoutMs = config.timeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
		this.fetchFn = config.fetchFn ?? fetch;
	}

	async respondToJoinRequest(
		request: JoinRequestEvent,
		approve: boolean,
		reason?: string,
	): Promise<Either<Error, JoinRequestResponse>> {
		const params: Record<string, unknown> = {
			flag: request.flag,
			sub_type: request.subType,
			approve,
		};
		if (!approve && reason) {
			params.reason = reason;
		}

		const result = await this.callAction("set_group_add_request", params);
		if (isLeft(result)) {
			return result;
		}
		console.log(`[DEBUG] onebot-action-adapter: Join request ${approve ? "approved" : "rejected"}`, {
			groupId: request.groupId,
			userId: request.userId,
		});
		return right({ approved: approve });
	}

	/**
	 * Posts a plain-text message into a group
	 */
	async sendGroupMessage(groupId: string, message: string): Promise<Either<Error, unknown>> {
		return this.callAction("send_group_msg", {
			group_id: /^[0-9]+$/.test(groupId) ? Number(groupId) : groupId,
			message,
		});
	}

	private async callAction(action: string, params: Record<string, unknown>): Promise<Either<Error, unknown>> {
		const headers: Record<string, string> = { "Content-Type": "application/json" };
		if (this.config.accessToken) {
			headers.Authorization = `Bearer ${this.config.accessToken}`;
		}

		let body: unknown;
		try {
			const response = await this.fetchFn(`${this.baseUrl}/${action}`, {
				method: "POST",
				headers,
				body: JSON.stringify(params),
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			if (!response.ok) {
				return left(new OneBotActionError(action, `HTTP ${response.status} ${response.statusText}`.trim()));
			}
			body = await response.json();
		} catch (error) {
			if (error instanceof Error && error.name === "TimeoutError") {
				return left(new OneBotActionError(action, `timed out after ${this.timeoutMs}ms`, undefined, { cause: error }));
			}
			return left(new OneBotActionError(action, describeError(error), undefined, { cause: error }));
		}

		const parsed = OneBotActionResponseSchema.safeParse(body);
		if (!parsed.success) {
			return left(new OneBotActionError(action, "unexpected response body"));
		}

		const { status, retcode, data, message, wording } = parsed.data;
		// "async" (retcode 1) is only queued, not confirmed
		if (status !== "ok" || retcode !== 0) {
			return left(new OneBotActionError(action, wording ?? message ?? `status ${status}`, retcode));
		}
		return right(data ?? null);
	}
}
