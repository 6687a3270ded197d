import type { Api } from "grammy";
import { type Either, left, right } from "../lib/either.js";
import type { JoinRequestEvent } from "../types/events.js";
import type { JoinRequestResponder, JoinRequestResponse } from "../types/platform.js";
import { toError } from "../utils/errors.js";

/**
 * Only the Bot API methods the adapter needs (ISP - Interface Segregation Principle)
 */
export type TelegramJoinRequestApi = Pick<Api, "approveChatJoinRequest" | "declineChatJoinRequest">;

/**
 * Adapter that implements JoinRequestResponder with grammy's Bot API client
 * Telegram identifies a request by chat and user, so the flag is not sent.
 * Call timeouts come from the bot's client options (`timeoutSeconds`).
 */
export class TelegramActionAdapter implements JoinRequestResponder {
	constructor(private readonly api: TelegramJoinRequestApi) {}

	async respondToJoinRequest(
		request: JoinRequestEvent,
		approve: boolean,
		reason?: string,
	): Promise<Either<Error, JoinRequestResponse>> {
		const chatId = Number(request.groupId);
		const userId = Number(request.userId);
		if (!Number.isSafeInteger(chatId) || !Number.isSafeInteger(userId)) {
			return left(new Error(`Invalid Telegram ids in join request: chat ${request.groupId}, user ${request.userId}`));
		}

		try {
			if (approve) {
				await this.api.approveChatJoinRequest(chatId, userId);
			} else {
				// Bot API declines carry no reason
				console.log("[DEBUG] telegram-action-adapter: Declining join request", { chatId, userId, reason });
				await this.api.declineChatJoinRequest(chatId, userId);
			}
		} catch (error) {
			return left(toError(error));
		}

		return right({ approved: approve });
	}
}
